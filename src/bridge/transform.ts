/**
 * Bridge Module - Pure Transformations
 *
 * Decides what to publish. No side effects.
 */
import type { ParameterReading } from "../protocol/index.js";
import type { TopicMapper } from "../topics/index.js";
import { Availability, encodePayload } from "../topics/index.js";
import type { Publication } from "./schema.js";

/**
 * Status publications for a set of readings.
 *
 * With `deduplicate`, readings whose payload equals the last one published
 * on their topic are dropped.
 */
export function selectPublications(
  readings: ReadonlyArray<ParameterReading>,
  mapper: TopicMapper,
  lastPublished: ReadonlyMap<string, string>,
  deduplicate: boolean,
): Publication[] {
  const publications: Publication[] = [];
  for (const { parameter, value } of readings) {
    const topic = mapper.topicForStatus(parameter);
    const payload = encodePayload(parameter, value);
    if (deduplicate && lastPublished.get(topic) === payload) continue;
    publications.push({ topic, payload });
  }
  return publications;
}

export function rememberPublication(
  lastPublished: ReadonlyMap<string, string>,
  publication: Publication,
): ReadonlyMap<string, string> {
  const next = new Map(lastPublished);
  next.set(publication.topic, publication.payload);
  return next;
}

/**
 * Availability to announce after a poll cycle, or null when it has not
 * changed.
 */
export function nextAvailability(
  current: Availability | null,
  reachable: boolean,
): Availability | null {
  const next = reachable ? Availability.ONLINE : Availability.TIMEOUT;
  return next === current ? null : next;
}

/**
 * One JSON object with every reading of a cycle, keyed by parameter name.
 */
export function buildAggregatePayload(
  readings: ReadonlyArray<ParameterReading>,
): string {
  const entries = readings.map(({ parameter, value }): [string, string] => [
    parameter.name,
    encodePayload(parameter, value),
  ]);
  return JSON.stringify(Object.fromEntries(entries));
}
