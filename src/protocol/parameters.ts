/**
 * Protocol Module - Parameter Registry
 *
 * Control and status points of a Vento unit. Immutable; defined once.
 */
import type { Parameter } from "./schema.js";

export const PARAMETERS: ReadonlyArray<Parameter> = [
  {
    id: 0x01,
    name: "power",
    type: "boolean",
    access: "readwrite",
    description: "Unit on/off",
  },
  {
    id: 0x02,
    name: "fan-speed",
    type: "enum",
    access: "readwrite",
    description: "Speed preset; manual uses manual-speed",
    options: [
      { code: 1, label: "1" },
      { code: 2, label: "2" },
      { code: 3, label: "3" },
      { code: 255, label: "manual" },
    ],
  },
  {
    id: 0x06,
    name: "boost-mode",
    type: "boolean",
    access: "read",
    description: "Boost mode active",
  },
  {
    id: 0x07,
    name: "timer-mode",
    type: "enum",
    access: "readwrite",
    description: "Timer mode",
    options: [
      { code: 0, label: "off" },
      { code: 1, label: "night" },
      { code: 2, label: "party" },
    ],
  },
  {
    id: 0x0f,
    name: "humidity-sensor",
    type: "boolean",
    access: "readwrite",
    description: "Humidity sensor enabled",
  },
  {
    id: 0x14,
    name: "relay-sensor",
    type: "boolean",
    access: "readwrite",
    description: "Relay sensor enabled",
  },
  {
    id: 0x16,
    name: "analog-sensor",
    type: "boolean",
    access: "readwrite",
    description: "0-10 V sensor enabled",
  },
  {
    id: 0x19,
    name: "humidity-threshold",
    type: "integer",
    access: "readwrite",
    description: "Humidity threshold for the humidity sensor",
    unit: "%",
    min: 40,
    max: 80,
    size: 1,
  },
  {
    id: 0x24,
    name: "battery-voltage",
    type: "integer",
    access: "read",
    description: "Remote control battery voltage",
    unit: "mV",
    min: 0,
    max: 5000,
    size: 2,
  },
  {
    id: 0x25,
    name: "humidity",
    type: "integer",
    access: "read",
    description: "Current relative humidity",
    unit: "%",
    min: 0,
    max: 100,
    size: 1,
  },
  {
    id: 0x2d,
    name: "analog-voltage",
    type: "integer",
    access: "read",
    description: "0-10 V sensor reading",
    unit: "%",
    min: 0,
    max: 100,
    size: 1,
  },
  {
    id: 0x32,
    name: "relay-state",
    type: "boolean",
    access: "read",
    description: "Relay sensor contact closed",
  },
  {
    id: 0x44,
    name: "manual-speed",
    type: "integer",
    access: "readwrite",
    description: "Fan speed used by the manual preset",
    min: 0,
    max: 255,
    size: 1,
  },
  {
    id: 0x4a,
    name: "fan1-speed",
    type: "integer",
    access: "read",
    description: "Fan 1 rotation speed",
    unit: "rpm",
    min: 0,
    max: 5000,
    size: 2,
  },
  {
    id: 0x4b,
    name: "fan2-speed",
    type: "integer",
    access: "read",
    description: "Fan 2 rotation speed",
    unit: "rpm",
    min: 0,
    max: 5000,
    size: 2,
  },
  {
    id: 0x66,
    name: "boost-delay",
    type: "integer",
    access: "readwrite",
    description: "Boost switch-off delay",
    unit: "min",
    min: 0,
    max: 60,
    size: 1,
  },
  {
    id: 0x83,
    name: "alarm-status",
    type: "enum",
    access: "read",
    description: "Alarm indicator",
    options: [
      { code: 0, label: "none" },
      { code: 1, label: "alarm" },
      { code: 2, label: "warning" },
    ],
  },
  {
    id: 0x88,
    name: "filter-alarm",
    type: "boolean",
    access: "read",
    description: "Filter needs replacement",
  },
  {
    id: 0xb7,
    name: "operation-mode",
    type: "enum",
    access: "readwrite",
    description: "Airflow mode",
    options: [
      { code: 0, label: "ventilation" },
      { code: 1, label: "heat-recovery" },
      { code: 2, label: "supply" },
    ],
  },
  {
    id: 0xb9,
    name: "unit-type",
    type: "integer",
    access: "read",
    description: "Unit model code",
    min: 0,
    max: 0xffff,
    size: 2,
  },
];

const byId = new Map(PARAMETERS.map((parameter) => [parameter.id, parameter]));
const byName = new Map(
  PARAMETERS.map((parameter) => [parameter.name, parameter]),
);

export function getParameterById(id: number): Parameter | undefined {
  return byId.get(id);
}

export function getParameterByName(name: string): Parameter | undefined {
  return byName.get(name);
}

export function isWritable(parameter: Parameter): boolean {
  return parameter.access === "readwrite";
}
