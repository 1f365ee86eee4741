import { randomUUID } from "node:crypto";

export type UUID = string;
export type Timestamp = number; // epoch ms

export function generateId(): UUID {
  return randomUUID();
}

export function now(): Timestamp {
  return Date.now();
}
