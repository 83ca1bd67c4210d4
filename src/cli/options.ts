import { InvalidArgumentError } from "commander";

export interface Threshold {
  ports: number;
  window: number;
}

export interface Endpoint {
  host: string;
  port: number;
}

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(n) || n < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return n;
}

export function parsePort(value: string): number {
  const n = parsePositiveInt(value);
  if (n > 65535) {
    throw new InvalidArgumentError("Expected a port between 1 and 65535.");
  }
  return n;
}

/** Seconds, possibly fractional, returned as milliseconds. */
export function parseDelay(value: string): number {
  const seconds = Number(value);
  if (value.trim() === "" || !Number.isFinite(seconds) || seconds < 0) {
    throw new InvalidArgumentError("Expected a non-negative number of seconds.");
  }
  return Math.round(seconds * 1000);
}

/** `<ports>/<window>`, e.g. `15/10`. */
export function parseThreshold(value: string): Threshold {
  const parts = value.split("/");
  if (parts.length !== 2) {
    throw new InvalidArgumentError("Expected <ports>/<window>, e.g. 15/10.");
  }
  return { ports: parsePositiveInt(parts[0]), window: parsePositiveInt(parts[1]) };
}

/** `<host>:<port>`; the last colon separates the port. */
export function parseEndpoint(value: string): Endpoint {
  const lastColon = value.lastIndexOf(":");
  if (lastColon <= 0) {
    throw new InvalidArgumentError("Expected <host>:<port>.");
  }
  return { host: value.substring(0, lastColon), port: parsePort(value.substring(lastColon + 1)) };
}
