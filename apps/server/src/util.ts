import type { ZodError } from "zod";

export function nowMs(): number {
  return Date.now();
}

export function toIso(ts: number | Date): string {
  return (ts instanceof Date ? ts : new Date(ts)).toISOString();
}

/** `flex_sensors.0: Expected number, received string; device_id: Required` */
export function describeZodError(err: ZodError): string {
  return err.issues
    .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}
