import { createHash } from "crypto";

export const hash = (s: string) => createHash("sha256").update(s).digest("hex");

/** Short content fingerprint for log lines. */
export const fingerprint = (s: string) => hash(s).slice(0, 12);

/** Recursively freeze a plain data tree. */
export function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
