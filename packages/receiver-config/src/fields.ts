import { z } from "zod";

import { Duration, InvalidDurationError } from "./duration.js";
import { Secret } from "./secret.js";

export type StringMap = Record<string, string>;

/**
 * Renders a scalar as text the way a YAML loader would have kept it had the
 * field been quoted. Non-scalars are returned unchanged.
 */
function scalarText(value: unknown): unknown {
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  return value;
}

export function isMapping(value: unknown): value is object {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Each kind accepts its raw document form, the already-decoded value (the
// seed taken from the defaults) and `null`, which resets the field to its
// zero value.

const stringField = z.unknown().transform((value, ctx): string => {
  if (value === null) {
    return "";
  }
  const text = scalarText(value);
  if (typeof text === "string") {
    return text;
  }
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected a string" });
  return z.NEVER;
});

/** Accepts a {@link Secret}, its text form or `null` (the empty secret). */
export const SecretSchema = z.unknown().transform((value, ctx): Secret => {
  if (value instanceof Secret) {
    return value;
  }
  if (value === null) {
    return Secret.empty();
  }
  const text = scalarText(value);
  if (typeof text === "string") {
    return new Secret(text);
  }
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected a string" });
  return z.NEVER;
});

const boolField = z.unknown().transform((value, ctx): boolean => {
  if (value === null) {
    return false;
  }
  if (typeof value === "boolean") {
    return value;
  }
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected a boolean" });
  return z.NEVER;
});

const optionalBoolField = z.unknown().transform((value, ctx): boolean | undefined => {
  if (value === null || value === undefined) {
    return undefined;
  }
  if (typeof value === "boolean") {
    return value;
  }
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected a boolean" });
  return z.NEVER;
});

/** Accepts a {@link Duration}, a duration string such as `1h30m` or `null` (zero). */
export const DurationSchema = z.unknown().transform((value, ctx): Duration => {
  if (value instanceof Duration) {
    return value;
  }
  if (value === null) {
    return Duration.ZERO;
  }
  if (typeof value !== "string") {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected a duration string such as 1m or 1h30m" });
    return z.NEVER;
  }
  try {
    return Duration.parse(value);
  } catch (error) {
    if (!(error instanceof InvalidDurationError)) {
      throw error;
    }
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: error.message });
    return z.NEVER;
  }
});

const stringMapField = z.unknown().transform((value, ctx): StringMap => {
  if (value === null) {
    return {};
  }
  if (!isMapping(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected a mapping of strings" });
    return z.NEVER;
  }
  const entries: Array<[string, string]> = [];
  for (const [key, entry] of Object.entries(value)) {
    const text = entry === null ? "" : scalarText(entry);
    if (typeof text !== "string") {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected a string", path: [key] });
      continue;
    }
    entries.push([key, text]);
  }
  // fromEntries defines own properties, so `__proto__` stays an ordinary key.
  return Object.fromEntries(entries);
});

/** Value kinds a receiver field can be declared with. */
export const field = {
  string: stringField,
  secret: SecretSchema,
  bool: boolField,
  optionalBool: optionalBoolField,
  duration: DurationSchema,
  stringMap: stringMapField,
} as const;

/** `authPassword` → `auth_password` */
export function toExternalName(key: string): string {
  return key.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

/** `auth_password` → `authPassword` */
export function toInternalName(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_match: string, letter: string) => letter.toUpperCase());
}
