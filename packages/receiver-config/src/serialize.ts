import YAML from "yaml";

import type { ReceiverConfig } from "./decode.js";
import { Duration } from "./duration.js";
import { toExternalName } from "./fields.js";
import { SEND_RESOLVED_FIELD } from "./notifier.js";
import { Secret } from "./secret.js";

/** Plain, display-safe form of a receiver config keyed by external field names. */
export type ReceiverDocument = Record<string, unknown>;

function encodeValue(value: unknown): unknown {
  if (value instanceof Secret || value instanceof Duration) {
    return value.toJSON();
  }
  if (typeof value === "object" && value !== null) {
    return { ...value };
  }
  return value;
}

function isEmptyValue(value: unknown): boolean {
  if (value === undefined || value === "") {
    return true;
  }
  return typeof value === "object" && value !== null && Object.keys(value).length === 0;
}

/**
 * Renders a config for display or export. Secrets are replaced with the
 * redaction placeholder and durations use their canonical text form.
 */
export function toDocument(config: ReceiverConfig): ReceiverDocument {
  const document: ReceiverDocument = { [SEND_RESOLVED_FIELD]: config.sendResolved() };
  const fields: object = config.fields;
  for (const [key, value] of Object.entries(fields)) {
    const encoded = encodeValue(value);
    if (encoded === undefined) {
      continue;
    }
    if (config.descriptor.omitEmpty.has(key) && isEmptyValue(encoded)) {
      continue;
    }
    document[toExternalName(key)] = encoded;
  }
  return document;
}

export function toYaml(config: ReceiverConfig): string {
  return YAML.stringify(toDocument(config));
}
