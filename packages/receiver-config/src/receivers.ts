import { type ReceiverConfig, type ReceiverDescriptor, decodeReceiverConfig, defineReceiver } from "./decode.js";
import { DuplicateHeaderError, MissingFieldError } from "./errors.js";
import type { StringMap } from "./fields.js";
import {
  type EmailFields,
  EmailFieldsSchema,
  type HipchatFields,
  HipchatFieldsSchema,
  type OpsGenieFields,
  OpsGenieFieldsSchema,
  type PagerdutyFields,
  PagerdutyFieldsSchema,
  type PushoverFields,
  PushoverFieldsSchema,
  type SlackFields,
  SlackFieldsSchema,
  type VictorOpsFields,
  VictorOpsFieldsSchema,
  type WebhookFields,
  WebhookFieldsSchema,
} from "./schemas.js";
import { Secret } from "./secret.js";

export type EmailConfig = ReceiverConfig<"email", EmailFields>;
export type PagerdutyConfig = ReceiverConfig<"pagerduty", PagerdutyFields>;
export type SlackConfig = ReceiverConfig<"slack", SlackFields>;
export type HipchatConfig = ReceiverConfig<"hipchat", HipchatFields>;
export type WebhookConfig = ReceiverConfig<"webhook", WebhookFields>;
export type OpsGenieConfig = ReceiverConfig<"opsgenie", OpsGenieFields>;
export type VictorOpsConfig = ReceiverConfig<"victorops", VictorOpsFields>;
export type PushoverConfig = ReceiverConfig<"pushover", PushoverFields>;

export type AnyReceiverConfig =
  | EmailConfig
  | PagerdutyConfig
  | SlackConfig
  | HipchatConfig
  | WebhookConfig
  | OpsGenieConfig
  | VictorOpsConfig
  | PushoverConfig;

function requireValue(
  value: string | Secret,
  fieldName: string,
  message: string,
  schema: ReceiverDescriptor,
): void {
  const empty = value instanceof Secret ? value.isEmpty() : value.length === 0;
  if (empty) {
    throw new MissingFieldError(message, { receiverType: schema.type, field: fieldName });
  }
}

const HEADER_WORD_START = /(^|[^\p{L}\p{N}_])([\p{L}\p{N}_])/gu;

/**
 * Canonical display form of a header name: lowercased, then the first
 * character of every alphanumeric run uppercased (`x-FOO` → `X-Foo`).
 */
export function canonicalHeaderName(name: string): string {
  return name
    .toLowerCase()
    .replace(HEADER_WORD_START, (_match: string, separator: string, first: string) => separator + first.toUpperCase());
}

function normalizeHeaders(headers: StringMap, schema: ReceiverDescriptor): StringMap {
  const normalized = new Map<string, string>();
  for (const [name, value] of Object.entries(headers)) {
    const canonical = canonicalHeaderName(name);
    if (normalized.has(canonical)) {
      throw new DuplicateHeaderError(canonical, { receiverType: schema.type, label: schema.label });
    }
    normalized.set(canonical, value);
  }
  return Object.fromEntries(normalized);
}

export const emailReceiver = defineReceiver({
  type: "email",
  label: "email config",
  fields: EmailFieldsSchema,
  omitEmpty: ["smarthost"],
  normalize: (fields, schema) => ({ ...fields, headers: normalizeHeaders(fields.headers, schema) }),
  validate: (fields, schema) => {
    requireValue(fields.to, "to", "missing to address in email config", schema);
  },
});

export const pagerdutyReceiver = defineReceiver({
  type: "pagerduty",
  label: "pagerduty config",
  fields: PagerdutyFieldsSchema,
  validate: (fields, schema) => {
    requireValue(fields.serviceKey, "service_key", "missing service key in PagerDuty config", schema);
  },
});

export const slackReceiver = defineReceiver({
  type: "slack",
  label: "slack config",
  fields: SlackFieldsSchema,
});

export const hipchatReceiver = defineReceiver({
  type: "hipchat",
  label: "hipchat config",
  fields: HipchatFieldsSchema,
  validate: (fields, schema) => {
    requireValue(fields.roomId, "room_id", "missing room id in Hipchat config", schema);
  },
});

export const webhookReceiver = defineReceiver({
  type: "webhook",
  label: "webhook config",
  fields: WebhookFieldsSchema,
  validate: (fields, schema) => {
    requireValue(fields.url, "url", "missing URL in webhook config", schema);
  },
});

export const opsgenieReceiver = defineReceiver({
  type: "opsgenie",
  label: "opsgenie config",
  fields: OpsGenieFieldsSchema,
  validate: (fields, schema) => {
    requireValue(fields.apiKey, "api_key", "missing API key in OpsGenie config", schema);
  },
});

export const victoropsReceiver = defineReceiver({
  type: "victorops",
  label: "victorops config",
  fields: VictorOpsFieldsSchema,
  validate: (fields, schema) => {
    requireValue(fields.apiKey, "api_key", "missing API key in VictorOps config", schema);
    requireValue(fields.routingKey, "routing_key", "missing Routing key in VictorOps config", schema);
  },
});

export const pushoverReceiver = defineReceiver({
  type: "pushover",
  label: "pushover config",
  fields: PushoverFieldsSchema,
  validate: (fields, schema) => {
    requireValue(fields.userKey, "user_key", "missing user key in Pushover config", schema);
    requireValue(fields.token, "token", "missing token in Pushover config", schema);
  },
});

export function decodeEmailConfig(raw: unknown): EmailConfig {
  return decodeReceiverConfig(emailReceiver, raw);
}

export function decodePagerdutyConfig(raw: unknown): PagerdutyConfig {
  return decodeReceiverConfig(pagerdutyReceiver, raw);
}

export function decodeSlackConfig(raw: unknown): SlackConfig {
  return decodeReceiverConfig(slackReceiver, raw);
}

export function decodeHipchatConfig(raw: unknown): HipchatConfig {
  return decodeReceiverConfig(hipchatReceiver, raw);
}

export function decodeWebhookConfig(raw: unknown): WebhookConfig {
  return decodeReceiverConfig(webhookReceiver, raw);
}

export function decodeOpsGenieConfig(raw: unknown): OpsGenieConfig {
  return decodeReceiverConfig(opsgenieReceiver, raw);
}

export function decodeVictorOpsConfig(raw: unknown): VictorOpsConfig {
  return decodeReceiverConfig(victoropsReceiver, raw);
}

export function decodePushoverConfig(raw: unknown): PushoverConfig {
  return decodeReceiverConfig(pushoverReceiver, raw);
}
