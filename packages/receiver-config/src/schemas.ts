/**
 * Field declarations for every supported receiver type.
 *
 * Keys are the internal (camelCase) names; the document and serialized form
 * use the snake_case equivalent (`authPassword` ↔ `auth_password`). Key order
 * is the order fields are serialized in.
 */

import { z } from "zod";

import { field } from "./fields.js";

export const RECEIVER_TYPES = [
  "email",
  "pagerduty",
  "slack",
  "hipchat",
  "webhook",
  "opsgenie",
  "victorops",
  "pushover",
] as const;
export type ReceiverType = (typeof RECEIVER_TYPES)[number];

// ============================================================================
// Email
// ============================================================================

export const EmailFieldsSchema = z.object({
  to: field.string,
  from: field.string,
  smarthost: field.string,
  authUsername: field.string,
  authPassword: field.secret,
  authSecret: field.secret,
  authIdentity: field.string,
  headers: field.stringMap,
  html: field.string,
  requireTls: field.optionalBool,
});
export type EmailFields = z.output<typeof EmailFieldsSchema>;

// ============================================================================
// PagerDuty
// ============================================================================

export const PagerdutyFieldsSchema = z.object({
  serviceKey: field.secret,
  url: field.string,
  client: field.string,
  clientUrl: field.string,
  description: field.string,
  details: field.stringMap,
});
export type PagerdutyFields = z.output<typeof PagerdutyFieldsSchema>;

// ============================================================================
// Slack
// ============================================================================

export const SlackFieldsSchema = z.object({
  apiUrl: field.secret,
  // Channel override, e.g. #other-channel or @username.
  channel: field.string,
  username: field.string,
  color: field.string,
  title: field.string,
  titleLink: field.string,
  pretext: field.string,
  text: field.string,
  fallback: field.string,
  iconEmoji: field.string,
  iconUrl: field.string,
});
export type SlackFields = z.output<typeof SlackFieldsSchema>;

// ============================================================================
// Hipchat
// ============================================================================

export const HipchatFieldsSchema = z.object({
  apiUrl: field.string,
  authToken: field.secret,
  roomId: field.string,
  from: field.string,
  notify: field.bool,
  message: field.string,
  messageFormat: field.string,
  color: field.string,
});
export type HipchatFields = z.output<typeof HipchatFieldsSchema>;

// ============================================================================
// Webhook
// ============================================================================

export const WebhookFieldsSchema = z.object({
  url: field.string,
});
export type WebhookFields = z.output<typeof WebhookFieldsSchema>;

// ============================================================================
// OpsGenie
// ============================================================================

export const OpsGenieFieldsSchema = z.object({
  apiKey: field.secret,
  apiHost: field.string,
  message: field.string,
  description: field.string,
  source: field.string,
  details: field.stringMap,
  teams: field.string,
  tags: field.string,
  note: field.string,
});
export type OpsGenieFields = z.output<typeof OpsGenieFieldsSchema>;

// ============================================================================
// VictorOps
// ============================================================================

export const VictorOpsFieldsSchema = z.object({
  apiKey: field.secret,
  apiUrl: field.string,
  routingKey: field.string,
  messageType: field.string,
  // State message.
  message: field.string,
  from: field.string,
});
export type VictorOpsFields = z.output<typeof VictorOpsFieldsSchema>;

// ============================================================================
// Pushover
// ============================================================================

export const PushoverFieldsSchema = z.object({
  userKey: field.secret,
  token: field.secret,
  title: field.string,
  message: field.string,
  url: field.string,
  priority: field.string,
  retry: field.duration,
  expire: field.duration,
});
export type PushoverFields = z.output<typeof PushoverFieldsSchema>;

/** Decoded field type of each receiver type. */
export type ReceiverFieldsMap = {
  email: EmailFields;
  pagerduty: PagerdutyFields;
  slack: SlackFields;
  hipchat: HipchatFields;
  webhook: WebhookFields;
  opsgenie: OpsGenieFields;
  victorops: VictorOpsFields;
  pushover: PushoverFields;
};
