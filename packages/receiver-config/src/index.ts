/**
 * Typed schemas and a strict decoder for alert receiver integrations
 * (email, webhook, chat, paging and incident-management services).
 *
 * @example
 * ```typescript
 * import { decodeSlackConfig, parseReceiversYaml, toDocument } from "receiver-config";
 *
 * const slack = decodeSlackConfig({ api_url: "https://chat.example.com/hook", channel: "#ops" });
 * slack.sendResolved(); // false
 * toDocument(slack).api_url; // "<secret>"
 *
 * const receivers = parseReceiversYaml(source);
 * ```
 */

export { Secret, SECRET_PLACEHOLDER } from "./secret.js";
export { Duration, InvalidDurationError, parseDuration } from "./duration.js";
export { type Notifier, type NotifierConfig, SEND_RESOLVED_FIELD } from "./notifier.js";
export { DurationSchema, SecretSchema, field, type StringMap, toExternalName, toInternalName } from "./fields.js";
export * from "./schemas.js";
export * from "./defaults.js";
export {
  ReceiverConfig,
  type ReceiverDescriptor,
  type ReceiverSchema,
  decodeReceiverConfig,
  defineReceiver,
} from "./decode.js";
export * from "./receivers.js";
export { type ReceiverDocument, toDocument, toYaml } from "./serialize.js";
export * from "./errors.js";
export {
  type Receiver,
  type ReceiverDecodeResult,
  decodeReceiver,
  decodeReceiverNode,
  receiverIntegrations,
} from "./receiver.js";
export { type LoadReceiversOptions, loadReceivers, parseReceiversYaml } from "./loadReceivers.js";
export { type AppLogger, appLogger, createLogger, normalizeError } from "./observability/logger.js";
