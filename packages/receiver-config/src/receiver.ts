import { isMapping } from "./fields.js";
import {
  MalformedValueError,
  MissingFieldError,
  ReceiverConfigError,
  type ReceiverLoadFailure,
  UnknownFieldError,
} from "./errors.js";
import {
  type AnyReceiverConfig,
  type EmailConfig,
  type HipchatConfig,
  type OpsGenieConfig,
  type PagerdutyConfig,
  type PushoverConfig,
  type SlackConfig,
  type VictorOpsConfig,
  type WebhookConfig,
  decodeEmailConfig,
  decodeHipchatConfig,
  decodeOpsGenieConfig,
  decodePagerdutyConfig,
  decodePushoverConfig,
  decodeSlackConfig,
  decodeVictorOpsConfig,
  decodeWebhookConfig,
} from "./receivers.js";

export const RECEIVER_LABEL = "receiver config";
const RECEIVER_TYPE = "receiver";
export const UNNAMED_RECEIVER = "<unnamed>";

/** A named set of notification integrations. */
export type Receiver = {
  readonly name: string;
  readonly emailConfigs: readonly EmailConfig[];
  readonly pagerdutyConfigs: readonly PagerdutyConfig[];
  readonly slackConfigs: readonly SlackConfig[];
  readonly hipchatConfigs: readonly HipchatConfig[];
  readonly webhookConfigs: readonly WebhookConfig[];
  readonly opsgenieConfigs: readonly OpsGenieConfig[];
  readonly victoropsConfigs: readonly VictorOpsConfig[];
  readonly pushoverConfigs: readonly PushoverConfig[];
};

export type ReceiverDecodeResult = {
  /** Declared name, empty when the node has none. */
  name: string;
  receiver?: Receiver;
  failures: ReceiverLoadFailure[];
};

const LIST_KEYS = new Set([
  "email_configs",
  "pagerduty_configs",
  "slack_configs",
  "hipchat_configs",
  "webhook_configs",
  "opsgenie_configs",
  "victorops_configs",
  "pushover_configs",
]);

/** Every integration of a receiver, in declaration order of the list keys. */
export function receiverIntegrations(receiver: Receiver): AnyReceiverConfig[] {
  return [
    ...receiver.emailConfigs,
    ...receiver.pagerdutyConfigs,
    ...receiver.slackConfigs,
    ...receiver.hipchatConfigs,
    ...receiver.webhookConfigs,
    ...receiver.opsgenieConfigs,
    ...receiver.victoropsConfigs,
    ...receiver.pushoverConfigs,
  ];
}

/**
 * Decodes a receiver node, collecting the failure of every integration
 * rather than stopping at the first one. `receiver` is only set when there
 * were no failures.
 */
export function decodeReceiverNode(raw: unknown, path = "receiver"): ReceiverDecodeResult {
  const failures: ReceiverLoadFailure[] = [];
  if (!isMapping(raw)) {
    failures.push({
      receiver: UNNAMED_RECEIVER,
      path,
      error: new MalformedValueError(`${RECEIVER_LABEL} must be a mapping`, { receiverType: RECEIVER_TYPE }),
    });
    return { name: "", failures };
  }

  const document = new Map<string, unknown>(Object.entries(raw));
  const rawName = document.get("name");
  const name = typeof rawName === "string" ? rawName : "";
  const receiverName = name || UNNAMED_RECEIVER;
  const fail = (error: ReceiverConfigError, at: string) => {
    failures.push({ receiver: receiverName, path: at, error });
  };

  if (name === "") {
    fail(new MissingFieldError("missing name in receiver", { receiverType: RECEIVER_TYPE, field: "name" }), path);
  }

  const unknownKeys = [...document.keys()].filter((key) => key !== "name" && !LIST_KEYS.has(key));
  if (unknownKeys.length > 0) {
    fail(new UnknownFieldError(RECEIVER_LABEL, { receiverType: RECEIVER_TYPE, keys: unknownKeys.sort() }), path);
  }

  function decodeList<C>(key: string, decode: (node: unknown) => C): C[] {
    const list = document.get(key);
    if (list === undefined || list === null) {
      return [];
    }
    if (!Array.isArray(list)) {
      fail(
        new MalformedValueError(`${key} in ${RECEIVER_LABEL} must be a list`, { receiverType: RECEIVER_TYPE, field: key }),
        `${path}.${key}`,
      );
      return [];
    }
    const configs: C[] = [];
    list.forEach((node: unknown, index) => {
      try {
        configs.push(decode(node));
      } catch (error) {
        if (!(error instanceof ReceiverConfigError)) {
          throw error;
        }
        fail(error, `${path}.${key}[${index}]`);
      }
    });
    return configs;
  }

  const receiver: Receiver = {
    name,
    emailConfigs: decodeList("email_configs", decodeEmailConfig),
    pagerdutyConfigs: decodeList("pagerduty_configs", decodePagerdutyConfig),
    slackConfigs: decodeList("slack_configs", decodeSlackConfig),
    hipchatConfigs: decodeList("hipchat_configs", decodeHipchatConfig),
    webhookConfigs: decodeList("webhook_configs", decodeWebhookConfig),
    opsgenieConfigs: decodeList("opsgenie_configs", decodeOpsGenieConfig),
    victoropsConfigs: decodeList("victorops_configs", decodeVictorOpsConfig),
    pushoverConfigs: decodeList("pushover_configs", decodePushoverConfig),
  };

  if (failures.length > 0) {
    return { name, failures };
  }
  return { name, receiver: Object.freeze(receiver), failures };
}

/**
 * Decodes a single receiver node.
 *
 * @throws ReceiverConfigError for the first problem found in the node
 */
export function decodeReceiver(raw: unknown): Receiver {
  const { receiver, failures } = decodeReceiverNode(raw);
  const [first] = failures;
  if (first) {
    throw first.error;
  }
  if (!receiver) {
    throw new MalformedValueError(`invalid ${RECEIVER_LABEL}`, { receiverType: RECEIVER_TYPE });
  }
  return receiver;
}
