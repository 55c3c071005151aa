import { Duration } from "./duration.js";
import type {
  EmailFields,
  HipchatFields,
  OpsGenieFields,
  PagerdutyFields,
  PushoverFields,
  ReceiverFieldsMap,
  ReceiverType,
  SlackFields,
  VictorOpsFields,
  WebhookFields,
} from "./schemas.js";
import { Secret } from "./secret.js";

/** Seed a raw receiver document is decoded onto. */
export type ReceiverDefaults<F> = {
  readonly sendResolved: boolean;
  readonly fields: Readonly<F>;
};

export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/** Default Subject header for email notifications without one. */
export const DEFAULT_EMAIL_SUBJECT = `{{ template "email.default.subject" . }}`;

export const DEFAULT_EMAIL_CONFIG: ReceiverDefaults<EmailFields> = deepFreeze({
  sendResolved: false,
  fields: {
    to: "",
    from: "",
    smarthost: "",
    authUsername: "",
    authPassword: Secret.empty(),
    authSecret: Secret.empty(),
    authIdentity: "",
    headers: {},
    html: `{{ template "email.default.html" . }}`,
    requireTls: undefined,
  },
});

export const DEFAULT_PAGERDUTY_CONFIG: ReceiverDefaults<PagerdutyFields> = deepFreeze({
  sendResolved: true,
  fields: {
    serviceKey: Secret.empty(),
    url: "",
    client: `{{ template "pagerduty.default.client" . }}`,
    clientUrl: `{{ template "pagerduty.default.clientURL" . }}`,
    description: `{{ template "pagerduty.default.description" .}}`,
    details: {
      firing: `{{ template "pagerduty.default.instances" .Alerts.Firing }}`,
      resolved: `{{ template "pagerduty.default.instances" .Alerts.Resolved }}`,
      num_firing: `{{ .Alerts.Firing | len }}`,
      num_resolved: `{{ .Alerts.Resolved | len }}`,
    },
  },
});

export const DEFAULT_SLACK_CONFIG: ReceiverDefaults<SlackFields> = deepFreeze({
  sendResolved: false,
  fields: {
    apiUrl: Secret.empty(),
    channel: "",
    username: `{{ template "slack.default.username" . }}`,
    color: `{{ template "slack.default.color" }}`,
    title: `{{ template "slack.default.title" . }}`,
    titleLink: `{{ template "slack.default.titlelink" . }}`,
    pretext: `{{ template "slack.default.pretext" . }}`,
    text: `{{ template "slack.default.text" . }}`,
    fallback: `{{ template "slack.default.fallback" . }}`,
    iconEmoji: `{{ template "slack.default.iconemoji" . }}`,
    iconUrl: `{{ template "slack.default.iconurl" . }}`,
  },
});

export const DEFAULT_HIPCHAT_CONFIG: ReceiverDefaults<HipchatFields> = deepFreeze({
  sendResolved: false,
  fields: {
    apiUrl: "",
    authToken: Secret.empty(),
    roomId: "",
    from: `{{ template "hipchat.default.from" . }}`,
    notify: false,
    message: `{{ template "hipchat.default.message" . }}`,
    messageFormat: "text",
    color: `{{ if eq .Status "firing" }}red{{ else }}green{{ end }}`,
  },
});

export const DEFAULT_WEBHOOK_CONFIG: ReceiverDefaults<WebhookFields> = deepFreeze({
  sendResolved: true,
  fields: {
    url: "",
  },
});

export const DEFAULT_OPSGENIE_CONFIG: ReceiverDefaults<OpsGenieFields> = deepFreeze({
  sendResolved: true,
  fields: {
    apiKey: Secret.empty(),
    apiHost: "",
    message: `{{ template "opsgenie.default.message" . }}`,
    description: `{{ template "opsgenie.default.description" . }}`,
    source: `{{ template "opsgenie.default.source" . }}`,
    details: {},
    teams: "",
    tags: "",
    note: "",
  },
});

export const DEFAULT_VICTOROPS_CONFIG: ReceiverDefaults<VictorOpsFields> = deepFreeze({
  sendResolved: true,
  fields: {
    apiKey: Secret.empty(),
    apiUrl: "",
    routingKey: "",
    messageType: "CRITICAL",
    message: `{{ template "victorops.default.message" . }}`,
    from: `{{ template "victorops.default.from" . }}`,
  },
});

export const DEFAULT_PUSHOVER_CONFIG: ReceiverDefaults<PushoverFields> = deepFreeze({
  sendResolved: true,
  fields: {
    userKey: Secret.empty(),
    token: Secret.empty(),
    title: `{{ template "pushover.default.title" . }}`,
    message: `{{ template "pushover.default.message" . }}`,
    url: `{{ template "pushover.default.url" . }}`,
    // Emergency while firing, normal once resolved.
    priority: `{{ if eq .Status "firing" }}2{{ else }}0{{ end }}`,
    retry: Duration.parse("1m"),
    expire: Duration.parse("1h"),
  },
});

export type ReceiverDefaultsMap = {
  readonly [T in ReceiverType]: ReceiverDefaults<ReceiverFieldsMap[T]>;
};

export const RECEIVER_DEFAULTS: ReceiverDefaultsMap = Object.freeze({
  email: DEFAULT_EMAIL_CONFIG,
  pagerduty: DEFAULT_PAGERDUTY_CONFIG,
  slack: DEFAULT_SLACK_CONFIG,
  hipchat: DEFAULT_HIPCHAT_CONFIG,
  webhook: DEFAULT_WEBHOOK_CONFIG,
  opsgenie: DEFAULT_OPSGENIE_CONFIG,
  victorops: DEFAULT_VICTOROPS_CONFIG,
  pushover: DEFAULT_PUSHOVER_CONFIG,
});

/** Frozen defaults every decode of `type` starts from. */
export function getDefaults<T extends ReceiverType>(type: T): ReceiverDefaults<ReceiverFieldsMap[T]> {
  return RECEIVER_DEFAULTS[type];
}
