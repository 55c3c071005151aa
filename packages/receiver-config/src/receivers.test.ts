import { describe, expect, it } from "vitest";

import type { ReceiverConfig } from "./decode.js";
import {
  DEFAULT_EMAIL_CONFIG,
  DEFAULT_HIPCHAT_CONFIG,
  DEFAULT_OPSGENIE_CONFIG,
  DEFAULT_PAGERDUTY_CONFIG,
  DEFAULT_PUSHOVER_CONFIG,
  DEFAULT_SLACK_CONFIG,
  DEFAULT_VICTOROPS_CONFIG,
  DEFAULT_EMAIL_SUBJECT,
  DEFAULT_WEBHOOK_CONFIG,
  RECEIVER_DEFAULTS,
  type ReceiverDefaults,
  getDefaults,
} from "./defaults.js";
import { Duration } from "./duration.js";
import {
  DuplicateHeaderError,
  MalformedValueError,
  MissingFieldError,
  UnknownFieldError,
} from "./errors.js";
import { toExternalName } from "./fields.js";
import {
  canonicalHeaderName,
  decodeEmailConfig,
  decodeHipchatConfig,
  decodeOpsGenieConfig,
  decodePagerdutyConfig,
  decodePushoverConfig,
  decodeSlackConfig,
  decodeVictorOpsConfig,
  decodeWebhookConfig,
} from "./receivers.js";
import { RECEIVER_TYPES, type ReceiverType } from "./schemas.js";
import { Secret } from "./secret.js";

type ReceiverCase = {
  type: ReceiverType;
  label: string;
  decode: (raw: unknown) => ReceiverConfig;
  defaults: ReceiverDefaults<object>;
  required: Record<string, string>;
  missing: Array<{ field: string; message: string }>;
};

const cases: ReceiverCase[] = [
  {
    type: "email",
    label: "email config",
    decode: decodeEmailConfig,
    defaults: DEFAULT_EMAIL_CONFIG,
    required: { to: "ops@example.com" },
    missing: [{ field: "to", message: "missing to address in email config" }],
  },
  {
    type: "pagerduty",
    label: "pagerduty config",
    decode: decodePagerdutyConfig,
    defaults: DEFAULT_PAGERDUTY_CONFIG,
    required: { service_key: "test-service-key" },
    missing: [{ field: "service_key", message: "missing service key in PagerDuty config" }],
  },
  {
    type: "slack",
    label: "slack config",
    decode: decodeSlackConfig,
    defaults: DEFAULT_SLACK_CONFIG,
    required: {},
    missing: [],
  },
  {
    type: "hipchat",
    label: "hipchat config",
    decode: decodeHipchatConfig,
    defaults: DEFAULT_HIPCHAT_CONFIG,
    required: { room_id: "42" },
    missing: [{ field: "room_id", message: "missing room id in Hipchat config" }],
  },
  {
    type: "webhook",
    label: "webhook config",
    decode: decodeWebhookConfig,
    defaults: DEFAULT_WEBHOOK_CONFIG,
    required: { url: "http://localhost:9000/hook" },
    missing: [{ field: "url", message: "missing URL in webhook config" }],
  },
  {
    type: "opsgenie",
    label: "opsgenie config",
    decode: decodeOpsGenieConfig,
    defaults: DEFAULT_OPSGENIE_CONFIG,
    required: { api_key: "test-api-key" },
    missing: [{ field: "api_key", message: "missing API key in OpsGenie config" }],
  },
  {
    type: "victorops",
    label: "victorops config",
    decode: decodeVictorOpsConfig,
    defaults: DEFAULT_VICTOROPS_CONFIG,
    required: { api_key: "test-api-key", routing_key: "ops" },
    missing: [
      { field: "api_key", message: "missing API key in VictorOps config" },
      { field: "routing_key", message: "missing Routing key in VictorOps config" },
    ],
  },
  {
    type: "pushover",
    label: "pushover config",
    decode: decodePushoverConfig,
    defaults: DEFAULT_PUSHOVER_CONFIG,
    required: { user_key: "test-user-key", token: "test-token" },
    missing: [
      { field: "user_key", message: "missing user key in Pushover config" },
      { field: "token", message: "missing token in Pushover config" },
    ],
  },
];

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected the call to throw");
}

function without(document: Record<string, string>, key: string): Record<string, string> {
  return Object.fromEntries(Object.entries(document).filter(([name]) => name !== key));
}

describe.each(cases)("$type receiver", ({ type, label, decode, defaults, required, missing }) => {
  it("decodes the required fields onto the defaults", () => {
    const config = decode(required);
    const fields = new Map<string, unknown>(Object.entries(config.fields));

    expect(config.type).toBe(type);
    expect(config.sendResolved()).toBe(defaults.sendResolved);
    expect([...fields.keys()]).toEqual(Object.keys(defaults.fields));

    for (const [key, defaultValue] of Object.entries(defaults.fields)) {
      const actual = fields.get(key);
      const supplied = required[toExternalName(key)];
      if (supplied !== undefined) {
        expect(actual instanceof Secret ? actual.reveal() : actual).toBe(supplied);
      } else if (defaultValue instanceof Secret) {
        expect(actual instanceof Secret && actual.equals(defaultValue)).toBe(true);
      } else {
        expect(actual).toEqual(defaultValue);
      }
    }
  });

  it("is seeded from the defaults registry", () => {
    expect(getDefaults(type)).toBe(defaults);
    expect(decode(required).descriptor.type).toBe(type);
  });

  it("rejects unrecognized keys", () => {
    const error = captureError(() => decode({ ...required, unexpected_key: "value", another: 1 }));

    expect(error).toBeInstanceOf(UnknownFieldError);
    expect(error).toMatchObject({
      receiverType: type,
      keys: ["another", "unexpected_key"],
      message: `unknown fields in ${label}: another, unexpected_key`,
    });
  });

  it("rejects internal field names", () => {
    expect(() => decode({ ...required, sendResolved: true })).toThrowError(UnknownFieldError);
  });

  it("takes send_resolved from the document", () => {
    expect(decode({ ...required, send_resolved: !defaults.sendResolved }).sendResolved()).toBe(
      !defaults.sendResolved,
    );
  });

  it("returns a frozen config", () => {
    const config = decode(required);

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.fields)).toBe(true);
    expect(Object.isFrozen(config.notifier)).toBe(true);
  });

  if (missing.length > 0) {
    it.each(missing)("requires $field", ({ field, message }) => {
      const error = captureError(() => decode(without(required, field)));

      expect(error).toBeInstanceOf(MissingFieldError);
      expect(error).toMatchObject({ receiverType: type, field, message });
    });

    it.each(missing)("treats an empty $field as missing", ({ field }) => {
      expect(() => decode({ ...required, [field]: "" })).toThrowError(MissingFieldError);
    });
  }
});

describe("defaults registry", () => {
  it("holds one frozen entry per receiver type", () => {
    expect(Object.keys(RECEIVER_DEFAULTS)).toEqual([...RECEIVER_TYPES]);
    expect(Object.isFrozen(RECEIVER_DEFAULTS)).toBe(true);
    for (const type of RECEIVER_TYPES) {
      expect(Object.isFrozen(getDefaults(type).fields)).toBe(true);
    }
  });

  it("covers every receiver type with a decoder", () => {
    expect(cases.map((receiverCase) => receiverCase.type)).toEqual([...RECEIVER_TYPES]);
  });

  it("exports the default email subject template", () => {
    expect(DEFAULT_EMAIL_SUBJECT).toBe('{{ template "email.default.subject" . }}');
  });
});

describe("decode pipeline", () => {
  it("treats an empty node as an empty mapping", () => {
    expect(decodeSlackConfig(null).fields.title).toBe(DEFAULT_SLACK_CONFIG.fields.title);
    expect(decodeSlackConfig(undefined).sendResolved()).toBe(false);
  });

  it("rejects nodes that are not mappings", () => {
    const error = captureError(() => decodeWebhookConfig("http://localhost:9000/hook"));

    expect(error).toBeInstanceOf(MalformedValueError);
    expect(error).toMatchObject({ receiverType: "webhook", message: "webhook config must be a mapping" });
    expect(() => decodeWebhookConfig([{ url: "http://localhost:9000/hook" }])).toThrowError(
      "webhook config must be a mapping",
    );
  });

  it("reports missing required fields before unknown keys", () => {
    expect(() => decodeEmailConfig({ typo: "x" })).toThrowError(MissingFieldError);
  });

  it("replaces maps instead of merging them", () => {
    const config = decodePagerdutyConfig({ service_key: "test-service-key", details: { team: "db" } });

    expect(config.fields.details).toEqual({ team: "db" });
  });

  it("does not let one decode leak into the next", () => {
    const first = decodePagerdutyConfig({
      service_key: "first-key",
      client: "first-client",
      details: { team: "db" },
    });
    const second = decodePagerdutyConfig({ service_key: "second-key" });

    expect(first.fields.client).toBe("first-client");
    expect(second.fields.client).toBe(DEFAULT_PAGERDUTY_CONFIG.fields.client);
    expect(second.fields.details).toEqual(DEFAULT_PAGERDUTY_CONFIG.fields.details);
    expect(second.fields.details).not.toBe(DEFAULT_PAGERDUTY_CONFIG.fields.details);
    expect(second.fields.serviceKey.reveal()).toBe("second-key");
    expect(Reflect.set(second.fields.details, "team", "mutated")).toBe(false);
    expect(Object.isFrozen(DEFAULT_PAGERDUTY_CONFIG.fields.details)).toBe(true);
  });

  it("resets fields given an explicit null", () => {
    expect(decodeSlackConfig({ title: null }).fields.title).toBe("");
    expect(decodeHipchatConfig({ room_id: "42", notify: null }).fields.notify).toBe(false);
    expect(decodePagerdutyConfig({ service_key: "k", details: null }).fields.details).toEqual({});
    expect(decodePushoverConfig({ user_key: "u", token: "t", retry: null }).fields.retry.format()).toBe("0s");
    expect(decodeSlackConfig({ api_url: null }).fields.apiUrl.isEmpty()).toBe(true);
  });

  it("renders scalar values of text fields as strings", () => {
    const config = decodeHipchatConfig({ room_id: 12345, from: true, color: 1.5 });

    expect(config.fields.roomId).toBe("12345");
    expect(config.fields.from).toBe("true");
    expect(config.fields.color).toBe("1.5");
    expect(decodeOpsGenieConfig({ api_key: 42, details: { count: 3 } }).fields.details).toEqual({ count: "3" });
  });

  it("rejects values of the wrong kind", () => {
    const error = captureError(() => decodeHipchatConfig({ room_id: "42", notify: "yes" }));

    expect(error).toBeInstanceOf(MalformedValueError);
    expect(error).toMatchObject({
      receiverType: "hipchat",
      field: "notify",
      message: "invalid value for notify in hipchat config: expected a boolean",
      issues: [{ path: "notify", message: "expected a boolean" }],
    });
  });

  it("names nested map entries in malformed value errors", () => {
    const error = captureError(() => decodeEmailConfig({ to: "ops@example.com", headers: { "X-Team": { id: 1 } } }));

    expect(error).toMatchObject({
      field: "headers",
      message: "invalid value for headers.X-Team in email config: expected a string",
    });
  });

  it("rejects a list where a mapping field is declared", () => {
    expect(() => decodePagerdutyConfig({ service_key: "k", details: ["a"] })).toThrowError(
      "invalid value for details in pagerduty config: expected a mapping of strings",
    );
  });

  it("rejects a non-boolean send_resolved", () => {
    const error = captureError(() => decodeWebhookConfig({ url: "http://localhost:9000/hook", send_resolved: "true" }));

    expect(error).toBeInstanceOf(MalformedValueError);
    expect(error).toMatchObject({ field: "send_resolved" });
  });
});

describe("email config", () => {
  const to = "ops@example.com";

  it("canonicalizes header names", () => {
    const config = decodeEmailConfig({ to, headers: { "X-Foo": "a" } });

    expect(config.fields.headers).toEqual({ "X-Foo": "a" });
  });

  it("rejects headers that only differ in case", () => {
    const error = captureError(() => decodeEmailConfig({ to, headers: { "X-Foo": "a", "x-foo": "b" } }));

    expect(error).toBeInstanceOf(DuplicateHeaderError);
    expect(error).toMatchObject({
      receiverType: "email",
      header: "X-Foo",
      message: 'duplicate header "X-Foo" in email config',
    });
  });

  it("rejects non-ASCII headers that collide once folded", () => {
    const error = captureError(() => decodeEmailConfig({ to, headers: { ÜBER: "a", über: "b" } }));

    expect(error).toBeInstanceOf(DuplicateHeaderError);
    expect(error).toMatchObject({ header: "Über", message: 'duplicate header "Über" in email config' });
  });

  it("keeps a __proto__ header as an ordinary entry", () => {
    const config = decodeEmailConfig(JSON.parse('{"to":"ops@example.com","headers":{"__proto__":"x"}}'));

    expect(Object.entries(config.fields.headers)).toEqual([["__proto__", "x"]]);
    expect(Object.getPrototypeOf(config.fields.headers)).toBe(Object.prototype);
  });

  it("folds every word of a header name", () => {
    const config = decodeEmailConfig({ to, headers: { "content-TYPE": "text/plain", subject: "Disk full" } });

    expect(config.fields.headers).toEqual({ "Content-Type": "text/plain", Subject: "Disk full" });
  });

  it("does not share headers between decodes", () => {
    decodeEmailConfig({ to, headers: { "X-First": "1" } });
    const second = decodeEmailConfig({ to });

    expect(second.fields.headers).toEqual({});
  });

  it("leaves require_tls unset unless given", () => {
    expect(decodeEmailConfig({ to }).fields.requireTls).toBeUndefined();
    expect(decodeEmailConfig({ to, require_tls: false }).fields.requireTls).toBe(false);
    expect(decodeEmailConfig({ to, require_tls: null }).fields.requireTls).toBeUndefined();
  });

  it("keeps credentials as secrets", () => {
    const config = decodeEmailConfig({ to, auth_username: "alerts", auth_password: "test-password" });

    expect(config.fields.authPassword).toBeInstanceOf(Secret);
    expect(config.fields.authPassword.reveal()).toBe("test-password");
    expect(config.fields.authSecret.isEmpty()).toBe(true);
  });
});

describe("map fields", () => {
  it("keep a __proto__ key as an ordinary entry", () => {
    const config = decodePagerdutyConfig(
      JSON.parse('{"service_key":"test-service-key","details":{"__proto__":"x","team":"db"}}'),
    );

    expect(Object.entries(config.fields.details)).toEqual([
      ["__proto__", "x"],
      ["team", "db"],
    ]);
    expect(Object.getPrototypeOf(config.fields.details)).toBe(Object.prototype);
  });
});

describe("canonicalHeaderName", () => {
  it("uppercases the first character of each alphanumeric run", () => {
    expect(canonicalHeaderName("x-foo")).toBe("X-Foo");
    expect(canonicalHeaderName("X-FOO")).toBe("X-Foo");
    expect(canonicalHeaderName("x_custom-id")).toBe("X_custom-Id");
    expect(canonicalHeaderName("reply to")).toBe("Reply To");
  });

  it("folds non-ASCII letters", () => {
    expect(canonicalHeaderName("ÜBER-ÉTAT")).toBe("Über-État");
  });
});

describe("pushover config", () => {
  const credentials = { user_key: "test-user-key", token: "test-token" };

  it("defaults retry to one minute and expire to one hour", () => {
    const config = decodePushoverConfig(credentials);

    expect(config.fields.retry.equals(Duration.parse("1m"))).toBe(true);
    expect(config.fields.expire.equals(Duration.parse("1h"))).toBe(true);
  });

  it("parses duration fields", () => {
    const config = decodePushoverConfig({ ...credentials, retry: "90s", expire: "2h30m" });

    expect(config.fields.retry.format()).toBe("1m30s");
    expect(config.fields.expire.milliseconds).toBe(9_000_000);
  });

  it("rejects malformed durations", () => {
    const error = captureError(() => decodePushoverConfig({ ...credentials, retry: "5 minutes" }));

    expect(error).toBeInstanceOf(MalformedValueError);
    expect(error).toMatchObject({
      receiverType: "pushover",
      field: "retry",
      message: 'invalid value for retry in pushover config: unknown unit " minutes" in duration "5 minutes"',
    });
  });

  it("rejects numeric durations", () => {
    expect(() => decodePushoverConfig({ ...credentials, expire: 60 })).toThrowError(
      "invalid value for expire in pushover config: expected a duration string such as 1m or 1h30m",
    );
  });
});
