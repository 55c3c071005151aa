import { z } from "zod";

import { type ReceiverDefaults, deepFreeze, getDefaults } from "./defaults.js";
import { MalformedValueError, UnknownFieldError, type ValidationIssue } from "./errors.js";
import { field, isMapping, toExternalName, toInternalName } from "./fields.js";
import { type Notifier, type NotifierConfig, SEND_RESOLVED_FIELD } from "./notifier.js";
import type { ReceiverFieldsMap, ReceiverType } from "./schemas.js";
import { type ReceiverDocument, toDocument } from "./serialize.js";

/** What a decoded config needs to know about the schema it came from. */
export interface ReceiverDescriptor<T extends ReceiverType = ReceiverType> {
  readonly type: T;
  /** Human readable name used in error messages, e.g. `email config`. */
  readonly label: string;
  /** Internal field names left out of the serialized form while empty. */
  readonly omitEmpty: ReadonlySet<string>;
}

export interface ReceiverSchema<T extends ReceiverType, F extends object> extends ReceiverDescriptor<T> {
  readonly fields: z.ZodType<F, z.ZodTypeDef, unknown>;
  /** Internal names of the declared fields. */
  readonly keys: ReadonlySet<string>;
  readonly defaults: ReceiverDefaults<F>;
  normalize(fields: F): F;
  validate(fields: F): void;
}

type ReceiverDefinition<T extends ReceiverType, F extends object = ReceiverFieldsMap[T]> = {
  type: T;
  label: string;
  fields: z.ZodType<F, z.ZodTypeDef, unknown> & { readonly shape: z.ZodRawShape };
  omitEmpty?: ReadonlyArray<keyof F & string>;
  normalize?: (fields: F, schema: ReceiverDescriptor<T>) => F;
  validate?: (fields: F, schema: ReceiverDescriptor<T>) => void;
};

/** Builds a receiver schema seeded from the type's entry in the defaults registry. */
export function defineReceiver<T extends ReceiverType>(
  definition: ReceiverDefinition<T>,
): ReceiverSchema<T, ReceiverFieldsMap[T]> {
  const { normalize, validate } = definition;
  const schema: ReceiverSchema<T, ReceiverFieldsMap[T]> = {
    type: definition.type,
    label: definition.label,
    omitEmpty: new Set<string>(definition.omitEmpty ?? []),
    fields: definition.fields,
    keys: new Set(Object.keys(definition.fields.shape)),
    defaults: getDefaults(definition.type),
    normalize: (fields) => (normalize ? normalize(fields, schema) : fields),
    validate: (fields) => validate?.(fields, schema),
  };
  return schema;
}

/**
 * A validated, immutable receiver configuration. The resolved-notification
 * flag is held separately from the type-specific fields and exposed through
 * {@link Notifier.sendResolved}.
 */
export class ReceiverConfig<T extends ReceiverType = ReceiverType, F extends object = object> implements Notifier {
  readonly type: T;
  readonly descriptor: ReceiverDescriptor<T>;
  readonly notifier: NotifierConfig;
  readonly fields: Readonly<F>;

  constructor(descriptor: ReceiverDescriptor<T>, notifier: NotifierConfig, fields: F) {
    this.type = descriptor.type;
    this.descriptor = descriptor;
    this.notifier = deepFreeze({ ...notifier });
    this.fields = deepFreeze(fields);
    Object.freeze(this);
  }

  sendResolved(): boolean {
    return this.notifier.sendResolved;
  }

  toJSON(): ReceiverDocument {
    return toDocument(this);
  }
}

function documentEntries(raw: unknown, label: string, receiverType: string): Array<[string, unknown]> {
  // An empty YAML node decodes to null; it carries no fields.
  if (raw === null || raw === undefined) {
    return [];
  }
  if (!isMapping(raw)) {
    throw new MalformedValueError(`${label} must be a mapping`, { receiverType });
  }
  return Object.entries(raw);
}

function toValidationIssues(issues: z.ZodIssue[]): ValidationIssue[] {
  return issues.map((issue) => {
    const [head, ...rest] = issue.path;
    const path = [typeof head === "string" ? toExternalName(head) : head, ...rest];
    return { path: path.join("."), message: issue.message };
  });
}

/**
 * Decodes one raw receiver node onto a copy of the schema's defaults.
 *
 * Fields present in `raw` replace the default value outright. The type's
 * normalization and required-field hooks run next, and any key that is not a
 * declared field fails the decode with {@link UnknownFieldError}.
 *
 * @throws MalformedValueError when a value cannot be converted to its field's kind
 * @throws MissingFieldError when the type's required fields are empty
 * @throws UnknownFieldError when undeclared keys are present
 */
export function decodeReceiverConfig<T extends ReceiverType, F extends object>(
  schema: ReceiverSchema<T, F>,
  raw: unknown,
): ReceiverConfig<T, F> {
  const present: Record<string, unknown> = {};
  const unknownKeys: string[] = [];
  let sendResolved = schema.defaults.sendResolved;

  for (const [key, value] of documentEntries(raw, schema.label, schema.type)) {
    if (key === SEND_RESOLVED_FIELD) {
      const parsed = field.bool.safeParse(value);
      if (!parsed.success) {
        throw new MalformedValueError(`invalid value for ${key} in ${schema.label}: expected a boolean`, {
          receiverType: schema.type,
          field: key,
          issues: [{ path: key, message: "expected a boolean" }],
        });
      }
      sendResolved = parsed.data;
      continue;
    }
    const internal = toInternalName(key);
    if (schema.keys.has(internal) && toExternalName(internal) === key) {
      present[internal] = value;
    } else {
      unknownKeys.push(key);
    }
  }

  const parsed = schema.fields.safeParse({ ...schema.defaults.fields, ...present });
  if (!parsed.success) {
    const issues = toValidationIssues(parsed.error.issues);
    const first = issues[0];
    const fieldName = first?.path.split(".")[0];
    throw new MalformedValueError(
      first
        ? `invalid value for ${first.path} in ${schema.label}: ${first.message}`
        : `invalid ${schema.label}`,
      { receiverType: schema.type, field: fieldName, issues },
    );
  }

  const fields = schema.normalize(parsed.data);
  schema.validate(fields);

  if (unknownKeys.length > 0) {
    throw new UnknownFieldError(schema.label, { receiverType: schema.type, keys: unknownKeys.sort() });
  }

  return new ReceiverConfig(schema, { sendResolved }, fields);
}
