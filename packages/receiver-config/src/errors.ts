export type ValidationIssue = {
  path: string;
  message: string;
};

/**
 * Base class for every failure raised while decoding a single receiver
 * configuration. Messages name fields and keys, never their values.
 */
export class ReceiverConfigError extends Error {
  readonly receiverType: string;

  constructor(message: string, receiverType: string) {
    super(message);
    this.name = "ReceiverConfigError";
    this.receiverType = receiverType;
  }
}

/** A declared field (or the node itself) holds a value of the wrong shape. */
export class MalformedValueError extends ReceiverConfigError {
  readonly field?: string;
  readonly issues: ValidationIssue[];

  constructor(message: string, options: { receiverType: string; field?: string; issues?: ValidationIssue[] }) {
    super(message, options.receiverType);
    this.name = "MalformedValueError";
    this.field = options.field;
    this.issues = options.issues ?? [];
  }
}

export class MissingFieldError extends ReceiverConfigError {
  readonly field: string;

  constructor(message: string, options: { receiverType: string; field: string }) {
    super(message, options.receiverType);
    this.name = "MissingFieldError";
    this.field = options.field;
  }
}

export class UnknownFieldError extends ReceiverConfigError {
  readonly keys: string[];

  constructor(label: string, options: { receiverType: string; keys: string[] }) {
    super(`unknown fields in ${label}: ${options.keys.join(", ")}`, options.receiverType);
    this.name = "UnknownFieldError";
    this.keys = options.keys;
  }
}

export class DuplicateHeaderError extends ReceiverConfigError {
  readonly header: string;

  constructor(header: string, options: { receiverType: string; label: string }) {
    super(`duplicate header ${JSON.stringify(header)} in ${options.label}`, options.receiverType);
    this.name = "DuplicateHeaderError";
    this.header = header;
  }
}

export class DuplicateReceiverError extends ReceiverConfigError {
  readonly receiverName: string;

  constructor(receiverName: string) {
    super(`notification config name ${JSON.stringify(receiverName)} is not unique`, "receiver");
    this.name = "DuplicateReceiverError";
    this.receiverName = receiverName;
  }
}

export type ReceiverLoadFailure = {
  /** Receiver name, or `<unnamed>` when the node had none. */
  receiver: string;
  /** Location inside the loaded document, e.g. `receivers[1].email_configs[0]`. */
  path: string;
  error: ReceiverConfigError;
};

/** Every failure found while loading a receivers document. */
export class ReceiverLoadError extends ReceiverConfigError {
  readonly errors: ReceiverLoadFailure[];

  constructor(errors: ReceiverLoadFailure[]) {
    const summary = errors.map((failure) => `${failure.path}: ${failure.error.message}`).join("; ");
    super(`failed to load receivers: ${summary}`, "receiver");
    this.name = "ReceiverLoadError";
    this.errors = errors;
  }
}
