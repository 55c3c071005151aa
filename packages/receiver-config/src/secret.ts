import { inspect } from "node:util";

/** Placeholder emitted wherever a secret would otherwise be rendered. */
export const SECRET_PLACEHOLDER = "<secret>";

/**
 * Wraps credentials (API keys, passwords, tokens) read from receiver
 * configuration. Every textual rendering yields {@link SECRET_PLACEHOLDER};
 * the underlying text is only reachable through {@link Secret.reveal}.
 */
export class Secret {
  readonly #value: string;

  constructor(value: string) {
    this.#value = value;
    Object.freeze(this);
  }

  static empty(): Secret {
    return new Secret("");
  }

  isEmpty(): boolean {
    return this.#value.length === 0;
  }

  equals(other: Secret): boolean {
    return this.#value === other.#value;
  }

  /** Returns the raw value. Only delivery code should call this. */
  reveal(): string {
    return this.#value;
  }

  toString(): string {
    return SECRET_PLACEHOLDER;
  }

  toJSON(): string {
    return SECRET_PLACEHOLDER;
  }

  [inspect.custom](): string {
    return SECRET_PLACEHOLDER;
  }
}
