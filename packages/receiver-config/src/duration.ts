const NANOSECOND = 1n;
const MICROSECOND = 1_000n * NANOSECOND;
const MILLISECOND = 1_000n * MICROSECOND;
const SECOND = 1_000n * MILLISECOND;
const MINUTE = 60n * SECOND;
const HOUR = 60n * MINUTE;

// Signed 64-bit nanosecond range.
const MAX_NANOSECONDS = 2n ** 63n - 1n;

const UNIT_SCALE: Readonly<Record<string, bigint>> = {
  ns: NANOSECOND,
  us: MICROSECOND,
  "µs": MICROSECOND,
  "μs": MICROSECOND,
  ms: MILLISECOND,
  s: SECOND,
  m: MINUTE,
  h: HOUR,
};

const FORMAT_UNITS: ReadonlyArray<readonly [string, bigint]> = [
  ["h", HOUR],
  ["m", MINUTE],
  ["s", SECOND],
  ["ms", MILLISECOND],
  ["us", MICROSECOND],
  ["ns", NANOSECOND],
];

const MAGNITUDE_PATTERN = /^(\d*)(?:\.(\d*))?/;
const UNIT_PATTERN = /^[^\d.]+/;

export class InvalidDurationError extends Error {
  readonly input: string;

  constructor(message: string, input: string) {
    super(message);
    this.name = "InvalidDurationError";
    this.input = input;
  }
}

/**
 * A signed time span with nanosecond resolution.
 *
 * Text form is a sequence of `<number><unit>` pairs such as `1h30m` or
 * `1.5s`; see {@link Duration.parse}. {@link Duration.format} renders the
 * canonical form, so `90s` formats as `1m30s`.
 */
export class Duration {
  readonly nanoseconds: bigint;

  constructor(nanoseconds: bigint) {
    if (nanoseconds > MAX_NANOSECONDS || nanoseconds < -MAX_NANOSECONDS - 1n) {
      throw new RangeError(`duration of ${nanoseconds}ns is out of range`);
    }
    this.nanoseconds = nanoseconds;
    Object.freeze(this);
  }

  static readonly ZERO = new Duration(0n);

  static parse(text: string): Duration {
    return new Duration(parseNanoseconds(text));
  }

  static fromMilliseconds(milliseconds: number): Duration {
    if (!Number.isFinite(milliseconds)) {
      throw new RangeError(`duration of ${milliseconds}ms is out of range`);
    }
    return new Duration(BigInt(Math.round(milliseconds * 1_000_000)));
  }

  /** Whole milliseconds, truncated toward zero. */
  get milliseconds(): number {
    return Number(this.nanoseconds / MILLISECOND);
  }

  equals(other: Duration): boolean {
    return this.nanoseconds === other.nanoseconds;
  }

  format(): string {
    if (this.nanoseconds === 0n) {
      return "0s";
    }
    let remaining = this.nanoseconds < 0n ? -this.nanoseconds : this.nanoseconds;
    let text = this.nanoseconds < 0n ? "-" : "";
    for (const [unit, scale] of FORMAT_UNITS) {
      const count = remaining / scale;
      if (count > 0n) {
        text += `${count}${unit}`;
        remaining -= count * scale;
      }
    }
    return text;
  }

  toString(): string {
    return this.format();
  }

  toJSON(): string {
    return this.format();
  }
}

export function parseDuration(text: string): Duration {
  return Duration.parse(text);
}

function parseNanoseconds(input: string): bigint {
  let rest = input;
  let negative = false;
  if (rest.startsWith("-") || rest.startsWith("+")) {
    negative = rest.startsWith("-");
    rest = rest.slice(1);
  }
  if (rest === "0") {
    return 0n;
  }
  if (rest === "") {
    throw new InvalidDurationError(`invalid duration ${JSON.stringify(input)}`, input);
  }

  let total = 0n;
  while (rest !== "") {
    const magnitude = MAGNITUDE_PATTERN.exec(rest);
    const whole = magnitude?.[1] ?? "";
    const fraction = magnitude?.[2];
    if (whole === "" && (fraction === undefined || fraction === "")) {
      throw new InvalidDurationError(`invalid duration ${JSON.stringify(input)}`, input);
    }
    rest = rest.slice(magnitude?.[0].length ?? 0);

    const unitMatch = UNIT_PATTERN.exec(rest);
    if (!unitMatch) {
      throw new InvalidDurationError(`missing unit in duration ${JSON.stringify(input)}`, input);
    }
    const unit = unitMatch[0];
    const scale = UNIT_SCALE[unit];
    if (scale === undefined) {
      throw new InvalidDurationError(
        `unknown unit ${JSON.stringify(unit)} in duration ${JSON.stringify(input)}`,
        input,
      );
    }
    rest = rest.slice(unit.length);

    total += BigInt(whole === "" ? "0" : whole) * scale;
    if (fraction !== undefined && fraction !== "") {
      total += (BigInt(fraction) * scale) / 10n ** BigInt(fraction.length);
    }
    if (total > MAX_NANOSECONDS + (negative ? 1n : 0n)) {
      throw new InvalidDurationError(`invalid duration ${JSON.stringify(input)}`, input);
    }
  }
  return negative ? -total : total;
}
