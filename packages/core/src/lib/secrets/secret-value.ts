import { inspect } from "node:util";

const MASK = "**********";

/**
 * Plaintext secret that masks itself everywhere except {@link SecretValue.reveal}.
 *
 * String conversion, JSON serialization and `util.inspect` (and so pino and
 * `console.log`) all render the mask.
 */
export class SecretValue {
  readonly #plaintext: string;

  constructor(plaintext: string) {
    this.#plaintext = plaintext;
  }

  reveal(): string {
    return this.#plaintext;
  }

  toString(): string {
    return MASK;
  }

  toJSON(): string {
    return MASK;
  }

  [inspect.custom](): string {
    return `SecretValue(${MASK})`;
  }
}

export function secretValue(plaintext: string | null | undefined): SecretValue | undefined {
  return typeof plaintext === "string" ? new SecretValue(plaintext) : undefined;
}

// An empty plaintext counts as unset.
export function isSet(value: SecretValue | undefined): value is SecretValue {
  return value !== undefined && value.reveal() !== "";
}

export function revealOrNull(value: SecretValue | undefined): string | null {
  return value === undefined ? null : value.reveal();
}
