/**
 * Opaque vendor credential.
 *
 * The token lives in a private field; every serialisation path
 * (JSON, string, util.inspect) yields a masked form.
 */

const MASK = "********";

export class Credential {
  readonly #token: string;
  /** Expiry instant, epoch milliseconds. */
  readonly expiresAt: number;
  /** Where the credential came from, e.g. "google-service-account". */
  readonly source: string;

  constructor(token: string, expiresAt: number, source: string) {
    if (token.length === 0) {
      throw new TypeError("Credential token cannot be empty");
    }
    this.#token = token;
    this.expiresAt = expiresAt;
    this.source = source;
  }

  isExpired(now: number = Date.now()): boolean {
    return now >= this.expiresAt;
  }

  /** True when the credential expires within `ms` from `now`. */
  expiresWithin(ms: number, now: number = Date.now()): boolean {
    return now + ms >= this.expiresAt;
  }

  /** Value for an `Authorization` header. */
  bearer(): string {
    return `Bearer ${this.#token}`;
  }

  /** The raw token, for vendors that read it from their own header. */
  secret(): string {
    return this.#token;
  }

  toJSON(): Record<string, string> {
    return {
      source: this.source,
      expiresAt: new Date(this.expiresAt).toISOString(),
      token: MASK,
    };
  }

  toString(): string {
    return `Credential(${this.source})`;
  }

  [Symbol.for("nodejs.util.inspect.custom")](): string {
    return this.toString();
  }
}
