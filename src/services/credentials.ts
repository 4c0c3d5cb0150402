import { inspect } from 'node:util';

const REDACTED = '[credential]';

/**
 * Opaque provider credential.
 *
 * Passed explicitly through every generation call and never stored on a
 * Project. Serialization, string conversion and `util.inspect` all render a
 * placeholder; only provider adapters call `reveal()`.
 */
export class CredentialHandle {
  readonly #secret: string;

  private constructor(secret: string) {
    this.#secret = secret;
  }

  static from(secret: string): CredentialHandle {
    return new CredentialHandle(secret.trim());
  }

  get isEmpty(): boolean {
    return this.#secret.length === 0;
  }

  reveal(): string {
    return this.#secret;
  }

  /**
   * Remove the secret (and any long suffix of it a provider echoed back) from text.
   */
  scrub(text: string): string {
    if (!this.#secret) return text;
    let cleaned = text.split(this.#secret).join(REDACTED);
    const tail = this.#secret.slice(-4);
    if (tail.length === 4 && this.#secret.length >= 12) {
      cleaned = cleaned.replace(new RegExp(`\\S*\\*+\\S*${escapeRegExp(tail)}`, 'g'), REDACTED);
    }
    return cleaned;
  }

  toString(): string {
    return REDACTED;
  }

  toJSON(): string {
    return REDACTED;
  }

  [inspect.custom](): string {
    return REDACTED;
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Per-call session: the credential plus an optional cancellation signal.
 */
export type GenerationSession = {
  credential: CredentialHandle;
  signal?: AbortSignal;
};
