/**
 * Credential value that renders as `[REDACTED]` in strings, JSON and
 * `util.inspect` output, so logged contexts never carry the secret.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * The raw value. Only signing and request headers should call this.
   */
  expose(): string {
    return this.value;
  }

  isEmpty(): boolean {
    return this.value.trim() === '';
  }

  toString(): string {
    return '[REDACTED]';
  }

  toJSON(): string {
    return '[REDACTED]';
  }

  [Symbol.for('nodejs.util.inspect.custom')](): string {
    return 'SecretString [REDACTED]';
  }
}
