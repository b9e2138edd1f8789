/**
 * Session token issued by Exposure on login
 *
 * `crmToken|accountId|userId|...` with further fields the client does not
 * read.
 */
export class SessionToken {
  readonly accountId: string | undefined;
  readonly userId: string | undefined;

  constructor(readonly value: string) {
    const fields = value.split('|');
    this.accountId = fields.length > 2 ? nonEmpty(fields[1]) : undefined;
    this.userId = fields.length > 2 ? nonEmpty(fields[2]) : undefined;
  }

  get authorizationHeader(): string {
    return `Bearer ${this.value}`;
  }

  /** Redacted form for logs */
  toJSON(): string {
    return '[REDACTED]';
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  return value ? value : undefined;
}
