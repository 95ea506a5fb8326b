/**
 * Session Credential Value Object
 * Short-lived bearer token. Held in memory for one run, never refreshed.
 */
export class SessionCredentialVO {
  private constructor(
    private readonly _token: string,
    private readonly _issuedAt: Date,
    private readonly _expiresAt?: Date,
  ) {}

  static create(token: string, issuedAt: Date = new Date(), expiresInSeconds?: number): SessionCredentialVO {
    if (token.trim() === '') {
      throw new Error('Session credential token cannot be empty');
    }
    const expiresAt =
      expiresInSeconds !== undefined
        ? new Date(issuedAt.getTime() + expiresInSeconds * 1000)
        : undefined;
    return new SessionCredentialVO(token, issuedAt, expiresAt);
  }

  get token(): string {
    return this._token;
  }

  get expiresAt(): Date | undefined {
    return this._expiresAt;
  }

  isExpired(now: Date = new Date()): boolean {
    return this._expiresAt !== undefined && now.getTime() >= this._expiresAt.getTime();
  }

  /**
   * Keeps the token out of logs and serialized events.
   */
  toJSON(): Record<string, unknown> {
    return {
      token: '[redacted]',
      issuedAt: this._issuedAt.toISOString(),
      expiresAt: this._expiresAt?.toISOString(),
    };
  }
}
