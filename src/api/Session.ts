/**
 * Session
 *
 * Credentials and the authentication state for one Agua IoT account.
 * Only the SessionManager mutates it.
 */
export class Session {
  private _token?: string;
  private _refreshToken?: string;
  private _expiresAt = 0;
  private _invalidated = false;

  /**
   * In-flight re-authentication, shared by concurrent callers
   */
  public pending?: Promise<Session>;

  constructor(
    public readonly email: string,
    public readonly password: string,
    public readonly clientToken: string,
  ) {}

  public get token(): string | undefined {
    return this._token;
  }

  public get refreshToken(): string | undefined {
    return this._refreshToken;
  }

  /**
   * Expiry of the current token in ms since the epoch
   */
  public get expiresAt(): number {
    return this._expiresAt;
  }

  public get invalidated(): boolean {
    return this._invalidated;
  }

  /**
   * Store a new token. The refresh token is kept when the platform does not
   * send a new one.
   */
  public update(token: string, expiresAt: number, refreshToken?: string): void {
    this._token = token;
    this._expiresAt = expiresAt;
    this._invalidated = false;
    if (refreshToken !== undefined) {
      this._refreshToken = refreshToken;
    }
  }

  public invalidate(): void {
    this._invalidated = true;
  }

  public isValid(now: number, margin = 0): boolean {
    return this._token !== undefined && !this._invalidated && this._expiresAt > now + margin;
  }
}
