/**
 * Session Manager
 *
 * Logs in to the Agua IoT platform and keeps a session's token usable.
 * Tokens are JWTs; their `exp` claim gives the expiry.
 */

import jwt from 'jsonwebtoken';
import type { ResolvedOptions } from '../config';
import { AuthenticationError, ServiceError } from '../errors';
import { API_PATH_APP_SIGNUP, API_PATH_LOGIN, API_PATH_REFRESH_TOKEN } from '../settings';
import type { AguaIotApi } from './AguaIotApi';
import { describeShape, parseLoginResponse, parseRefreshTokenResponse } from './response';
import { Session } from './Session';

export class SessionManager {
  constructor(
    private readonly api: AguaIotApi,
    private readonly options: ResolvedOptions,
  ) {}

  /**
   * Register the client token and log in
   */
  public async authenticate(email: string, password: string, clientToken: string): Promise<Session> {
    const session = new Session(email, password, clientToken);
    await this.registerClientToken(session);
    await this.login(session);
    return session;
  }

  /**
   * Return the session once its token is usable. An expired token is
   * refreshed, an invalidated one replaced by a fresh login. Concurrent
   * callers share one re-authentication.
   */
  public async ensureValid(session: Session): Promise<Session> {
    if (session.isValid(this.options.now(), this.options.tokenExpiryMargin)) {
      return session;
    }

    if (session.pending) {
      return session.pending;
    }

    session.pending = this.reauthenticate(session);
    try {
      return await session.pending;
    } finally {
      session.pending = undefined;
    }
  }

  /**
   * Mark the token unusable; the next ensureValid logs in again
   */
  public invalidate(session: Session): void {
    this.options.log?.debug('[SessionManager] Session invalidated');
    session.invalidate();
  }

  private async reauthenticate(session: Session): Promise<Session> {
    if (!session.invalidated && session.refreshToken) {
      const refreshed = await this.refreshToken(session);
      if (refreshed) {
        return session;
      }
      this.options.log?.warn('[SessionManager] Refresh auth token failed, forcing new login...');
    }

    await this.login(session);
    return session;
  }

  private async registerClientToken(session: Session): Promise<void> {
    const { status, data } = await this.api.request('POST', API_PATH_APP_SIGNUP, {
      phone_type: 'Android',
      phone_id: session.clientToken,
      phone_version: '1.0',
      language: 'en',
      id_app: session.clientToken,
      push_notification_token: session.clientToken,
      push_notification_active: false,
    });

    if (status >= 500) {
      throw this.serviceError('App signup failed', status, data);
    }
    if (status !== 201) {
      throw new AuthenticationError('Failed to register app id');
    }
  }

  private async login(session: Session): Promise<void> {
    const { status, data } = await this.api.request(
      'POST',
      API_PATH_LOGIN,
      { email: session.email, password: session.password },
      { local: 'true', Authorization: session.clientToken },
    );

    if (status >= 500) {
      throw this.serviceError('Login failed', status, data);
    }
    if (status !== 200) {
      throw new AuthenticationError('Failed to login, please check credentials');
    }

    const response = this.checked(() => parseLoginResponse(data));
    session.update(response.token, this.tokenExpiry(response.token, data), response.refresh_token);
    this.options.log?.info('[SessionManager] Logged in as', session.email);
  }

  /**
   * Resolves false when the platform rejects the refresh token
   */
  private async refreshToken(session: Session): Promise<boolean> {
    const { status, data } = await this.api.request('POST', API_PATH_REFRESH_TOKEN, {
      refresh_token: session.refreshToken,
    });

    if (status !== 201) {
      return false;
    }

    const response = this.checked(() => parseRefreshTokenResponse(data));
    session.update(response.token, this.tokenExpiry(response.token, data));
    this.options.log?.debug('[SessionManager] Auth token refreshed');
    return true;
  }

  private tokenExpiry(token: string, body: unknown): number {
    const claims = jwt.decode(token);
    if (claims === null || typeof claims === 'string' || typeof claims.exp !== 'number') {
      throw this.serviceError('Token without expiry', undefined, body);
    }
    return claims.exp * 1000;
  }

  /**
   * Run a body parser, logging the payload shape of a body it rejects
   */
  private checked<T>(parse: () => T): T {
    try {
      return parse();
    } catch (error) {
      if (error instanceof ServiceError) {
        this.options.log?.error(`[SessionManager] ${error.message}, payload:`, error.payloadShape);
      }
      throw error;
    }
  }

  private serviceError(message: string, status: number | undefined, body: unknown): ServiceError {
    const shape = describeShape(body);
    this.options.log?.error(`[SessionManager] ${message}, payload:`, shape);
    return new ServiceError(message, status, shape);
  }
}
