import type { Logging } from 'homebridge';

import {
  API_BASE_URL,
  AUTH_ACCOUNT_ID_CLAIM,
  AUTH_AUDIENCE,
  AUTH_CLIENT_ID,
  AUTH_GRANT_TYPE,
  AUTH_REALM,
  AUTH_SCOPE,
  AUTH_URL,
  DEFAULT_REQUEST_TIMEOUT_MS,
} from '../settings.js';
import { Account } from './account.js';
import type { HttpMethod, Session, SmartTubClientConfig, TokenClaims } from './types.js';
import {
  ApiError,
  AuthenticationError,
  NotAuthenticatedError,
  SmartTubError,
  isAccountRecord,
  isRecord,
} from './types.js';

/**
 * Status and raw body of a completed exchange
 */
interface HttpResult {
  ok: boolean;
  status: number;
  text: string;
}

/**
 * HTTP client for the SmartTub API
 *
 * Holds a single bearer token. Logging in again replaces it, so sharing one client
 * between callers that may log in while requests are in flight needs external
 * coordination. Tokens are never refreshed automatically: once isTokenExpired()
 * reports true, call login() again.
 */
export class SmartTubClient {
  private readonly authUrl: string;
  private readonly apiBaseUrl: string;
  private readonly clientId: string;
  private readonly requestTimeoutMs: number;
  readonly log: Logging;

  private currentSession?: Session;

  constructor(config: SmartTubClientConfig, log: Logging) {
    this.authUrl = config.authUrl ?? AUTH_URL;
    this.apiBaseUrl = (config.apiBaseUrl ?? API_BASE_URL).replace(/\/+$/, '');
    this.clientId = config.clientId ?? AUTH_CLIENT_ID;
    this.requestTimeoutMs = config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.log = log;
  }

  get authenticated(): boolean {
    return this.currentSession !== undefined;
  }

  get session(): Readonly<Session> | undefined {
    return this.currentSession;
  }

  /**
   * True once the server-provided lifetime of the current token has passed
   */
  isTokenExpired(now: Date = new Date()): boolean {
    if (!this.currentSession) {
      return true;
    }
    return now.getTime() >= this.currentSession.expiresAt.getTime();
  }

  /**
   * Authenticate with the password-realm grant
   *
   * Must be called before any other request. A failed login keeps the previous session.
   *
   * @param username - email address of the SmartTub account
   */
  async login(username: string, password: string): Promise<Session> {
    this.log.info('Logging in to SmartTub...');

    try {
      const response = await this.fetchWithTimeout(this.authUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: JSON.stringify({
          audience: AUTH_AUDIENCE,
          client_id: this.clientId,
          grant_type: AUTH_GRANT_TYPE,
          realm: AUTH_REALM,
          scope: AUTH_SCOPE,
          username,
          password,
        }),
      });

      if (!response.ok) {
        this.log.error(`Login failed with status ${response.status}`);
        throw new AuthenticationError(`Login failed with status ${response.status}`, response.status);
      }

      const tokenData: unknown = JSON.parse(response.text);
      if (!isRecord(tokenData)) {
        throw new AuthenticationError('Unexpected token response');
      }

      if (tokenData.token_type !== 'Bearer') {
        throw new AuthenticationError(`Unexpected token type: ${String(tokenData.token_type)}`);
      }
      if (typeof tokenData.access_token !== 'string' || typeof tokenData.expires_in !== 'number') {
        throw new AuthenticationError('Token response did not include an access token');
      }
      if (typeof tokenData.refresh_token !== 'string') {
        throw new AuthenticationError('Token response did not include a refresh token');
      }

      // Claims are decoded without verifying the signature; the account id is trusted as issued
      const tokenClaims = this.decodeTokenClaims(tokenData.access_token);
      const accountId = tokenClaims[AUTH_ACCOUNT_ID_CLAIM];
      if (typeof accountId !== 'string' && typeof accountId !== 'number') {
        throw new AuthenticationError('Access token did not include an account id');
      }

      const session: Session = {
        accessToken: tokenData.access_token,
        tokenClaims,
        expiresAt: new Date(Date.now() + tokenData.expires_in * 1000),
        refreshToken: tokenData.refresh_token,
        accountId: String(accountId),
      };
      this.currentSession = session;

      this.log.info('Successfully logged in to SmartTub');
      this.log.debug(`login successful, username=${username}`);
      this.log.debug(`Token expires at: ${session.expiresAt.toISOString()}`);
      return session;
    } catch (error) {
      if (error instanceof SmartTubError) {
        throw error;
      }
      if (error instanceof Error) {
        if (error.name === 'AbortError') {
          throw new AuthenticationError('Authentication request timed out');
        }
        throw new AuthenticationError(`Authentication failed: ${error.message}`);
      }
      throw new AuthenticationError('Unknown error during authentication');
    }
  }

  /**
   * Perform an authenticated request against the API base
   *
   * @param path - relative to the API base, e.g. `spas/{id}/status`
   * @returns the decoded JSON body, or undefined when the server sent none
   */
  async request<T = unknown>(method: HttpMethod, path: string, body?: unknown): Promise<T> {
    const session = this.requireSession();
    const url = `${this.apiBaseUrl}/${path.replace(/^\/+/, '')}`;
    this.log.debug(`${method} ${url}`);

    try {
      const headers: Record<string, string> = {
        ...this.getAuthHeaders(session),
        Accept: 'application/json',
      };
      if (body !== undefined) {
        headers['Content-Type'] = 'application/json';
      }

      const response = await this.fetchWithTimeout(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
      });

      if (!response.ok) {
        throw new ApiError(`API request failed with status ${response.status}`, response.status, response.text);
      }

      const data: unknown = response.text ? JSON.parse(response.text) : undefined;
      return data as T;
    } catch (error) {
      if (error instanceof SmartTubError) {
        throw error;
      }

      if (error instanceof Error) {
        if (error.name === 'AbortError') {
          throw new ApiError('Request timed out');
        }
        if (error instanceof SyntaxError) {
          throw new ApiError(`Invalid JSON in response: ${error.message}`);
        }
        throw new ApiError(`Network error: ${error.message}`);
      }

      throw new ApiError('Unknown error occurred');
    }
  }

  /**
   * Retrieve the account of the logged-in user
   */
  async getAccount(): Promise<Account> {
    const session = this.requireSession();
    const record = await this.request('GET', `accounts/${encodeURIComponent(session.accountId)}`);
    if (!isAccountRecord(record)) {
      throw new ApiError('Unexpected response for account');
    }
    this.log.debug(`getAccount successful: ${record.id}`);
    return new Account(this, record);
  }

  private requireSession(): Session {
    if (!this.currentSession) {
      throw new NotAuthenticatedError();
    }
    return this.currentSession;
  }

  private getAuthHeaders(session: Session): Record<string, string> {
    return {
      Authorization: `Bearer ${session.accessToken}`,
    };
  }

  private decodeTokenClaims(token: string): TokenClaims {
    const payload = token.split('.')[1];
    if (!payload) {
      throw new AuthenticationError('Malformed access token');
    }

    const claims: unknown = JSON.parse(Buffer.from(payload, 'base64url').toString('utf8'));
    if (!isRecord(claims)) {
      throw new AuthenticationError('Malformed access token');
    }
    return claims;
  }

  /**
   * Send a request and read its body, both under the same timeout
   */
  private async fetchWithTimeout(url: string, init: RequestInit): Promise<HttpResult> {
    const controller = new AbortController();
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<never>((_resolve, reject) => {
      timeoutId = setTimeout(() => {
        controller.abort();
        const abortError = new Error('The operation was aborted');
        abortError.name = 'AbortError';
        reject(abortError);
      }, this.requestTimeoutMs);
    });

    const exchange = async (): Promise<HttpResult> => {
      const response = await fetch(url, { ...init, signal: controller.signal });
      const text = await response.text();
      return { ok: response.ok, status: response.status, text };
    };

    try {
      return await Promise.race([exchange(), timedOut]);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
