import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  TEST_ACCOUNT_ID,
  createMockAccountRecord,
  createMockLogger,
  createMockResponse,
  createMockTokenResponse,
  createStalledResponse,
  createTestToken,
} from '../test/mocks.js';
import { AUTH_ACCOUNT_ID_CLAIM } from '../settings.js';
import { Account } from './account.js';
import { SmartTubClient } from './client.js';
import { ApiError, AuthenticationError, NotAuthenticatedError } from './types.js';

describe('SmartTubClient', () => {
  let client: SmartTubClient;
  let mockLogger: ReturnType<typeof createMockLogger>;
  let mockFetch: ReturnType<typeof vi.fn>;

  // Helper function to set up a logged-in client
  async function loginClient(): Promise<void> {
    mockFetch.mockResolvedValueOnce(createMockResponse({ body: createMockTokenResponse() }));
    await client.login('owner@example.com', 'test-password');
    mockFetch.mockClear();
  }

  beforeEach(() => {
    mockLogger = createMockLogger();
    mockFetch = vi.fn();
    vi.stubGlobal('fetch', mockFetch);

    client = new SmartTubClient({}, mockLogger);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllGlobals();
    vi.clearAllMocks();
  });

  describe('login', () => {
    it('should populate the session from the token response', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
      const tokenResponse = createMockTokenResponse();
      mockFetch.mockResolvedValueOnce(createMockResponse({ body: tokenResponse }));

      const session = await client.login('owner@example.com', 'test-password');

      expect(client.authenticated).toBe(true);
      expect(session.accessToken).toBe(createTestToken({ sub: 'auth0|user-1', [AUTH_ACCOUNT_ID_CLAIM]: TEST_ACCOUNT_ID }));
      expect(session.accountId).toBe(TEST_ACCOUNT_ID);
      expect(session.refreshToken).toBe('test-refresh-token');
      expect(session.tokenClaims.sub).toBe('auth0|user-1');
      expect(session.expiresAt.toISOString()).toBe('2024-01-02T00:00:00.000Z');
      expect(client.session).toBe(session);
      expect(mockLogger.info).toHaveBeenCalledWith('Successfully logged in to SmartTub');
    });

    it('should send a password-realm grant to the auth endpoint', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse({ body: createMockTokenResponse() }));

      await client.login('owner@example.com', 'test-password');

      const [url, init] = mockFetch.mock.calls[0];
      expect(url).toBe('https://smarttub.auth0.com/oauth/token');
      expect(init.method).toBe('POST');
      expect(init.headers['Content-Type']).toBe('application/json');
      expect(JSON.parse(init.body)).toEqual({
        audience: 'https://api.operation-link.com/',
        client_id: 'dB7Rcp3rfKKh0vHw2uqkwOZmRb5WNjQC',
        grant_type: 'http://auth0.com/oauth/grant-type/password-realm',
        realm: 'Username-Password-Authentication',
        scope: 'openid email offline_access User Admin',
        username: 'owner@example.com',
        password: 'test-password',
      });
    });

    it('should use a custom auth URL and client id when provided', async () => {
      client = new SmartTubClient({ authUrl: 'https://auth.example.com/token', clientId: 'test-client' }, mockLogger);
      mockFetch.mockResolvedValueOnce(createMockResponse({ body: createMockTokenResponse() }));

      await client.login('owner@example.com', 'test-password');

      const [url, init] = mockFetch.mock.calls[0];
      expect(url).toBe('https://auth.example.com/token');
      expect(JSON.parse(init.body).client_id).toBe('test-client');
    });

    it('should throw AuthenticationError on a rejected login', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse({ status: 403, body: { error: 'invalid_grant' } }));

      const error = await client.login('owner@example.com', 'wrong-password').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthenticationError);
      expect(error).toMatchObject({ message: 'Login failed with status 403', statusCode: 403 });
      expect(client.authenticated).toBe(false);
    });

    it('should reject a token type other than Bearer', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse({ body: createMockTokenResponse({ token_type: 'mac' }) }));

      await expect(client.login('owner@example.com', 'test-password')).rejects.toThrow('Unexpected token type: mac');
      expect(client.authenticated).toBe(false);
    });

    it('should reject a token without an account id claim', async () => {
      mockFetch.mockResolvedValueOnce(
        createMockResponse({ body: createMockTokenResponse({ access_token: createTestToken({ sub: 'auth0|user-1' }) }) }),
      );

      await expect(client.login('owner@example.com', 'test-password')).rejects.toThrow(
        'Access token did not include an account id',
      );
    });

    it('should reject a token that is not a JWT', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse({ body: createMockTokenResponse({ access_token: 'opaque' }) }));

      await expect(client.login('owner@example.com', 'test-password')).rejects.toThrow('Malformed access token');
    });

    it('should reject a token response without a refresh token', async () => {
      mockFetch.mockResolvedValueOnce(
        createMockResponse({ body: createMockTokenResponse({ refresh_token: undefined }) }),
      );

      await expect(client.login('owner@example.com', 'test-password')).rejects.toThrow(
        'Token response did not include a refresh token',
      );
      expect(client.authenticated).toBe(false);
    });

    it('should time out when the token response body stalls', async () => {
      client = new SmartTubClient({ requestTimeoutMs: 5 }, mockLogger);
      mockFetch.mockResolvedValueOnce(createStalledResponse());

      const error = await client.login('owner@example.com', 'test-password').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthenticationError);
      expect(error).toMatchObject({ message: 'Authentication request timed out' });
      expect(client.authenticated).toBe(false);
    });

    it('should wrap network failures in AuthenticationError', async () => {
      mockFetch.mockRejectedValueOnce(new Error('Connection refused'));

      const error = await client.login('owner@example.com', 'test-password').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthenticationError);
      expect(error).toMatchObject({ message: 'Authentication failed: Connection refused' });
    });

    it('should keep the previous session when a later login fails', async () => {
      await loginClient();
      const previous = client.session;
      mockFetch.mockResolvedValueOnce(createMockResponse({ status: 401 }));

      await expect(client.login('owner@example.com', 'wrong-password')).rejects.toThrow(AuthenticationError);

      expect(client.authenticated).toBe(true);
      expect(client.session).toBe(previous);
    });

    it('should never log the password', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse({ body: createMockTokenResponse() }));

      await client.login('owner@example.com', 'test-password');

      const logged = [...vi.mocked(mockLogger.debug).mock.calls, ...vi.mocked(mockLogger.info).mock.calls]
        .flat()
        .join('\n');
      expect(logged).not.toContain('test-password');
    });
  });

  describe('isTokenExpired', () => {
    it('should report expired before login', () => {
      expect(client.isTokenExpired()).toBe(true);
    });

    it('should compare against the server-provided lifetime', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
      await loginClient();

      expect(client.isTokenExpired()).toBe(false);
      expect(client.isTokenExpired(new Date('2024-01-01T23:59:59Z'))).toBe(false);
      expect(client.isTokenExpired(new Date('2024-01-02T00:00:00Z'))).toBe(true);
    });
  });

  describe('request', () => {
    it('should throw NotAuthenticatedError before login', async () => {
      await expect(client.request('GET', 'spas/spa-200/status')).rejects.toThrow(NotAuthenticatedError);
      expect(mockFetch).not.toHaveBeenCalled();
    });

    describe('when logged in', () => {
      beforeEach(async () => {
        await loginClient();
      });

      it('should attach the bearer token and decode the JSON body', async () => {
        mockFetch.mockResolvedValueOnce(createMockResponse({ body: { state: 'NORMAL' } }));

        const data = await client.request('GET', 'spas/spa-200/status');

        expect(data).toEqual({ state: 'NORMAL' });
        const [url, init] = mockFetch.mock.calls[0];
        expect(url).toBe('https://api.smarttub.io/spas/spa-200/status');
        expect(init.method).toBe('GET');
        expect(init.headers.Authorization).toBe(`Bearer ${client.session?.accessToken}`);
        expect(init.headers['Content-Type']).toBeUndefined();
        expect(init.body).toBeUndefined();
      });

      it('should send a JSON body when given', async () => {
        mockFetch.mockResolvedValueOnce(createMockResponse({ body: {} }));

        await client.request('PATCH', 'spas/spa-200/config', { heatMode: 'AUTO' });

        const [, init] = mockFetch.mock.calls[0];
        expect(init.method).toBe('PATCH');
        expect(init.headers['Content-Type']).toBe('application/json');
        expect(init.body).toBe('{"heatMode":"AUTO"}');
      });

      it('should strip a leading slash from the path', async () => {
        mockFetch.mockResolvedValueOnce(createMockResponse({ body: {} }));

        await client.request('GET', '/spas/spa-200');

        expect(mockFetch.mock.calls[0][0]).toBe('https://api.smarttub.io/spas/spa-200');
      });

      it('should resolve to undefined for an empty body', async () => {
        mockFetch.mockResolvedValueOnce(createMockResponse({ status: 200 }));

        await expect(client.request('POST', 'spas/spa-200/clearray/toggle')).resolves.toBeUndefined();
      });

      it('should throw ApiError with status and body on a server error', async () => {
        const session = client.session;
        mockFetch.mockResolvedValueOnce(createMockResponse({ status: 500, text: 'boom' }));

        const error = await client.request('GET', 'spas/spa-200/status').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ApiError);
        expect(error).toMatchObject({ message: 'API request failed with status 500', statusCode: 500, body: 'boom' });
        expect(client.session).toBe(session);
        expect(client.authenticated).toBe(true);
      });

      it('should throw ApiError on 401 without logging out', async () => {
        mockFetch.mockResolvedValueOnce(createMockResponse({ status: 401, text: '{"message":"Unauthorized"}' }));

        const error = await client.request('GET', 'spas/spa-200/status').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ApiError);
        expect(error).toMatchObject({ statusCode: 401, body: '{"message":"Unauthorized"}' });
        expect(client.authenticated).toBe(true);
      });

      it('should handle request timeout', async () => {
        const abortError = new Error('aborted');
        abortError.name = 'AbortError';
        mockFetch.mockRejectedValueOnce(abortError);

        await expect(client.request('GET', 'spas/spa-200/status')).rejects.toThrow('Request timed out');
      });

      it('should handle generic network errors', async () => {
        mockFetch.mockRejectedValueOnce(new Error('Connection refused'));

        await expect(client.request('GET', 'spas/spa-200/status')).rejects.toThrow('Network error: Connection refused');
      });

      it('should reject a 2xx response that is not JSON', async () => {
        mockFetch.mockResolvedValueOnce(createMockResponse({ status: 200, text: '<html>' }));

        await expect(client.request('GET', 'spas/spa-200/status')).rejects.toThrow(/^Invalid JSON in response/);
      });
    });

    it('should abort a request that exceeds the timeout', async () => {
      client = new SmartTubClient({ requestTimeoutMs: 5 }, mockLogger);
      await loginClient();
      mockFetch.mockImplementationOnce(
        (_url: string, init: RequestInit) =>
          new Promise((_resolve, reject) => {
            init.signal?.addEventListener('abort', () => {
              const abortError = new Error('aborted');
              abortError.name = 'AbortError';
              reject(abortError);
            });
          }),
      );

      await expect(client.request('GET', 'spas/spa-200/status')).rejects.toThrow('Request timed out');
    });

    it('should time out when the response body stalls after the headers', async () => {
      client = new SmartTubClient({ requestTimeoutMs: 5 }, mockLogger);
      await loginClient();
      mockFetch.mockResolvedValueOnce(createStalledResponse());

      const error = await client.request('GET', 'spas/spa-200/status').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({ message: 'Request timed out', statusCode: undefined });
    });

    it('should use a custom API base URL when provided', async () => {
      client = new SmartTubClient({ apiBaseUrl: 'https://api.example.com/' }, mockLogger);
      await loginClient();
      mockFetch.mockResolvedValueOnce(createMockResponse({ body: {} }));

      await client.request('GET', 'spas/spa-200');

      expect(mockFetch.mock.calls[0][0]).toBe('https://api.example.com/spas/spa-200');
    });
  });

  describe('getAccount', () => {
    it('should throw NotAuthenticatedError before login', async () => {
      await expect(client.getAccount()).rejects.toThrow(NotAuthenticatedError);
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('should fetch the account named in the token', async () => {
      await loginClient();
      mockFetch.mockResolvedValueOnce(createMockResponse({ body: createMockAccountRecord() }));

      const account = await client.getAccount();

      expect(mockFetch.mock.calls[0][0]).toBe(`https://api.smarttub.io/accounts/${TEST_ACCOUNT_ID}`);
      expect(account).toBeInstanceOf(Account);
      expect(account.id).toBe(TEST_ACCOUNT_ID);
      expect(account.email).toBe('owner@example.com');
      expect(account.properties.firstName).toBe('Test');
    });

    it('should reject an empty account response', async () => {
      await loginClient();
      mockFetch.mockResolvedValueOnce(createMockResponse({ status: 200 }));

      await expect(client.getAccount()).rejects.toThrow(new ApiError('Unexpected response for account'));
    });

    it('should reject an account record without an email', async () => {
      await loginClient();
      mockFetch.mockResolvedValueOnce(createMockResponse({ body: { id: TEST_ACCOUNT_ID } }));

      await expect(client.getAccount()).rejects.toBeInstanceOf(ApiError);
    });
  });
});
