import express, { type Express } from 'express';
import request from 'supertest';
import { CookieJar } from '../../../src/auth/cookies/cookie-jar.js';
import {
  SessionManager,
  resolveSessionState,
  type SessionManagerOptions
} from '../../../src/auth/session-manager.js';
import {
  UpstreamRequestFailedError,
  UpstreamUnauthorizedError,
  type IdentityProviderClient,
  type RemoteUserProfile,
  type TokenExchangeResult
} from '../../../src/auth/providers/types.js';
import { setupAuthRoutes } from '../../../src/server/routes/auth-routes.js';

const DASHBOARD = 'http://dash.test';

const issued: TokenExchangeResult = {
  access_token: 'access-1',
  refresh_token: 'refresh-1',
  token_type: 'Bearer',
  expires_in: 604800,
  scope: 'identify guilds email',
};

const refreshed: TokenExchangeResult = { ...issued, access_token: 'access-2', refresh_token: 'refresh-2', expires_in: 3600 };

const profile: RemoteUserProfile = {
  id: '42',
  username: 'tester',
  discriminator: '0',
  verified: true,
  flags: 0,
  premium_type: 0,
  public_flags: 0,
};

function createClient() {
  return {
    buildAuthorizationUrl: vi.fn<IdentityProviderClient['buildAuthorizationUrl']>(
      (req) => new URL(`https://id.test/authorize?client_id=${req.clientId}`)
    ),
    exchangeCode: vi.fn<IdentityProviderClient['exchangeCode']>().mockResolvedValue(issued),
    refreshToken: vi.fn<IdentityProviderClient['refreshToken']>().mockResolvedValue(refreshed),
    fetchCurrentUser: vi.fn<IdentityProviderClient['fetchCurrentUser']>().mockResolvedValue(profile),
  } satisfies IdentityProviderClient;
}

function buildApp(client: IdentityProviderClient, overrides: Partial<SessionManagerOptions> = {}): Express {
  const sessions = new SessionManager({
    dashboardUrl: DASHBOARD,
    redirectUri: 'http://api.test/api/auth/redirect',
    credentials: { clientId: 'test-client', clientSecret: 'test-secret' },
    ...overrides,
  }, client);
  const router = express.Router();
  setupAuthRoutes(router, sessions);
  const app = express();
  app.use('/api', router);
  return app;
}

function setCookies(headers: Record<string, unknown>): string[] {
  const value = headers['set-cookie'];
  return Array.isArray(value) ? value.map(String) : [];
}

function attributesOf(header: string): string[] {
  return header.split('; ').sort();
}

const SESSION_ATTRIBUTES = ['HttpOnly', 'Path=/', 'SameSite=None', 'Secure'];

describe('resolveSessionState', () => {
  it('is logged out without session cookies', () => {
    expect(resolveSessionState(CookieJar.fromHeader('theme=dark'))).toEqual({ kind: 'logged_out' });
  });

  it('prefers the access cookie', () => {
    const jar = CookieJar.fromHeader('discord_token=a; discord_refresh_token=r');
    expect(resolveSessionState(jar)).toEqual({ kind: 'active_access', accessToken: 'a' });
  });

  it('is refresh eligible with only the refresh cookie', () => {
    const jar = CookieJar.fromHeader('discord_refresh_token=r');
    expect(resolveSessionState(jar)).toEqual({ kind: 'refresh_eligible', refreshToken: 'r' });
  });

  it('ignores an empty access cookie', () => {
    const jar = CookieJar.fromHeader('discord_token=; discord_refresh_token=r');
    expect(resolveSessionState(jar).kind).toBe('refresh_eligible');
  });
});

describe('SessionManager', () => {
  let client: ReturnType<typeof createClient>;
  let app: Express;

  beforeEach(() => {
    client = createClient();
    app = buildApp(client);
  });

  describe('login', () => {
    it('redirects to the provider with the login scopes', async () => {
      const response = await request(app).get('/api/auth/login');

      expect(response.status).toBe(307);
      expect(response.headers.location).toBe('https://id.test/authorize?client_id=test-client');
      expect(response.headers['cache-control']).toBe('no-store, no-cache, must-revalidate, private');
      expect(client.buildAuthorizationUrl).toHaveBeenCalledWith({
        clientId: 'test-client',
        redirectUri: 'http://api.test/api/auth/redirect',
        scopes: ['identify', 'guilds', 'email'],
      });
      expect(setCookies(response.headers)).toEqual([]);
    });

    it('goes straight to the dashboard when already logged in', async () => {
      const response = await request(app).get('/api/auth/login').set('Cookie', 'discord_token=access-1');

      expect(response.status).toBe(307);
      expect(response.headers.location).toBe(`${DASHBOARD}/dashboard`);
      expect(client.buildAuthorizationUrl).not.toHaveBeenCalled();
    });

    it('falls back to the dashboard when the client is not configured', async () => {
      const response = await request(buildApp(client, { credentials: undefined })).get('/api/auth/login');

      expect(response.status).toBe(307);
      expect(response.headers.location).toBe(DASHBOARD);
      expect(client.buildAuthorizationUrl).not.toHaveBeenCalled();
    });
  });

  describe('redirectCallback', () => {
    it('redirects without provider calls when the code is missing', async () => {
      const response = await request(app).get('/api/auth/redirect?error=access_denied');

      expect(response.status).toBe(307);
      expect(response.headers.location).toBe(DASHBOARD);
      expect(client.exchangeCode).not.toHaveBeenCalled();
      expect(client.refreshToken).not.toHaveBeenCalled();
      expect(client.fetchCurrentUser).not.toHaveBeenCalled();
      expect(setCookies(response.headers)).toEqual([]);
    });

    it('sets the session cookie pair after a successful exchange', async () => {
      const response = await request(app).get('/api/auth/redirect?code=code-123');

      expect(response.status).toBe(302);
      expect(response.headers.location).toBe(`${DASHBOARD}/dashboard`);
      expect(client.exchangeCode).toHaveBeenCalledWith(
        {
          clientId: 'test-client',
          clientSecret: 'test-secret',
          redirectUri: 'http://api.test/api/auth/redirect',
          code: 'code-123',
        },
        expect.objectContaining({ signal: expect.any(AbortSignal) })
      );

      const [access, refresh] = setCookies(response.headers);
      expect(attributesOf(access)).toEqual(
        [...SESSION_ATTRIBUTES, 'Max-Age=604800', 'discord_token=access-1'].sort()
      );
      expect(attributesOf(refresh)).toEqual(
        [...SESSION_ATTRIBUTES, 'discord_refresh_token=refresh-1'].sort()
      );
    });

    it('redirects without cookies when the exchange fails', async () => {
      client.exchangeCode.mockRejectedValueOnce(new UpstreamRequestFailedError('down', 'discord'));

      const response = await request(app).get('/api/auth/redirect?code=code-123');

      expect(response.status).toBe(302);
      expect(response.headers.location).toBe(DASHBOARD);
      expect(setCookies(response.headers)).toEqual([]);
    });
  });

  describe('statusCheck', () => {
    it('answers 401 without provider calls when logged out', async () => {
      const response = await request(app).get('/api/auth/status');

      expect(response.status).toBe(401);
      expect(response.body).toEqual({ error: 'unauthorized', error_description: 'No session' });
      expect(client.refreshToken).not.toHaveBeenCalled();
      expect(client.fetchCurrentUser).not.toHaveBeenCalled();
    });

    it('uses an access cookie directly without refreshing', async () => {
      const response = await request(app)
        .get('/api/auth/status')
        .set('Cookie', 'discord_token=access-1; discord_refresh_token=refresh-1');

      expect(response.status).toBe(200);
      expect(response.body).toEqual(profile);
      expect(client.refreshToken).toHaveBeenCalledTimes(0);
      expect(client.fetchCurrentUser).toHaveBeenCalledWith('access-1', expect.anything());
      expect(setCookies(response.headers)).toEqual([]);
    });

    it('refreshes once and returns the profile with new cookies', async () => {
      const response = await request(app)
        .get('/api/auth/status')
        .set('Cookie', 'discord_refresh_token=refresh-1');

      expect(response.status).toBe(200);
      expect(response.body).toEqual(profile);
      expect(client.refreshToken).toHaveBeenCalledTimes(1);
      expect(client.refreshToken.mock.calls[0][0]).toEqual({
        clientId: 'test-client',
        clientSecret: 'test-secret',
        redirectUri: 'http://api.test/api/auth/redirect',
        refreshToken: 'refresh-1',
      });
      expect(client.fetchCurrentUser).toHaveBeenCalledTimes(1);
      expect(client.fetchCurrentUser.mock.calls[0][0]).toBe('access-2');

      const [access, refresh] = setCookies(response.headers);
      expect(attributesOf(access)).toEqual(
        [...SESSION_ATTRIBUTES, 'Max-Age=3600', 'discord_token=access-2'].sort()
      );
      expect(attributesOf(refresh)).toEqual(
        [...SESSION_ATTRIBUTES, 'discord_refresh_token=refresh-2'].sort()
      );
    });

    it('keeps the cookies when the refresh fails', async () => {
      client.refreshToken.mockRejectedValueOnce(new UpstreamRequestFailedError('timeout', 'discord'));

      const response = await request(app)
        .get('/api/auth/status')
        .set('Cookie', 'discord_refresh_token=refresh-1');

      expect(response.status).toBe(401);
      expect(setCookies(response.headers)).toEqual([]);
      expect(client.fetchCurrentUser).not.toHaveBeenCalled();
    });

    it('clears both cookies when the profile fetch fails', async () => {
      client.fetchCurrentUser.mockRejectedValueOnce(new UpstreamUnauthorizedError('revoked', 'discord'));

      const response = await request(app)
        .get('/api/auth/status')
        .set('Cookie', 'discord_token=access-1');

      expect(response.status).toBe(401);
      const cookies = setCookies(response.headers);
      expect(cookies).toHaveLength(2);
      expect(attributesOf(cookies[0])).toEqual([...SESSION_ATTRIBUTES, 'Max-Age=0', 'discord_token='].sort());
      expect(attributesOf(cookies[1])).toEqual([...SESSION_ATTRIBUTES, 'Max-Age=0', 'discord_refresh_token='].sort());
    });

    it('clears instead of setting refreshed cookies when the profile fetch fails after a refresh', async () => {
      client.fetchCurrentUser.mockRejectedValueOnce(new UpstreamUnauthorizedError('revoked', 'discord'));

      const response = await request(app)
        .get('/api/auth/status')
        .set('Cookie', 'discord_refresh_token=refresh-1');

      expect(response.status).toBe(401);
      const cookies = setCookies(response.headers);
      expect(cookies).toHaveLength(2);
      expect(cookies.every((cookie) => cookie.includes('Max-Age=0'))).toBe(true);
    });

    it('answers 500 when a refresh is needed but the client is not configured', async () => {
      const response = await request(buildApp(client, { credentials: undefined }))
        .get('/api/auth/status')
        .set('Cookie', 'discord_refresh_token=refresh-1');

      expect(response.status).toBe(500);
      expect(response.body.error).toBe('configuration_missing');
      expect(client.refreshToken).not.toHaveBeenCalled();
    });
  });

  describe('logout', () => {
    it('clears both cookies even when logged out', async () => {
      const response = await request(app).get('/api/auth/logout');

      expect(response.status).toBe(302);
      expect(response.headers.location).toBe(DASHBOARD);
      const cookies = setCookies(response.headers);
      expect(cookies.map((cookie) => cookie.split(';')[0])).toEqual(['discord_token=', 'discord_refresh_token=']);
    });
  });
});
