/**
 * Cookie-backed session lifecycle
 *
 * There is no server-side session table: the access and refresh cookies are
 * the only session state. Each entry point reads the inbound cookies,
 * decides what to do from the observed state and answers with whatever
 * cookie changes that decision implies.
 *
 * Refresh failures keep the cookies (the refresh token may still be good
 * after a transient upstream failure); a profile fetch that fails after a
 * token was accepted clears them.
 */

import type { Request, Response } from 'express';
import { CookieJar } from './cookies/cookie-jar.js';
import {
  ACCESS_TOKEN_COOKIE,
  REFRESH_TOKEN_COOKIE,
  addSessionCookies,
  clearSessionCookies
} from './session-cookies.js';
import {
  ConfigurationMissingError,
  DiscordOAuth2Scope,
  IdentityProviderClient,
  LOGIN_SCOPES,
  RemoteUserProfile
} from './providers/types.js';
import type { OAuthClientCredentials } from '../config/environment.js';
import { logger, tokenPrefix } from '../observability/logger.js';
import { abortOnClose } from '../utils/deadline.js';

/**
 * Session state as observed from the inbound cookies
 */
export type SessionState =
  | { kind: 'logged_out' }
  | { kind: 'active_access'; accessToken: string }
  | { kind: 'refresh_eligible'; refreshToken: string };

export function resolveSessionState(jar: CookieJar): SessionState {
  const accessToken = jar.get(ACCESS_TOKEN_COOKIE);
  if (accessToken) {
    // Expiry is enforced by the cookie's Max-Age, not re-validated here
    return { kind: 'active_access', accessToken };
  }
  const refreshToken = jar.get(REFRESH_TOKEN_COOKIE);
  if (refreshToken) {
    return { kind: 'refresh_eligible', refreshToken };
  }
  return { kind: 'logged_out' };
}

export interface SessionManagerOptions {
  /** Dashboard base URL, no trailing slash */
  dashboardUrl: string;
  redirectUri: string;
  credentials?: OAuthClientCredentials;
  scopes?: readonly DiscordOAuth2Scope[];
}

/**
 * Set anti-caching headers for auth responses (RFC 6749, RFC 9700)
 */
export function setAntiCachingHeaders(res: Response): void {
  res.setHeader('Cache-Control', 'no-store, no-cache, must-revalidate, private');
  res.setHeader('Pragma', 'no-cache');
  res.setHeader('Expires', '0');
}

export class SessionManager {
  private readonly scopes: readonly DiscordOAuth2Scope[];

  constructor(
    private readonly options: SessionManagerOptions,
    private readonly client: IdentityProviderClient
  ) {
    this.scopes = options.scopes ?? LOGIN_SCOPES;
  }

  private get dashboardHome(): string {
    return `${this.options.dashboardUrl}/dashboard`;
  }

  /**
   * Start the OAuth2 flow, or go straight to the dashboard when an access
   * cookie is already present.
   */
  async login(req: Request, res: Response): Promise<void> {
    setAntiCachingHeaders(res);
    const jar = CookieJar.fromHeader(req.headers.cookie);

    if (resolveSessionState(jar).kind === 'active_access') {
      logger.authInfo('User is already logged in, redirecting to dashboard');
      res.redirect(307, this.dashboardHome);
      return;
    }

    let credentials: OAuthClientCredentials;
    try {
      credentials = this.requireCredentials();
    } catch (error) {
      logger.authError('Cannot start login', error);
      res.redirect(307, this.options.dashboardUrl);
      return;
    }

    const authorizationUrl = this.client.buildAuthorizationUrl({
      clientId: credentials.clientId,
      redirectUri: this.options.redirectUri,
      scopes: this.scopes,
    });

    logger.authInfo('Redirecting to Discord OAuth2 login');
    res.redirect(307, authorizationUrl.toString());
  }

  /**
   * OAuth2 redirect target. Any failure degrades to "not logged in": the
   * browser is sent back to the dashboard without cookies.
   */
  async redirectCallback(req: Request, res: Response): Promise<void> {
    setAntiCachingHeaders(res);
    const { code, error } = req.query;

    if (typeof code !== 'string' || code.length === 0) {
      logger.authWarn('No code provided in redirect', { providerError: typeof error === 'string' ? error : undefined });
      res.redirect(307, this.options.dashboardUrl);
      return;
    }

    let credentials: OAuthClientCredentials;
    try {
      credentials = this.requireCredentials();
    } catch (configError) {
      logger.authError('Cannot complete login', configError);
      res.redirect(307, this.options.dashboardUrl);
      return;
    }

    try {
      const tokens = await this.client.exchangeCode(
        { ...credentials, redirectUri: this.options.redirectUri, code },
        { signal: abortOnClose(res) }
      );
      const jar = addSessionCookies(CookieJar.fromHeader(req.headers.cookie), tokens);
      this.writeCookies(res, jar);
      logger.authInfo('Login completed', { scope: tokens.scope, expiresIn: tokens.expires_in });
      res.redirect(302, this.dashboardHome);
    } catch (exchangeError) {
      logger.authError('Failed to get access token', exchangeError);
      res.redirect(302, this.options.dashboardUrl);
    }
  }

  /**
   * Resolve the current user, refreshing the access token first when only
   * the refresh cookie is left.
   */
  async statusCheck(req: Request, res: Response): Promise<void> {
    setAntiCachingHeaders(res);
    let jar = CookieJar.fromHeader(req.headers.cookie);
    const state = resolveSessionState(jar);
    const signal = abortOnClose(res);
    let accessToken: string;

    switch (state.kind) {
      case 'logged_out':
        logger.authDebug('No access token or refresh token found in cookies');
        this.sendUnauthorized(res, 'No session');
        return;

      case 'active_access':
        accessToken = state.accessToken;
        break;

      case 'refresh_eligible': {
        let credentials: OAuthClientCredentials;
        try {
          credentials = this.requireCredentials();
        } catch (error) {
          logger.authError('Cannot refresh session', error);
          res.status(500).json({
            error: 'configuration_missing',
            error_description: 'OAuth client is not configured'
          });
          return;
        }

        try {
          const tokens = await this.client.refreshToken(
            { ...credentials, redirectUri: this.options.redirectUri, refreshToken: state.refreshToken },
            { signal }
          );
          jar = addSessionCookies(jar, tokens);
          accessToken = tokens.access_token;
          logger.authInfo('Access token refreshed', { expiresIn: tokens.expires_in });
        } catch (error) {
          // Cookies are kept: the refresh token may still be valid
          logger.authError('Failed to refresh access token', error);
          this.sendUnauthorized(res, 'Session refresh failed');
          return;
        }
        break;
      }
    }

    let user: RemoteUserProfile;
    try {
      user = await this.client.fetchCurrentUser(accessToken, { signal });
    } catch (error) {
      logger.authError('Failed to fetch user data, clearing session', {
        tokenPrefix: tokenPrefix(accessToken),
        reason: error instanceof Error ? error.message : String(error)
      });
      this.writeCookies(res, clearSessionCookies(jar));
      this.sendUnauthorized(res, 'Session is no longer valid');
      return;
    }

    this.writeCookies(res, jar);
    res.status(200).json(user);
  }

  /**
   * Clear both session cookies. Succeeds from any state.
   */
  async logout(req: Request, res: Response): Promise<void> {
    setAntiCachingHeaders(res);
    const jar = clearSessionCookies(CookieJar.fromHeader(req.headers.cookie));
    this.writeCookies(res, jar);
    logger.authInfo('Session cleared');
    res.redirect(302, this.options.dashboardUrl);
  }

  private requireCredentials(): OAuthClientCredentials {
    if (!this.options.credentials) {
      throw new ConfigurationMissingError(['DISCORD_CLIENT_ID', 'DISCORD_CLIENT_SECRET']);
    }
    return this.options.credentials;
  }

  private writeCookies(res: Response, jar: CookieJar): void {
    for (const header of jar.toSetCookieHeaders()) {
      res.append('Set-Cookie', header);
    }
  }

  private sendUnauthorized(res: Response, description: string): void {
    res.status(401).json({ error: 'unauthorized', error_description: description });
  }
}
