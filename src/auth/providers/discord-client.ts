/**
 * Discord OAuth2 and user API client
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { logger, tokenPrefix } from '../../observability/logger.js';
import { DEFAULT_DISCORD_API_BASE_URL } from '../../config/environment.js';
import { untilAborted, withDeadline, type Deadline } from '../../utils/deadline.js';
import {
  AuthorizationRequest,
  CodeExchangeRequest,
  IdentityProviderClient,
  OAuthGrantType,
  RemoteUserProfile,
  RemoteUserProfileSchema,
  TokenExchangeResult,
  TokenExchangeResultSchema,
  TokenRefreshRequest,
  UpstreamCallOptions,
  UpstreamRequestFailedError,
  UpstreamResponseInvalidError,
  UpstreamUnauthorizedError
} from './types.js';

const PROVIDER = 'discord';

export interface DiscordClientOptions {
  apiBaseUrl?: string;
  /** Upper bound for every outbound call */
  timeoutMs?: number;
}

export class DiscordIdentityClient implements IdentityProviderClient {
  private readonly apiBaseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: DiscordClientOptions = {}) {
    this.apiBaseUrl = (options.apiBaseUrl ?? DEFAULT_DISCORD_API_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  /**
   * Build the authorization URL for a login redirect.
   *
   * The redirect URI is percent-encoded; scopes are joined with a literal
   * `+` and left unencoded, which is what the authorization endpoint expects.
   */
  buildAuthorizationUrl(request: AuthorizationRequest): URL {
    const query = [
      `client_id=${encodeURIComponent(request.clientId)}`,
      'response_type=code',
      `redirect_uri=${encodeURIComponent(request.redirectUri)}`,
      `scope=${request.scopes.join('+')}`,
    ].join('&');

    return new URL(`${this.apiBaseUrl}/oauth2/authorize?${query}`);
  }

  async exchangeCode(request: CodeExchangeRequest, options: UpstreamCallOptions = {}): Promise<TokenExchangeResult> {
    logger.authDebug('Exchanging authorization code', { codePrefix: tokenPrefix(request.code) });
    return this.requestToken('authorization_code', {
      client_id: request.clientId,
      client_secret: request.clientSecret,
      grant_type: 'authorization_code',
      code: request.code,
      redirect_uri: request.redirectUri,
    }, options);
  }

  async refreshToken(request: TokenRefreshRequest, options: UpstreamCallOptions = {}): Promise<TokenExchangeResult> {
    logger.authDebug('Refreshing access token', { refreshPrefix: tokenPrefix(request.refreshToken) });
    return this.requestToken('refresh_token', {
      client_id: request.clientId,
      client_secret: request.clientSecret,
      grant_type: 'refresh_token',
      refresh_token: request.refreshToken,
      redirect_uri: request.redirectUri,
    }, options);
  }

  async fetchCurrentUser(bearerToken: string, options: UpstreamCallOptions = {}): Promise<RemoteUserProfile> {
    return this.call(`${this.apiBaseUrl}/users/@me`, {
      method: 'GET',
      headers: {
        'Authorization': `Bearer ${bearerToken}`,
        'Accept': 'application/json',
      },
    }, options, 'user lookup', async (response) => {
      if (!response.ok) {
        let errorBody = '';
        try {
          errorBody = await response.text();
        } catch (error) {
          logger.authDebug('Could not read user lookup error body', error);
        }
        logger.authWarn('User lookup rejected', { status: response.status });
        throw new UpstreamUnauthorizedError(
          `Failed to fetch user profile: ${response.status} ${response.statusText}`,
          PROVIDER,
          { status: response.status, body: errorBody }
        );
      }

      return this.decode(response, RemoteUserProfileSchema, 'user profile');
    });
  }

  private async requestToken(
    grantType: OAuthGrantType,
    params: Record<string, string>,
    options: UpstreamCallOptions
  ): Promise<TokenExchangeResult> {
    return this.call(`${this.apiBaseUrl}/oauth2/token`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        'Accept': 'application/json',
      },
      body: new URLSearchParams(params).toString(),
    }, options, `${grantType} grant`,
    // The token shape decides success, not the status code
    (response) => this.decode(response, TokenExchangeResultSchema, `${grantType} grant`));
  }

  /**
   * Send one request and read its response, both under the same deadline
   */
  private async call<T>(
    url: string,
    init: RequestInit,
    options: UpstreamCallOptions,
    operation: string,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    return withDeadline(this.timeoutMs, options.signal, async (deadline) => {
      let response: Response;
      try {
        response = await untilAborted(fetch(url, { ...init, signal: deadline.signal }), deadline.signal);
      } catch (error) {
        throw this.requestFailed(error, deadline, operation);
      }

      try {
        return await untilAborted(read(response), deadline.signal);
      } catch (error) {
        if (deadline.signal.aborted) {
          throw this.requestFailed(error, deadline, operation);
        }
        throw error;
      }
    });
  }

  private requestFailed(error: unknown, deadline: Deadline, operation: string): UpstreamRequestFailedError {
    const timedOut = deadline.timedOut();
    logger.authError(`Error sending ${operation} request`, error);
    return new UpstreamRequestFailedError(
      timedOut
        ? `Request to Discord API timed out after ${this.timeoutMs}ms`
        : 'Failed to send request to Discord API',
      PROVIDER,
      { operation, timedOut }
    );
  }

  private async decode<T>(response: Response, schema: ZodType<T, ZodTypeDef, unknown>, what: string): Promise<T> {
    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      logger.authError(`Error parsing ${what} response`, error);
      throw new UpstreamResponseInvalidError(
        `Failed to parse ${what} response from Discord API`,
        PROVIDER,
        { status: response.status }
      );
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      logger.authError(`Unexpected ${what} response shape`, { status: response.status, issues: parsed.error.issues });
      throw new UpstreamResponseInvalidError(
        `Unexpected ${what} response from Discord API`,
        PROVIDER,
        { status: response.status }
      );
    }
    return parsed.data;
  }
}
