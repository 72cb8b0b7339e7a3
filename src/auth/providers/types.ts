/**
 * Identity provider contract, wire schemas and error types
 */

import { z } from 'zod';
import type { OAuthClientCredentials } from '../../config/environment.js';

/**
 * OAuth2 scopes understood by the provider's authorization endpoint
 */
export type DiscordOAuth2Scope =
  | 'identify'
  | 'guilds'
  | 'email'
  | 'connections'
  | 'guilds.join'
  | 'guilds.members.read'
  | 'guilds.channels.read'
  | 'gdm.join'
  | 'bot'
  | 'applications.commands'
  | 'applications.commands.permissions.update'
  | 'applications.builds.read'
  | 'applications.builds.upload'
  | 'applications.entitlements'
  | 'applications.store.update'
  | 'activities.read'
  | 'activities.write'
  | 'messages.read'
  | 'relationships.read'
  | 'role_connections.write'
  | 'rpc'
  | 'rpc.activities.write'
  | 'rpc.notifications.read'
  | 'rpc.voice.read'
  | 'rpc.voice.write'
  | 'voice'
  | 'webhook.incoming'
  | 'dm_channels.read'
  | 'openid';

/**
 * Scopes requested by the dashboard login, in request order
 */
export const LOGIN_SCOPES: readonly DiscordOAuth2Scope[] = ['identify', 'guilds', 'email'];

export type OAuthGrantType = 'authorization_code' | 'refresh_token';

/**
 * Token endpoint response for both the authorization-code and the
 * refresh-token grant
 */
export const TokenExchangeResultSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
  token_type: z.string(),
  expires_in: z.number().int().nonnegative(),
  scope: z.string(),
});

export type TokenExchangeResult = z.infer<typeof TokenExchangeResultSchema>;

/**
 * `GET /users/@me` response, kept with the provider's field names
 */
export const RemoteUserProfileSchema = z.object({
  id: z.string(),
  username: z.string(),
  discriminator: z.string(),
  global_name: z.string().nullable().optional(),
  bot: z.boolean().nullable().optional(),
  avatar: z.string().nullable().optional(),
  verified: z.boolean(),
  email: z.string().nullable().optional(),
  flags: z.number().int().nonnegative(),
  banner: z.string().nullable().optional(),
  accent_color: z.number().int().nullable().optional(),
  premium_type: z.number().int().nonnegative(),
  public_flags: z.number().int().nonnegative(),
});

export type RemoteUserProfile = z.infer<typeof RemoteUserProfileSchema>;

export interface AuthorizationRequest {
  clientId: string;
  redirectUri: string;
  scopes: readonly DiscordOAuth2Scope[];
}

export interface CodeExchangeRequest extends OAuthClientCredentials {
  redirectUri: string;
  code: string;
}

export interface TokenRefreshRequest extends OAuthClientCredentials {
  redirectUri: string;
  refreshToken: string;
}

/**
 * Per-call options for outbound provider requests
 */
export interface UpstreamCallOptions {
  signal?: AbortSignal;
}

/**
 * Client for the identity provider's OAuth2 and user endpoints.
 *
 * Every call is a single request with no retry; failures surface as
 * {@link IdentityProviderError} subclasses.
 */
export interface IdentityProviderClient {
  buildAuthorizationUrl(request: AuthorizationRequest): URL;
  exchangeCode(request: CodeExchangeRequest, options?: UpstreamCallOptions): Promise<TokenExchangeResult>;
  refreshToken(request: TokenRefreshRequest, options?: UpstreamCallOptions): Promise<TokenExchangeResult>;
  fetchCurrentUser(bearerToken: string, options?: UpstreamCallOptions): Promise<RemoteUserProfile>;
}

export class IdentityProviderError extends Error {
  constructor(
    message: string,
    public code: string,
    public provider: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'IdentityProviderError';
  }
}

/**
 * The request never produced a response (transport error or deadline)
 */
export class UpstreamRequestFailedError extends IdentityProviderError {
  constructor(message: string, provider: string, details?: Record<string, unknown>) {
    super(message, 'upstream_request_failed', provider, details);
    this.name = 'UpstreamRequestFailedError';
  }
}

/**
 * The response body did not decode to the expected shape
 */
export class UpstreamResponseInvalidError extends IdentityProviderError {
  constructor(message: string, provider: string, details?: Record<string, unknown>) {
    super(message, 'upstream_response_invalid', provider, details);
    this.name = 'UpstreamResponseInvalidError';
  }
}

/**
 * The provider rejected the bearer token
 */
export class UpstreamUnauthorizedError extends IdentityProviderError {
  constructor(message: string, provider: string, details?: Record<string, unknown>) {
    super(message, 'upstream_unauthorized', provider, details);
    this.name = 'UpstreamUnauthorizedError';
  }
}

export class ConfigurationMissingError extends Error {
  readonly code = 'configuration_missing';

  constructor(public missing: string[]) {
    super(`Missing configuration: ${missing.join(', ')}`);
    this.name = 'ConfigurationMissingError';
  }
}
