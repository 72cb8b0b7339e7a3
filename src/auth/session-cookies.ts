/**
 * Session cookie pair
 *
 * The session lives entirely in two client-held cookies. Both are always
 * set or cleared together, with identical attributes.
 */

import type { CookieAttributes, CookieJar } from './cookies/cookie-jar.js';
import type { TokenExchangeResult } from './providers/types.js';

export const ACCESS_TOKEN_COOKIE = 'discord_token';
export const REFRESH_TOKEN_COOKIE = 'discord_refresh_token';

const SESSION_COOKIE_ATTRIBUTES: Readonly<CookieAttributes> = {
  path: '/',
  httpOnly: true,
  secure: true,
  sameSite: 'none',
};

/**
 * Add the access cookie (expiring with the token) and the refresh cookie
 * (no expiry) minted from a token grant.
 */
export function addSessionCookies(jar: CookieJar, tokens: TokenExchangeResult): CookieJar {
  return jar
    .add({
      name: ACCESS_TOKEN_COOKIE,
      value: tokens.access_token,
      attributes: { ...SESSION_COOKIE_ATTRIBUTES, maxAge: tokens.expires_in },
    })
    .add({
      name: REFRESH_TOKEN_COOKIE,
      value: tokens.refresh_token,
      attributes: { ...SESSION_COOKIE_ATTRIBUTES },
    });
}

/**
 * Expire both session cookies, whether or not the request carried them
 */
export function clearSessionCookies(jar: CookieJar): CookieJar {
  return jar
    .add({
      name: ACCESS_TOKEN_COOKIE,
      value: '',
      attributes: { ...SESSION_COOKIE_ATTRIBUTES, maxAge: 0 },
    })
    .add({
      name: REFRESH_TOKEN_COOKIE,
      value: '',
      attributes: { ...SESSION_COOKIE_ATTRIBUTES, maxAge: 0 },
    });
}
