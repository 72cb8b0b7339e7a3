/**
 * Access Guard Middleware
 *
 * Gates protected routes on the caller-identity header. The header must be
 * exactly two whitespace-separated tokens: a tier marker and the tier's
 * payload.
 *
 *   User-Agent: DiscordBot <token>     -> bot tier
 *   User-Agent: DiscordGuild <guildId> -> guild tier
 *
 * The classification is attached to the request for deeper handlers; the
 * guard itself does not route on it.
 */

import type { IncomingHttpHeaders } from 'node:http';
import type { Request, Response, NextFunction } from 'express';
import { logger, tokenPrefix } from '../../observability/logger.js';

export const CALLER_IDENTITY_HEADER = 'user-agent';

export type TrustedCaller =
  | { tier: 'bot'; token: string }
  | { tier: 'guild'; guildId: string };

export type CallerClassification =
  | { ok: true; caller: TrustedCaller }
  | { ok: false; status: 400 | 401; error: string; error_description: string };

declare global {
  namespace Express {
    interface Request {
      caller?: TrustedCaller;
    }
  }
}

export function classifyCaller(headerValue: string | undefined): CallerClassification {
  if (headerValue === undefined) {
    return {
      ok: false,
      status: 400,
      error: 'invalid_request',
      error_description: 'Missing caller identity header',
    };
  }

  const tokens = headerValue.trim().split(/\s+/);
  if (tokens.length === 2) {
    const [marker, payload] = tokens;
    if (marker === 'DiscordBot' && payload) {
      return { ok: true, caller: { tier: 'bot', token: payload } };
    }
    if (marker === 'DiscordGuild' && payload) {
      return { ok: true, caller: { tier: 'guild', guildId: payload } };
    }
  }

  return {
    ok: false,
    status: 401,
    error: 'unauthorized',
    error_description: 'Unrecognized caller',
  };
}

/**
 * Classify from raw Node headers; used on the upgrade path where no
 * Express request exists.
 */
export function classifyHeaders(headers: IncomingHttpHeaders): CallerClassification {
  return classifyCaller(headers[CALLER_IDENTITY_HEADER]);
}

export function describeCaller(caller: TrustedCaller): Record<string, string> {
  return caller.tier === 'bot'
    ? { tier: caller.tier, tokenPrefix: tokenPrefix(caller.token) }
    : { tier: caller.tier, guildId: caller.guildId };
}

/**
 * Create middleware that admits only recognized callers
 */
export function requireTrustedCaller() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = classifyHeaders(req.headers);

    if (!result.ok) {
      logger.warn('Access guard rejected request', {
        path: req.path,
        method: req.method,
        status: result.status,
      });
      res.status(result.status).json({
        error: result.error,
        error_description: result.error_description,
      });
      return;
    }

    req.caller = result.caller;
    logger.debug('Access guard admitted request', { path: req.path, ...describeCaller(result.caller) });
    next();
  };
}
