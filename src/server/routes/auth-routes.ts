/**
 * Session routes
 *
 * - GET /auth/login     start the OAuth2 flow
 * - GET /auth/redirect  OAuth2 redirect target
 * - GET /auth/status    current user, refreshing the session if needed
 * - GET /auth/logout    clear the session cookies
 */

import { Router, Request, Response } from 'express';
import type { SessionManager } from '../../auth/session-manager.js';
import { logger } from '../../observability/logger.js';

type SessionHandler = (req: Request, res: Response) => Promise<void>;

function guarded(name: string, handler: SessionHandler) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      await handler(req, res);
    } catch (error) {
      logger.authError(`Unhandled ${name} error`, error);
      if (!res.headersSent) {
        res.status(500).json({ error: 'server_error', error_description: `${name} failed` });
      }
    }
  };
}

export function setupAuthRoutes(router: Router, sessions: SessionManager): void {
  router.get('/auth/login', guarded('login', (req, res) => sessions.login(req, res)));
  router.get('/auth/redirect', guarded('redirect', (req, res) => sessions.redirectCallback(req, res)));
  router.get('/auth/status', guarded('status', (req, res) => sessions.statusCheck(req, res)));
  router.get('/auth/logout', guarded('logout', (req, res) => sessions.logout(req, res)));
}
