/**
 * Protected gateway routes
 *
 * HTTP requests are forwarded here; WebSocket upgrades for the same path
 * never reach Express and are handled on the server's `upgrade` event.
 */

import { Router, Request, Response } from 'express';
import type { GatewayRouter } from '../../gateway/gateway-router.js';
import { requireTrustedCaller } from '../middleware/access-guard.js';

// No capture group: Express would percent-decode it before the guard runs.
// The raw segment is handed to the gateway, which decodes it itself.
export const GATEWAY_PATH = /^\/guild\/gateway\/[^/]+\/?$/;

function shardSegment(path: string): string {
  return path.split('/')[3] ?? '';
}

export function setupGatewayRoutes(router: Router, gateway: GatewayRouter): void {
  router.all(GATEWAY_PATH, requireTrustedCaller(), async (req: Request, res: Response) => {
    await gateway.handleRequest(shardSegment(req.path), req, res);
  });
}
