/**
 * HTTP server for the dashboard API: session routes, the protected
 * gateway and its WebSocket upgrades
 */

import express, { Express, Request, Response, NextFunction, Router } from 'express';
import { createServer, type IncomingMessage, type Server as HttpServer } from 'node:http';
import type { Duplex } from 'node:stream';
import helmet from 'helmet';
import cors from 'cors';
import type { AppConfig } from '../config/environment.js';
import { DiscordIdentityClient } from '../auth/providers/discord-client.js';
import type { IdentityProviderClient } from '../auth/providers/types.js';
import { SessionManager } from '../auth/session-manager.js';
import { Database } from '../database/database.js';
import { GatewayRouter, rejectUpgrade } from '../gateway/gateway-router.js';
import { LocalInstanceNamespace } from '../gateway/local-namespace.js';
import { RemoteInstanceNamespace } from '../gateway/remote-namespace.js';
import type { InstanceNamespace } from '../gateway/types.js';
import { logger } from '../observability/logger.js';
import { classifyHeaders, describeCaller } from './middleware/access-guard.js';
import { setupAuthRoutes } from './routes/auth-routes.js';
import { setupGatewayRoutes } from './routes/gateway-routes.js';
import { setupHealthRoutes } from './routes/health-routes.js';

export const API_PREFIX = '/api';

const UPGRADE_PATH = /^\/api\/guild\/gateway\/([^/]+)\/?$/;

export interface ApiHttpServerOptions {
  config: AppConfig;
  version?: string;
  identityClient?: IdentityProviderClient;
  namespace?: InstanceNamespace;
  database?: Database;
}

/**
 * Pick the instance namespace: the node registry when nodes are
 * configured, the in-process host otherwise
 */
export function createInstanceNamespace(config: AppConfig): InstanceNamespace {
  if (config.gateway.nodes.length > 0) {
    return new RemoteInstanceNamespace({ namespace: config.gateway.namespace, nodes: config.gateway.nodes });
  }
  return new LocalInstanceNamespace({ namespace: config.gateway.namespace });
}

export class ApiHttpServer {
  private app: Express;
  private server?: HttpServer;
  private readonly gateway: GatewayRouter;
  private readonly sessions: SessionManager;
  private readonly database?: Database;

  constructor(private options: ApiHttpServerOptions) {
    const { config } = options;

    const identityClient = options.identityClient ?? new DiscordIdentityClient({
      apiBaseUrl: config.discord.apiBaseUrl,
      timeoutMs: config.upstreamTimeoutMs,
    });
    this.sessions = new SessionManager({
      dashboardUrl: config.dashboardUrl,
      redirectUri: config.redirectUri,
      credentials: config.discord.credentials,
    }, identityClient);

    this.gateway = new GatewayRouter({
      namespace: options.namespace ?? createInstanceNamespace(config),
      timeoutMs: config.upstreamTimeoutMs,
    });

    this.database = options.database
      ?? (config.databaseUrl ? new Database({ connectionString: config.databaseUrl }) : undefined);

    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  /**
   * Set up Express middleware for security and functionality
   */
  private setupMiddleware(): void {
    this.app.disable('x-powered-by');

    // Gateway responses are relayed as the instance sent them; security
    // headers only go on responses this server writes itself
    const securityHeaders = helmet({
      crossOriginResourcePolicy: { policy: 'cross-origin' },
    });
    this.app.get(['/', '/health'], securityHeaders);
    this.app.use(`${API_PREFIX}/auth`, securityHeaders);

    const corsOptions: cors.CorsOptions = {
      origin: this.options.config.dashboardUrl,
      credentials: true,
      methods: ['GET', 'POST', 'PUT', 'DELETE'],
    };
    this.app.use(cors(corsOptions));

    // No body parsing: gateway bodies stream through untouched
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      const started = Date.now();
      res.on('finish', () => {
        logger.info('HTTP request', {
          method: req.method,
          path: req.path,
          status: res.statusCode,
          durationMs: Date.now() - started,
        });
      });
      next();
    });
  }

  private setupRoutes(): void {
    const root = Router();
    setupHealthRoutes(root, { database: this.database, version: this.options.version ?? '0.0.0' });
    this.app.use(root);

    const api = Router();
    setupAuthRoutes(api, this.sessions);
    setupGatewayRoutes(api, this.gateway);
    this.app.use(API_PREFIX, api);

    this.app.use((_req: Request, res: Response) => {
      res.status(404).type('text/plain').send('Not Found');
    });

    // Catch-all error handler
    this.app.use((error: Error, _req: Request, res: Response, _next: NextFunction) => {
      if (res.headersSent) {
        logger.error('Express error', error);
        res.destroy();
        return;
      }
      // Express and its parsers tag client errors with a 4xx status
      const status = 'status' in error && typeof error.status === 'number' ? error.status : 500;
      if (status >= 400 && status < 500) {
        logger.warn('Rejected malformed request', { status, message: error.message });
        res.status(status).json({ error: 'invalid_request', error_description: 'Malformed request' });
        return;
      }
      logger.error('Express error', error);
      res.status(500).json({
        error: 'Internal server error',
        message: this.options.config.environment === 'development' ? error.message : 'Something went wrong',
      });
    });
  }

  /**
   * Route an HTTP upgrade. Only the gateway path upgrades; everything
   * else is answered with a raw status and closed.
   */
  async handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): Promise<void> {
    const pathname = new URL(req.url ?? '/', 'http://upgrade.internal').pathname;
    const match = UPGRADE_PATH.exec(pathname);
    if (!match?.[1]) {
      rejectUpgrade(socket, 404, { error: 'not_found', error_description: 'Not Found' });
      return;
    }

    const guard = classifyHeaders(req.headers);
    if (!guard.ok) {
      logger.warn('Access guard rejected upgrade', { path: pathname, status: guard.status });
      rejectUpgrade(socket, guard.status, { error: guard.error, error_description: guard.error_description });
      return;
    }
    logger.debug('Access guard admitted upgrade', describeCaller(guard.caller));

    await this.gateway.handleUpgrade(match[1], req, socket, head);
  }

  /**
   * Start the HTTP server
   */
  async start(): Promise<void> {
    const { port, host } = this.options.config.server;

    this.server = createServer(this.app);
    this.server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      socket.on('error', (error) => logger.gatewayDebug('Upgrade socket error', { message: error.message }));
      this.handleUpgrade(req, socket, head).catch((error: unknown) => {
        logger.gatewayError('Upgrade handling failed', error);
        socket.destroy();
      });
    });

    const server = this.server;
    return new Promise((resolve, reject) => {
      server.once('error', (error: Error) => {
        logger.error('HTTP server error', error);
        reject(error);
      });

      server.listen(port, host, () => {
        logger.info('HTTP server listening', { host, port: this.getPort() });
        resolve();
      });
    });
  }

  /**
   * Stop the HTTP server, closing bridged sockets and the database pool
   */
  async stop(): Promise<void> {
    await this.gateway.close();

    const server = this.server;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((error?: Error) => (error ? reject(error) : resolve()));
        server.closeAllConnections();
      });
      this.server = undefined;
      logger.info('HTTP server stopped');
    }

    if (this.database) {
      await this.database.close();
    }
  }

  /**
   * Bound port; differs from the configured one when that is 0
   */
  getPort(): number {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : this.options.config.server.port;
  }

  /**
   * Get the Express app for testing or customization
   */
  getApp(): Express {
    return this.app;
  }
}
