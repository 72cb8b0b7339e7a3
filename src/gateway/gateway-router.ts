/**
 * Gateway Router
 *
 * Resolves a shard identifier to its durable instance and forwards the
 * request or WebSocket upgrade to it. Every step fails with its own
 * status: an invalid identifier (400), a failed lookup (503), an
 * unobtainable instance (502), an unreachable backend (502) or a backend
 * that did not answer in time (504).
 */

import { STATUS_CODES, type IncomingMessage } from 'node:http';
import type { Duplex } from 'node:stream';
import type { Request as ExpressRequest, Response as ExpressResponse } from 'express';
import WebSocket, { WebSocketServer } from 'ws';
import { logger } from '../observability/logger.js';
import { abortOnClose, withDeadline, type Deadline } from '../utils/deadline.js';
import { relayableCloseCode, toBuffer } from './channel.js';
import { decodeShardSegment } from './instance-id.js';
import { relayResponse, toFetchRequest } from './request-bridge.js';
import {
  BackendTimeoutError,
  BackendUnreachableError,
  GatewayError,
  InstanceChannel,
  InstanceHandle,
  InstanceLookupError,
  InstanceNamespace
} from './types.js';

export interface GatewayRouterOptions {
  namespace: InstanceNamespace;
  /** Deadline for reaching the instance, per request */
  timeoutMs: number;
}

/**
 * Answer a not-yet-upgraded socket with a plain HTTP response and close it
 */
export function rejectUpgrade(socket: Duplex, status: number, body: Record<string, string>): void {
  const payload = JSON.stringify(body);
  socket.end(
    `HTTP/1.1 ${status} ${STATUS_CODES[status] ?? 'Error'}\r\n`
    + 'Connection: close\r\n'
    + 'Content-Type: application/json; charset=utf-8\r\n'
    + `Content-Length: ${Buffer.byteLength(payload)}\r\n`
    + '\r\n'
    + payload
  );
}

function errorBody(error: GatewayError): Record<string, string> {
  return { error: error.code, error_description: error.message };
}

export class GatewayRouter {
  private readonly namespace: InstanceNamespace;
  private readonly timeoutMs: number;
  private readonly wss = new WebSocketServer({ noServer: true });

  constructor(options: GatewayRouterOptions) {
    this.namespace = options.namespace;
    this.timeoutMs = options.timeoutMs;
  }

  /** Number of bridged WebSocket clients */
  get connectionCount(): number {
    return this.wss.clients.size;
  }

  /**
   * Forward an HTTP request to the instance named by `segment`, the raw
   * (still percent-encoded) path segment
   */
  async handleRequest(segment: string, req: ExpressRequest, res: ExpressResponse): Promise<void> {
    let response: Response;
    try {
      const handle = this.resolve(segment);
      const request = toFetchRequest(req, req.originalUrl);
      response = await withDeadline(this.timeoutMs, abortOnClose(res), async (deadline) => {
        try {
          return await this.namespace.forward(handle, request, deadline.signal);
        } catch (error) {
          throw this.classifyFailure(error, deadline, handle);
        }
      });
    } catch (error) {
      const failure = this.toGatewayError(error);
      logger.gatewayWarn('Gateway request failed', { segment, code: failure.code, status: failure.status });
      res.status(failure.status).json(errorBody(failure));
      return;
    }

    try {
      await relayResponse(response, res);
    } catch (error) {
      // Headers are already on the wire; only the connection can signal the failure
      logger.gatewayError('Relaying instance response failed', error);
      res.destroy();
    }
  }

  /**
   * Bridge a WebSocket upgrade to the instance named by the raw path
   * `segment`. The client is only accepted once the instance side is
   * connected.
   */
  async handleUpgrade(segment: string, req: IncomingMessage, socket: Duplex, head: Buffer): Promise<void> {
    let bridged: { handle: InstanceHandle; channel: InstanceChannel };
    try {
      const handle = this.resolve(segment);
      const request = toFetchRequest(req, req.url ?? '/');
      const channel = await withDeadline(this.timeoutMs, abortOnClose(socket), async (deadline) => {
        try {
          return await this.namespace.connect(handle, request, deadline.signal);
        } catch (error) {
          throw this.classifyFailure(error, deadline, handle);
        }
      });
      bridged = { handle, channel };
    } catch (error) {
      const failure = this.toGatewayError(error);
      logger.gatewayWarn('Gateway upgrade failed', { segment, code: failure.code, status: failure.status });
      rejectUpgrade(socket, failure.status, errorBody(failure));
      return;
    }

    const { handle, channel } = bridged;
    if (socket.destroyed) {
      logger.gatewayDebug('Client left before the upgrade completed', { id: handle.id });
      channel.close(1001, 'Client went away');
      return;
    }

    this.wss.handleUpgrade(req, socket, head, (client) => {
      this.bridge(client, channel, handle);
    });
  }

  /**
   * Close every bridged connection
   */
  async close(): Promise<void> {
    for (const client of this.wss.clients) {
      client.close(1001, 'Server shutting down');
    }
    await new Promise<void>((resolve, reject) => {
      this.wss.close((error) => (error ? reject(error) : resolve()));
    });
  }

  private resolve(segment: string): InstanceHandle {
    const identifier = decodeShardSegment(segment);
    try {
      return this.namespace.resolve(identifier);
    } catch (error) {
      if (error instanceof GatewayError) {
        throw error;
      }
      logger.gatewayError('Instance lookup failed', error);
      throw new InstanceLookupError('Failed to look up durable instance');
    }
  }

  private classifyFailure(error: unknown, deadline: Deadline, handle: InstanceHandle): GatewayError {
    if (error instanceof GatewayError) {
      return error;
    }
    if (deadline.timedOut()) {
      return new BackendTimeoutError(this.timeoutMs);
    }
    logger.gatewayError('Durable instance unreachable', error);
    return new BackendUnreachableError('Failed to reach durable instance', {
      id: handle.id,
      aborted: deadline.signal.aborted,
    });
  }

  private toGatewayError(error: unknown): GatewayError {
    if (error instanceof GatewayError) {
      return error;
    }
    logger.gatewayError('Unexpected gateway failure', error);
    return new BackendUnreachableError('Failed to reach durable instance');
  }

  private bridge(client: WebSocket, channel: InstanceChannel, handle: InstanceHandle): void {
    logger.gatewayInfo('WebSocket bridged to instance', { id: handle.id, name: handle.name });

    client.on('message', (data, isBinary) => channel.send(toBuffer(data), isBinary));
    client.on('close', (code, reason) => channel.close(relayableCloseCode(code), reason.toString()));
    client.on('error', (error) => logger.gatewayWarn('Client socket error', { id: handle.id, message: error.message }));

    channel.onMessage((data, isBinary) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(data, { binary: isBinary });
      }
    });
    channel.onClose((code, reason) => {
      if (client.readyState === WebSocket.OPEN) {
        client.close(relayableCloseCode(code), reason);
      }
    });
  }
}
