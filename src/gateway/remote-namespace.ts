/**
 * Direct-addressing registry over a fixed list of instance nodes
 *
 * Each instance id is owned by exactly one node, chosen by rendezvous
 * hashing: the node with the highest hash of `node|id` wins. The choice
 * only depends on the node list, so every router process agrees on it.
 */

import { createHash } from 'node:crypto';
import WebSocket, { type RawData } from 'ws';
import { logger } from '../observability/logger.js';
import { toBuffer } from './channel.js';
import { deriveInstanceId } from './instance-id.js';
import {
  InstanceChannel,
  InstanceHandle,
  InstanceHandleError,
  InstanceLookupError,
  InstanceNamespace
} from './types.js';

export const INSTANCE_NAME_HEADER = 'x-instance-name';

// Handshake headers owned by the WebSocket client library
const HANDSHAKE_HEADERS = new Set([
  'sec-websocket-key',
  'sec-websocket-version',
  'sec-websocket-extensions',
  'sec-websocket-protocol',
]);

function nodeScore(node: string, id: string): bigint {
  return createHash('sha256').update(`${node}|${id}`).digest().readBigUInt64BE(0);
}

/**
 * Pick the owning node for `id`
 */
export function selectNode(nodes: readonly string[], id: string): string | undefined {
  let best: string | undefined;
  let bestScore = -1n;
  for (const node of nodes) {
    const score = nodeScore(node, id);
    if (score > bestScore) {
      best = node;
      bestScore = score;
    }
  }
  return best;
}

class WebSocketChannel implements InstanceChannel {
  constructor(private readonly socket: WebSocket) {}

  send(data: Buffer, isBinary: boolean): void {
    if (this.socket.readyState === WebSocket.OPEN) {
      this.socket.send(data, { binary: isBinary });
    }
  }

  close(code?: number, reason?: string): void {
    if (this.socket.readyState === WebSocket.OPEN || this.socket.readyState === WebSocket.CONNECTING) {
      this.socket.close(code, reason);
    }
  }

  onMessage(listener: (data: Buffer, isBinary: boolean) => void): void {
    this.socket.on('message', (data: RawData, isBinary: boolean) => listener(toBuffer(data), isBinary));
  }

  onClose(listener: (code: number, reason: string) => void): void {
    this.socket.on('close', (code: number, reason: Buffer) => listener(code, reason.toString()));
  }
}

export interface RemoteNamespaceOptions {
  namespace: string;
  nodes: readonly string[];
}

export class RemoteInstanceNamespace implements InstanceNamespace {
  readonly kind = 'remote';
  private readonly namespace: string;
  private readonly nodes: readonly string[];

  constructor(options: RemoteNamespaceOptions) {
    this.namespace = options.namespace;
    this.nodes = options.nodes.map((node) => node.replace(/\/+$/, ''));
  }

  resolve(identifier: string): InstanceHandle {
    const id = deriveInstanceId(this.namespace, identifier);
    const node = selectNode(this.nodes, id);
    if (!node) {
      throw new InstanceLookupError('No instance nodes are configured', { namespace: this.namespace });
    }
    return { id, name: identifier, node };
  }

  async forward(handle: InstanceHandle, request: Request, signal: AbortSignal): Promise<Response> {
    const target = this.instanceUrl(handle, request);
    const headers = new Headers(request.headers);
    headers.set(INSTANCE_NAME_HEADER, handle.name);

    logger.gatewayDebug('Forwarding request to instance node', { id: handle.id, node: handle.node, method: request.method });

    return fetch(target, {
      method: request.method,
      headers,
      body: request.body,
      duplex: 'half',
      redirect: 'manual',
      signal,
    });
  }

  async connect(handle: InstanceHandle, request: Request, signal: AbortSignal): Promise<InstanceChannel> {
    const target = this.instanceUrl(handle, request);
    target.protocol = target.protocol === 'https:' ? 'wss:' : 'ws:';

    const headers: Record<string, string> = {};
    request.headers.forEach((value, name) => {
      if (!HANDSHAKE_HEADERS.has(name)) {
        headers[name] = value;
      }
    });
    headers[INSTANCE_NAME_HEADER] = handle.name;

    if (signal.aborted) {
      throw signal.reason;
    }
    const socket = new WebSocket(target, { headers });

    return new Promise<InstanceChannel>((resolve, reject) => {
      const cleanup = () => {
        signal.removeEventListener('abort', onAbort);
        socket.removeAllListeners('open');
        socket.removeAllListeners('unexpected-response');
      };
      const onAbort = () => {
        cleanup();
        socket.terminate();
        reject(signal.reason);
      };
      signal.addEventListener('abort', onAbort, { once: true });

      socket.once('open', () => {
        cleanup();
        resolve(new WebSocketChannel(socket));
      });
      socket.once('unexpected-response', (_req, res) => {
        cleanup();
        socket.terminate();
        reject(new InstanceHandleError('Instance node refused the connection', {
          id: handle.id,
          status: res.statusCode,
        }));
      });
      // Stays attached for the socket's lifetime; later errors are followed by 'close'
      socket.on('error', (error) => {
        logger.gatewayDebug('Instance socket error', { id: handle.id, message: error.message });
        cleanup();
        reject(error);
      });
    });
  }

  private instanceUrl(handle: InstanceHandle, request: Request): URL {
    if (!handle.node) {
      throw new InstanceHandleError('Handle carries no node address', { id: handle.id });
    }
    const target = new URL(`${handle.node}/instances/${handle.id}`);
    target.search = new URL(request.url).search;
    return target;
  }
}
