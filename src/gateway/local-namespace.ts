/**
 * In-process instance host
 *
 * Instances are created lazily on first use and live for the lifetime of
 * the process. Each instance sees its HTTP requests one at a time, in
 * arrival order.
 */

import { logger } from '../observability/logger.js';
import { untilAborted } from '../utils/deadline.js';
import { createChannelPair } from './channel.js';
import { deriveInstanceId } from './instance-id.js';
import {
  InstanceChannel,
  InstanceHandle,
  InstanceHandleError,
  InstanceNamespace
} from './types.js';

/**
 * A stateful backend unit addressed by shard identifier
 */
export interface DurableInstance {
  fetch(request: Request): Promise<Response>;
  /** Take ownership of the instance side of a WebSocket connection */
  accept(channel: InstanceChannel, request: Request): void;
}

export type InstanceFactory = (handle: InstanceHandle) => DurableInstance;

/**
 * Broadcast room: every message from one connection is relayed to all
 * other connections of the same room.
 */
export class BotRoom implements DurableInstance {
  private readonly connections = new Set<InstanceChannel>();

  constructor(private readonly handle: InstanceHandle) {}

  get connectionCount(): number {
    return this.connections.size;
  }

  async fetch(request: Request): Promise<Response> {
    if (request.method !== 'GET' && request.method !== 'HEAD') {
      return new Response('Method Not Allowed', { status: 405, headers: { 'Allow': 'GET, HEAD' } });
    }
    return Response.json({
      id: this.handle.id,
      name: this.handle.name,
      connections: this.connections.size,
    });
  }

  accept(channel: InstanceChannel): void {
    this.connections.add(channel);
    logger.gatewayDebug('Room connection opened', { room: this.handle.name, connections: this.connections.size });

    channel.onMessage((data, isBinary) => {
      for (const other of this.connections) {
        if (other !== channel) {
          other.send(data, isBinary);
        }
      }
    });

    channel.onClose(() => {
      this.connections.delete(channel);
      logger.gatewayDebug('Room connection closed', { room: this.handle.name, connections: this.connections.size });
    });
  }
}

interface HostedInstance {
  instance: DurableInstance;
  /** Tail of the request queue */
  tail: Promise<void>;
}

export interface LocalNamespaceOptions {
  namespace: string;
  factory?: InstanceFactory;
}

export class LocalInstanceNamespace implements InstanceNamespace {
  readonly kind = 'local';
  private readonly namespace: string;
  private readonly factory: InstanceFactory;
  private readonly instances = new Map<string, HostedInstance>();

  constructor(options: LocalNamespaceOptions) {
    this.namespace = options.namespace;
    this.factory = options.factory ?? ((handle) => new BotRoom(handle));
  }

  get size(): number {
    return this.instances.size;
  }

  resolve(identifier: string): InstanceHandle {
    return { id: deriveInstanceId(this.namespace, identifier), name: identifier };
  }

  async forward(handle: InstanceHandle, request: Request, signal: AbortSignal): Promise<Response> {
    const hosted = this.obtain(handle);

    const run = hosted.tail.then(() => {
      if (signal.aborted) {
        throw signal.reason;
      }
      return hosted.instance.fetch(request);
    });
    // Failures reach the caller through `run`; the queue only needs ordering
    hosted.tail = run.then(() => undefined, () => undefined);

    return untilAborted(run, signal);
  }

  async connect(handle: InstanceHandle, request: Request, signal: AbortSignal): Promise<InstanceChannel> {
    if (signal.aborted) {
      throw signal.reason;
    }
    const hosted = this.obtain(handle);
    const [clientSide, instanceSide] = createChannelPair();
    hosted.instance.accept(instanceSide, request);
    return clientSide;
  }

  private obtain(handle: InstanceHandle): HostedInstance {
    const existing = this.instances.get(handle.id);
    if (existing) {
      return existing;
    }

    let instance: DurableInstance;
    try {
      instance = this.factory(handle);
    } catch (error) {
      logger.gatewayError('Failed to create instance', error);
      throw new InstanceHandleError('Failed to create durable instance', { id: handle.id });
    }

    const hosted: HostedInstance = { instance, tail: Promise.resolve() };
    this.instances.set(handle.id, hosted);
    logger.gatewayInfo('Instance created', { id: handle.id, name: handle.name });
    return hosted;
  }
}
