/**
 * Durable instance contract and gateway error types
 */

/**
 * Resolved address of one durable instance. Resolution is deterministic:
 * the same identifier always yields the same `id`.
 */
export interface InstanceHandle {
  /** Stable instance id (hex) */
  id: string;
  /** Shard identifier the handle was resolved from */
  name: string;
  /** Base URL of the node hosting the instance, when it is not in-process */
  node?: string;
}

/**
 * Bidirectional message channel to an instance's WebSocket side
 */
export interface InstanceChannel {
  send(data: Buffer, isBinary: boolean): void;
  close(code?: number, reason?: string): void;
  onMessage(listener: (data: Buffer, isBinary: boolean) => void): void;
  onClose(listener: (code: number, reason: string) => void): void;
}

/**
 * Name-to-instance addressing primitive.
 *
 * Instances serialize the requests they receive; callers perform no
 * locking and must not assume more than one instance per identifier.
 */
export interface InstanceNamespace {
  readonly kind: string;
  resolve(identifier: string): InstanceHandle;
  forward(handle: InstanceHandle, request: Request, signal: AbortSignal): Promise<Response>;
  connect(handle: InstanceHandle, request: Request, signal: AbortSignal): Promise<InstanceChannel>;
}

export class GatewayError extends Error {
  constructor(
    message: string,
    public code: string,
    public status: number,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GatewayError';
  }
}

export class InvalidShardIdentifierError extends GatewayError {
  constructor(identifier: string) {
    super('Invalid shard identifier', 'invalid_shard_identifier', 400, { length: identifier.length });
    this.name = 'InvalidShardIdentifierError';
  }
}

/**
 * The namespace could not map the identifier to an instance
 */
export class InstanceLookupError extends GatewayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'instance_lookup_failed', 503, details);
    this.name = 'InstanceLookupError';
  }
}

/**
 * The instance was addressed but could not be obtained
 */
export class InstanceHandleError extends GatewayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'instance_unavailable', 502, details);
    this.name = 'InstanceHandleError';
  }
}

export class BackendUnreachableError extends GatewayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'backend_unreachable', 502, details);
    this.name = 'BackendUnreachableError';
  }
}

export class BackendTimeoutError extends GatewayError {
  constructor(timeoutMs: number) {
    super(`Backend did not answer within ${timeoutMs}ms`, 'backend_timeout', 504, { timeoutMs });
    this.name = 'BackendTimeoutError';
  }
}
