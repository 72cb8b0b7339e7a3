import { EventEmitter } from 'node:events';
import type { RawData } from 'ws';
import type { InstanceChannel } from './types.js';

const NORMAL_CLOSURE = 1000;

class LinkedChannel implements InstanceChannel {
  private readonly events = new EventEmitter();
  private peer: LinkedChannel | undefined;
  private closed = false;

  link(peer: LinkedChannel): void {
    this.peer = peer;
  }

  send(data: Buffer, isBinary: boolean): void {
    if (this.closed || !this.peer) {
      return;
    }
    this.peer.deliver(data, isBinary);
  }

  close(code: number = NORMAL_CLOSURE, reason = ''): void {
    if (this.closed) {
      return;
    }
    this.finish(code, reason);
    this.peer?.finish(code, reason);
  }

  onMessage(listener: (data: Buffer, isBinary: boolean) => void): void {
    this.events.on('message', listener);
  }

  onClose(listener: (code: number, reason: string) => void): void {
    this.events.on('close', listener);
  }

  private deliver(data: Buffer, isBinary: boolean): void {
    if (!this.closed) {
      this.events.emit('message', data, isBinary);
    }
  }

  private finish(code: number, reason: string): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.events.emit('close', code, reason);
    this.events.removeAllListeners();
  }
}

/**
 * Create two in-memory channel ends: what one end sends the other
 * receives, and closing either end closes both.
 */
export function createChannelPair(): [InstanceChannel, InstanceChannel] {
  const a = new LinkedChannel();
  const b = new LinkedChannel();
  a.link(b);
  b.link(a);
  return [a, b];
}

/**
 * Map a received close code to one that may be sent on the wire
 * (1005 and 1006 are reported locally but never transmitted).
 */
export function relayableCloseCode(code: number): number {
  const valid = (code >= 1000 && code <= 1014 && code !== 1004 && code !== 1005 && code !== 1006)
    || (code >= 3000 && code <= 4999);
  return valid ? code : NORMAL_CLOSURE;
}

/**
 * Normalize a ws payload to a single Buffer
 */
export function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  return Buffer.from(data);
}
