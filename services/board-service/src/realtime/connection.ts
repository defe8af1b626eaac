import type { EventEmitter } from 'events';
import { WebSocket } from 'ws';
import { ConnectionClosedError, WriteTimeoutError } from './errors';

/** The slice of a `ws` socket the hub relies on. */
export interface PeerSocket extends EventEmitter {
  readonly readyState: number;
  send(data: string | Buffer, cb?: (err?: Error) => void): void;
  ping(data?: unknown, mask?: boolean, cb?: (err?: Error) => void): void;
  close(code?: number, data?: string | Buffer): void;
  terminate(): void;
}

export type LivenessState = 'active' | 'dead';

let nextConnectionId = 1;

/**
 * A registered push channel and its liveness state. ACTIVE until the first
 * close, kill or peer disconnect; DEAD is terminal and aborts `signal`, which
 * stops the session loop and heartbeat task bound to it.
 */
export class Connection {
  readonly id = nextConnectionId++;
  private state: LivenessState = 'active';
  private readonly controller = new AbortController();

  constructor(
    readonly socket: PeerSocket,
    readonly remoteAddress: string,
  ) {}

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get liveness(): LivenessState {
    return this.state;
  }

  get isAlive(): boolean {
    return this.state === 'active';
  }

  send(payload: string, timeoutMs: number): Promise<void> {
    return this.write((done) => this.socket.send(payload, done), timeoutMs);
  }

  ping(timeoutMs: number): Promise<void> {
    return this.write((done) => this.socket.ping(undefined, undefined, done), timeoutMs);
  }

  /** Failure path: drops the transport without a close handshake. */
  kill(reason: string): void {
    if (!this.markDead(reason)) return;
    if (this.socket.readyState !== WebSocket.CLOSED) {
      this.socket.terminate();
    }
  }

  /** Graceful path: sends a close frame. */
  close(code: number, reason: string): void {
    if (!this.markDead(reason)) return;
    if (this.socket.readyState === WebSocket.OPEN || this.socket.readyState === WebSocket.CONNECTING) {
      this.socket.close(code, reason);
    }
  }

  /** Records a close the peer or transport already performed. */
  markClosed(reason: string): void {
    this.markDead(reason);
  }

  private markDead(reason: string): boolean {
    if (this.state === 'dead') return false;
    this.state = 'dead';
    this.controller.abort(new ConnectionClosedError(this.id));
    console.debug(`[WS] Connection ${this.id} (${this.remoteAddress}) is dead: ${reason}`);
    return true;
  }

  private write(op: (done: (err?: Error) => void) => void, timeoutMs: number): Promise<void> {
    if (this.state === 'dead' || this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new ConnectionClosedError(this.id));
    }
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => reject(new WriteTimeoutError(this.id, timeoutMs)), timeoutMs);
      const done = (err?: Error) => {
        clearTimeout(timer);
        if (err) reject(err);
        else resolve();
      };
      try {
        op(done);
      } catch (err) {
        clearTimeout(timer);
        reject(err);
      }
    });
  }
}
