import type { Envelope } from '@drawboard/shared';
import type { BoardMetrics } from '../metrics';
import type { Connection } from './connection';
import { isBenignSocketError } from './errors';
import { encodeEnvelope } from './protocol';

export interface BroadcastReport {
  delivered: number;
  dropped: number;
}

export interface RegistryOptions {
  writeTimeoutMs: number;
  metrics?: BoardMetrics;
}

/**
 * The live set of push connections. Mutations are synchronous, and a
 * broadcast takes its target snapshot and issues every send within one
 * tick, so no connection can join or leave in the middle of a fan-out.
 */
export class ConnectionRegistry {
  private readonly connections = new Set<Connection>();

  constructor(private readonly options: RegistryOptions) {}

  get size(): number {
    return this.connections.size;
  }

  has(conn: Connection): boolean {
    return this.connections.has(conn);
  }

  register(conn: Connection): void {
    if (!conn.isAlive || this.connections.has(conn)) return;
    this.connections.add(conn);
    conn.signal.addEventListener('abort', () => this.unregister(conn), { once: true });
  }

  unregister(conn: Connection): void {
    this.connections.delete(conn);
  }

  /**
   * Sends the envelope to every registered connection. A connection whose
   * send fails or misses the write deadline is killed and removed; the rest
   * still receive the message.
   */
  async broadcast(envelope: Envelope): Promise<BroadcastReport> {
    const payload = encodeEnvelope(envelope);
    const targets = Array.from(this.connections);
    const results = await Promise.allSettled(
      targets.map((conn) => conn.send(payload, this.options.writeTimeoutMs)),
    );

    let delivered = 0;
    let dropped = 0;
    results.forEach((result, i) => {
      if (result.status === 'fulfilled') {
        delivered++;
        return;
      }
      const conn = targets[i];
      if (isBenignSocketError(result.reason)) {
        console.debug(`[Hub] Send to connection ${conn.id} failed: ${String(result.reason)}`);
      } else {
        console.error(`[Hub] Send to connection ${conn.id} failed:`, result.reason);
      }
      conn.kill('broadcast send failed');
      this.unregister(conn);
      dropped++;
    });

    this.options.metrics?.broadcastSends.inc({ outcome: 'delivered' }, delivered);
    this.options.metrics?.broadcastSends.inc({ outcome: 'dropped' }, dropped);
    return { delivered, dropped };
  }

  /** Closes every connection with a close frame; used on shutdown. */
  closeAll(code: number, reason: string): void {
    for (const conn of Array.from(this.connections)) {
      conn.close(code, reason);
    }
    this.connections.clear();
  }
}
