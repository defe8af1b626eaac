import { setInterval as every } from 'timers/promises';
import type { Connection } from './connection';
import { isAbortError, isBenignSocketError } from './errors';

export interface LivenessOptions {
  readTimeoutMs: number;
  heartbeatIntervalMs: number;
  writeTimeoutMs: number;
}

/**
 * Keeps one connection honest. Any inbound frame or pong re-arms the read
 * deadline; a heartbeat ping goes out every interval. A missed deadline or a
 * failed ping kills the connection, which also ends this task.
 */
export class LivenessSupervisor {
  constructor(
    private readonly conn: Connection,
    private readonly options: LivenessOptions,
  ) {}

  async run(): Promise<void> {
    const { socket, signal } = this.conn;
    if (signal.aborted) return;

    const deadline = setTimeout(() => this.conn.kill('read timeout'), this.options.readTimeoutMs);
    const touch = () => {
      deadline.refresh();
    };
    socket.on('message', touch);
    socket.on('pong', touch);

    try {
      for await (const _tick of every(this.options.heartbeatIntervalMs, undefined, { signal })) {
        try {
          await this.conn.ping(this.options.writeTimeoutMs);
        } catch (error) {
          if (!isBenignSocketError(error)) {
            console.warn(`[WS] Heartbeat to connection ${this.conn.id} failed:`, error);
          }
          this.conn.kill('heartbeat failed');
          return;
        }
      }
    } catch (error) {
      if (signal.aborted || isAbortError(error)) return;
      throw error;
    } finally {
      clearTimeout(deadline);
      socket.off('message', touch);
      socket.off('pong', touch);
    }
  }
}
