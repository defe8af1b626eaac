import type { IncomingMessage, Server } from 'http';
import type { Duplex } from 'stream';
import { WebSocketServer } from 'ws';
import type { RealtimeConfig } from '../config';
import type { BoardMetrics } from '../metrics';
import type { IdentityResolver, StrokeRepository } from '../types';
import { Connection, type PeerSocket } from './connection';
import { NORMAL_CLOSE_CODES, isBenignSocketError } from './errors';
import { LivenessSupervisor } from './liveness';
import { ConnectionRegistry } from './registry';
import { SessionLoop } from './session';

export interface HubDeps {
  identity: IdentityResolver;
  strokes: Pick<StrokeRepository, 'saveStroke' | 'deleteStroke'>;
  metrics?: BoardMetrics;
}

function remoteAddressOf(req: IncomingMessage): string {
  const forwarded = req.headers['x-forwarded-for'];
  if (typeof forwarded === 'string' && forwarded.length > 0) {
    return forwarded.split(',')[0].trim();
  }
  return req.socket?.remoteAddress ?? 'unknown';
}

function rejectUpgrade(socket: Duplex, status: number, message: string): void {
  socket.write(`HTTP/1.1 ${status} ${message}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
  socket.destroy();
}

/**
 * Owns the push endpoint: accepts WebSocket upgrades, registers each
 * connection and runs its session loop and liveness supervisor side by side.
 */
export class RealtimeHub {
  readonly registry: ConnectionRegistry;
  private readonly wss: WebSocketServer;
  private readonly sessions = new Set<Promise<void>>();
  private closing: Promise<void> | null = null;

  constructor(
    private readonly deps: HubDeps,
    private readonly config: RealtimeConfig,
  ) {
    this.registry = new ConnectionRegistry({ writeTimeoutMs: config.writeTimeoutMs, metrics: deps.metrics });
    this.wss = new WebSocketServer({ noServer: true, maxPayload: config.maxPayloadBytes });
  }

  attach(server: Server): void {
    server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(req, socket, head).catch((error) => {
        console.error('[Hub] Upgrade failed:', error);
        socket.destroy();
      });
    });
  }

  private async handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): Promise<void> {
    const { pathname } = new URL(req.url ?? '/', 'http://localhost');
    if (pathname !== this.config.path) {
      rejectUpgrade(socket, 404, 'Not Found');
      return;
    }
    if (this.config.requireAuth) {
      const userId = await this.deps.identity.resolveUserId(req);
      if (userId === null) {
        console.warn(`[Hub] Rejected unauthenticated upgrade from ${remoteAddressOf(req)}`);
        rejectUpgrade(socket, 401, 'Unauthorized');
        return;
      }
    }
    this.wss.handleUpgrade(req, socket, head, (ws) => {
      this.track(this.accept(ws, req));
    });
  }

  /** Runs one connection to completion; resolves once it is dead and deregistered. */
  async accept(socket: PeerSocket, req: IncomingMessage): Promise<void> {
    const conn = new Connection(socket, remoteAddressOf(req));
    socket.on('error', (error: Error) => {
      if (isBenignSocketError(error)) {
        console.debug(`[WS] Connection ${conn.id} transport error: ${error.message}`);
      } else {
        console.error(`[WS] Connection ${conn.id} error:`, error);
      }
    });
    socket.once('close', (code: number) => {
      if (!NORMAL_CLOSE_CODES.has(code) && conn.isAlive) {
        console.warn(`[WS] Connection ${conn.id} closed abnormally (code ${code})`);
      }
      conn.markClosed(`peer closed (code ${code})`);
    });

    this.registry.register(conn);
    this.deps.metrics?.connections.inc();
    console.log(`[WS] Client ${conn.id} connected from ${conn.remoteAddress}, total: ${this.registry.size}`);

    const liveness = new LivenessSupervisor(conn, this.config);
    const session = new SessionLoop(conn, req, { ...this.deps, registry: this.registry });
    const results = await Promise.allSettled([session.run(), liveness.run()]);
    for (const result of results) {
      if (result.status === 'rejected') {
        console.error(`[WS] Connection ${conn.id} task failed:`, result.reason);
      }
    }

    conn.kill('connection finished');
    this.registry.unregister(conn);
    this.deps.metrics?.connections.dec();
    console.log(`[WS] Client ${conn.id} disconnected, remaining: ${this.registry.size}`);
  }

  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    this.registry.closeAll(1001, 'server shutting down');
    await Promise.allSettled(Array.from(this.sessions));
    await new Promise<void>((resolve, reject) => {
      this.wss.close((error) => (error ? reject(error) : resolve()));
    });
  }

  private track(task: Promise<void>): void {
    this.sessions.add(task);
    void task
      .catch((error) => console.error('[Hub] Connection task crashed:', error))
      .finally(() => this.sessions.delete(task));
  }
}
