import { on } from 'events';
import type { IncomingMessage } from 'http';
import type { Envelope, Stroke } from '@drawboard/shared';
import type { BoardMetrics } from '../metrics';
import type { IdentityResolver, StrokeRepository } from '../types';
import type { Connection } from './connection';
import { isAbortError, isBenignSocketError } from './errors';
import { decodeFrame } from './protocol';
import type { ConnectionRegistry } from './registry';

export interface SessionDeps {
  registry: ConnectionRegistry;
  identity: IdentityResolver;
  strokes: Pick<StrokeRepository, 'saveStroke' | 'deleteStroke'>;
  metrics?: BoardMetrics;
  now?: () => number;
}

/**
 * Receive loop for one connection. Frames are handled strictly one after
 * another, so a client's envelopes are persisted and relayed in the order
 * it sent them.
 */
export class SessionLoop {
  private readonly now: () => number;

  constructor(
    private readonly conn: Connection,
    private readonly request: IncomingMessage,
    private readonly deps: SessionDeps,
  ) {
    this.now = deps.now ?? Date.now;
  }

  async run(): Promise<void> {
    const { socket, signal } = this.conn;
    if (signal.aborted) return;

    try {
      for await (const [data, isBinary] of on(socket, 'message', { signal })) {
        await this.handleFrame(data, isBinary === true);
      }
    } catch (error) {
      if (signal.aborted || isAbortError(error)) return;
      if (isBenignSocketError(error)) {
        console.debug(`[WS] Read from connection ${this.conn.id} ended: ${String(error)}`);
      } else {
        console.error(`[WS] Read error on connection ${this.conn.id}:`, error);
      }
    } finally {
      this.conn.kill('session loop ended');
    }
  }

  async handleFrame(data: unknown, isBinary: boolean): Promise<void> {
    const decoded = decodeFrame(data, isBinary);
    if (decoded.kind === 'malformed') {
      console.warn(`[WS] Bad message from connection ${this.conn.id}: ${decoded.reason}`);
      this.deps.metrics?.framesRejected.inc({ reason: 'malformed' });
      return;
    }
    if (decoded.kind === 'ignored') {
      console.debug(`[WS] Ignoring message type "${decoded.type}" from connection ${this.conn.id}`);
      this.deps.metrics?.framesRejected.inc({ reason: 'unknown_type' });
      return;
    }

    const envelope = decoded.envelope;
    this.deps.metrics?.envelopesReceived.inc({ type: envelope.type });
    const outgoing = await this.route(envelope);
    await this.deps.registry.broadcast(outgoing);
  }

  private async route(envelope: Envelope): Promise<Envelope> {
    if (envelope.type === 'stroke') {
      return { type: 'stroke', stroke: await this.persistStroke(envelope.stroke) };
    }
    await this.deleteStroke(envelope.delete);
    return envelope;
  }

  private async persistStroke(stroke: Stroke): Promise<Stroke> {
    const prepared: Stroke = { ...stroke, startedAtUnixMs: stroke.startedAtUnixMs || this.now() };
    if (prepared.points.length === 0) return prepared;

    const userId = await this.resolveUserId();
    if (userId === null) {
      this.deps.metrics?.strokesPersisted.inc({ outcome: 'anonymous' });
      return prepared;
    }

    try {
      const id = await this.deps.strokes.saveStroke(userId, {
        color: prepared.color,
        width: prepared.width,
        startedAtUnixMs: prepared.startedAtUnixMs,
        points: prepared.points,
      });
      this.deps.metrics?.strokesPersisted.inc({ outcome: 'saved' });
      return { ...prepared, id };
    } catch (error) {
      console.error(`[WS] Failed to save stroke for user ${userId}:`, error);
      this.deps.metrics?.strokesPersisted.inc({ outcome: 'failed' });
      return prepared;
    }
  }

  private async deleteStroke(strokeId: number): Promise<void> {
    const userId = await this.resolveUserId();
    if (userId === null) return;
    try {
      const deleted = await this.deps.strokes.deleteStroke(userId, strokeId);
      if (!deleted) {
        console.debug(`[WS] Stroke ${strokeId} not deleted: not owned by user ${userId}`);
      }
    } catch (error) {
      console.error(`[WS] Failed to delete stroke ${strokeId} for user ${userId}:`, error);
    }
  }

  private async resolveUserId(): Promise<number | null> {
    try {
      return await this.deps.identity.resolveUserId(this.request);
    } catch (error) {
      console.error(`[WS] Identity lookup failed for connection ${this.conn.id}:`, error);
      return null;
    }
  }
}
