import type { IncomingMessage } from 'http';
import type { Point } from '@drawboard/shared';

/** Resolves the authenticated user behind a request, or null for anonymous callers. */
export interface IdentityResolver {
  resolveUserId(req: IncomingMessage): Promise<number | null>;
}

export interface NewStroke {
  color: string;
  width: number;
  startedAtUnixMs: number;
  points: Point[];
}

export interface StoredStroke extends NewStroke {
  id: number;
  userId: number;
  createdAt: Date;
}

/** Owner-scoped stroke persistence. */
export interface StrokeRepository {
  saveStroke(userId: number, stroke: NewStroke): Promise<number>;
  listStrokes(userId: number): Promise<StoredStroke[]>;
  /** Resolves false when no stroke with that id belongs to the user. */
  deleteStroke(userId: number, strokeId: number): Promise<boolean>;
  clearStrokes(userId: number): Promise<number>;
}
