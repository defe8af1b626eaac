import type { Kysely } from 'kysely';
import type { Point } from '@drawboard/shared';
import type { NewStroke, StoredStroke, StrokeRepository } from '../types';
import type { Database } from './db';

// Four parameters per point; stays well under the 65535 bind limit.
const POINT_BATCH_SIZE = 1000;

export class PgStrokeStore implements StrokeRepository {
  constructor(private readonly db: Kysely<Database>) {}

  saveStroke(userId: number, stroke: NewStroke): Promise<number> {
    return this.db.transaction().execute(async (trx) => {
      const { id } = await trx
        .insertInto('strokes')
        .values({
          user_id: userId,
          color: stroke.color,
          width: stroke.width,
          started_at_unix_ms: stroke.startedAtUnixMs,
        })
        .returning('id')
        .executeTakeFirstOrThrow();

      for (let offset = 0; offset < stroke.points.length; offset += POINT_BATCH_SIZE) {
        const batch = stroke.points.slice(offset, offset + POINT_BATCH_SIZE).map((p, i) => ({
          stroke_id: id,
          seq: offset + i,
          x: p.x,
          y: p.y,
        }));
        await trx.insertInto('stroke_points').values(batch).execute();
      }
      return id;
    });
  }

  async listStrokes(userId: number): Promise<StoredStroke[]> {
    const rows = await this.db
      .selectFrom('strokes')
      .select(['id', 'color', 'width', 'started_at_unix_ms', 'created_at'])
      .where('user_id', '=', userId)
      .orderBy('id')
      .execute();
    if (rows.length === 0) return [];

    const pointRows = await this.db
      .selectFrom('stroke_points')
      .select(['stroke_id', 'x', 'y'])
      .where(
        'stroke_id',
        'in',
        rows.map((r) => r.id),
      )
      .orderBy('stroke_id')
      .orderBy('seq')
      .execute();

    const pointsByStroke = new Map<number, Point[]>();
    for (const row of pointRows) {
      const points = pointsByStroke.get(row.stroke_id);
      if (points) points.push({ x: row.x, y: row.y });
      else pointsByStroke.set(row.stroke_id, [{ x: row.x, y: row.y }]);
    }

    return rows.map((row) => ({
      id: row.id,
      userId,
      color: row.color,
      width: row.width,
      startedAtUnixMs: Number(row.started_at_unix_ms),
      points: pointsByStroke.get(row.id) ?? [],
      createdAt: row.created_at,
    }));
  }

  async deleteStroke(userId: number, strokeId: number): Promise<boolean> {
    const result = await this.db
      .deleteFrom('strokes')
      .where('id', '=', strokeId)
      .where('user_id', '=', userId)
      .executeTakeFirst();
    return result.numDeletedRows > BigInt(0);
  }

  async clearStrokes(userId: number): Promise<number> {
    const result = await this.db.deleteFrom('strokes').where('user_id', '=', userId).executeTakeFirst();
    return Number(result.numDeletedRows);
  }
}
