import { decode as msgpackDecode } from '@msgpack/msgpack';
import type { Envelope } from '@drawboard/shared';
import { z } from 'zod';

const PointSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
});

export const StrokeSchema = z.object({
  id: z
    .number()
    .int()
    .nonnegative()
    .nullish()
    .transform((id) => id ?? undefined),
  points: z
    .array(PointSchema)
    .nullish()
    .transform((points) => points ?? []),
  color: z.string().default(''),
  width: z.number().int().min(1).default(1),
  clientId: z.string().default(''),
  startedAtUnixMs: z.number().int().nonnegative().default(0),
});

// The opposite variant's field may be present only as null.
const StrokeEnvelopeSchema = z.object({
  type: z.literal('stroke'),
  stroke: StrokeSchema,
  delete: z.null().optional(),
});

const DeleteEnvelopeSchema = z.object({
  type: z.literal('delete'),
  delete: z.number().int().nonnegative(),
  stroke: z.null().optional(),
});

const EnvelopeSchema = z.discriminatedUnion('type', [StrokeEnvelopeSchema, DeleteEnvelopeSchema]);

const KNOWN_TYPES: ReadonlySet<string> = new Set(['stroke', 'delete']);

export type DecodeResult =
  | { kind: 'envelope'; envelope: Envelope }
  | { kind: 'ignored'; type: string }
  | { kind: 'malformed'; reason: string };

function parseFrame(data: unknown, isBinary: boolean): unknown {
  if (typeof data === 'string') {
    return JSON.parse(data);
  }
  let buffer: Buffer;
  if (Buffer.isBuffer(data)) {
    buffer = data;
  } else if (Array.isArray(data) && data.every(Buffer.isBuffer)) {
    buffer = Buffer.concat(data);
  } else if (data instanceof ArrayBuffer) {
    buffer = Buffer.from(data);
  } else {
    throw new TypeError('unsupported frame payload');
  }
  return isBinary ? msgpackDecode(new Uint8Array(buffer)) : JSON.parse(buffer.toString('utf8'));
}

/** Turns one WebSocket frame into an envelope. Text frames carry JSON, binary frames MessagePack. */
export function decodeFrame(data: unknown, isBinary = false): DecodeResult {
  let raw: unknown;
  try {
    raw = parseFrame(data, isBinary);
  } catch (error) {
    return { kind: 'malformed', reason: error instanceof Error ? error.message : String(error) };
  }

  if (typeof raw !== 'object' || raw === null || !('type' in raw) || typeof raw.type !== 'string') {
    return { kind: 'malformed', reason: 'missing message type' };
  }
  if (!KNOWN_TYPES.has(raw.type)) {
    return { kind: 'ignored', type: raw.type };
  }

  const parsed = EnvelopeSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { kind: 'malformed', reason: `${issue.path.join('.') || raw.type}: ${issue.message}` };
  }

  const message = parsed.data;
  if (message.type === 'stroke') {
    return { kind: 'envelope', envelope: { type: 'stroke', stroke: message.stroke } };
  }
  return { kind: 'envelope', envelope: { type: 'delete', delete: message.delete } };
}

export function encodeEnvelope(envelope: Envelope): string {
  return JSON.stringify(envelope);
}
