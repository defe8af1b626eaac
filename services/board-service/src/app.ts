import express from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { z } from 'zod';
import type { AuthResponse, RecognizeResponse, Stroke, UserView } from '@drawboard/shared';
import { extractToken, requireAuth } from './auth/identity';
import { hashPassword, verifyPassword } from './auth/password';
import type { SessionStore } from './auth/sessions';
import type { RecognitionConfig } from './config';
import type { BoardMetrics } from './metrics';
import { createRecognizer } from './recognize';
import { EmailTakenError, type UserRepository } from './store/users';
import type { IdentityResolver, StoredStroke, StrokeRepository } from './types';

export interface AppDeps {
  users: UserRepository;
  strokes: StrokeRepository;
  sessions: SessionStore;
  identity: IdentityResolver;
  /** Live push connections, reported by /health. */
  clients: { readonly size: number };
  metrics: BoardMetrics;
  recognition: RecognitionConfig;
  corsOrigin?: string;
}

const CredentialsSchema = z.object({
  email: z.string().trim().toLowerCase().email().max(320),
  password: z.string().min(1).max(1024),
});

const LoginSchema = z.object({
  email: z.string().trim().toLowerCase(),
  password: z.string(),
});

const StrokeIdSchema = z.coerce.number().int().positive();

const RecognizeBodySchema = z.object({
  topN: z.number().int().optional(),
  width: z.number().int().optional(),
  height: z.number().int().optional(),
});

function toWireStroke(stroke: StoredStroke): Stroke {
  return {
    id: stroke.id,
    points: stroke.points,
    color: stroke.color,
    width: stroke.width,
    clientId: '',
    startedAtUnixMs: stroke.startedAtUnixMs,
  };
}

export function createApp(deps: AppDeps): express.Express {
  const { users, strokes, sessions, identity, metrics } = deps;

  const recognizer = createRecognizer(deps.recognition.recognizer);

  const app = express();
  app.use(cors(deps.corsOrigin ? { origin: deps.corsOrigin } : undefined));
  app.use(express.json({ limit: '1mb' }));

  const limiter = rateLimit({
    windowMs: 60 * 1000,
    limit: 100,
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use('/api', limiter);

  // POST /api/register - создать пользователя и открыть сессию
  app.post('/api/register', async (req, res) => {
    try {
      const body = CredentialsSchema.parse(req.body);
      const id = await users.createUser(body.email, await hashPassword(body.password));
      const token = await sessions.create(id);
      console.log(`[Auth] Registered user ${id}`);
      const payload: AuthResponse = { id, email: body.email, token };
      res.json(payload);
    } catch (error) {
      if (error instanceof z.ZodError) {
        return res.status(400).json({ error: 'Invalid credentials data', details: error.errors });
      }
      if (error instanceof EmailTakenError) {
        return res.status(409).json({ error: 'Email already registered' });
      }
      console.error('[Auth] Error registering user:', error);
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  // POST /api/login
  app.post('/api/login', async (req, res) => {
    try {
      const body = LoginSchema.parse(req.body);
      const user = await users.findByEmail(body.email);
      if (!user || !(await verifyPassword(body.password, user.passwordHash))) {
        return res.status(401).json({ error: 'Invalid credentials' });
      }
      const token = await sessions.create(user.id);
      const payload: AuthResponse = { id: user.id, email: user.email, token };
      res.json(payload);
    } catch (error) {
      if (error instanceof z.ZodError) {
        return res.status(400).json({ error: 'Invalid credentials data', details: error.errors });
      }
      console.error('[Auth] Error logging in:', error);
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  // POST /api/logout - отозвать токен; без токена просто ok
  app.post('/api/logout', async (req, res) => {
    try {
      const token = extractToken(req);
      if (token) await sessions.destroy(token);
      res.json({ ok: true });
    } catch (error) {
      console.error('[Auth] Error logging out:', error);
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  // GET /api/me
  app.get(
    '/api/me',
    requireAuth(identity, async (_req, res, userId) => {
      try {
        const user = await users.findById(userId);
        if (!user) {
          res.status(401).json({ error: 'Unauthorized' });
          return;
        }
        const view: UserView = { id: user.id, email: user.email };
        res.json(view);
      } catch (error) {
        console.error('[Auth] Error loading user:', error);
        res.status(500).json({ error: 'Internal server error' });
      }
    }),
  );

  // GET /api/strokes - все штрихи пользователя в формате провода
  app.get(
    '/api/strokes',
    requireAuth(identity, async (_req, res, userId) => {
      try {
        const rows = await strokes.listStrokes(userId);
        res.json(rows.map(toWireStroke));
      } catch (error) {
        console.error('[Store] Error listing strokes:', error);
        res.status(500).json({ error: 'Internal server error' });
      }
    }),
  );

  // POST /api/strokes/clear
  app.post(
    '/api/strokes/clear',
    requireAuth(identity, async (_req, res, userId) => {
      try {
        const deleted = await strokes.clearStrokes(userId);
        console.log(`[Store] Cleared ${deleted} strokes for user ${userId}`);
        res.json({ ok: true, deleted });
      } catch (error) {
        console.error('[Store] Error clearing strokes:', error);
        res.status(500).json({ error: 'Internal server error' });
      }
    }),
  );

  // POST /api/strokes/delete?id=N
  app.post(
    '/api/strokes/delete',
    requireAuth(identity, async (req, res, userId) => {
      const parsed = StrokeIdSchema.safeParse(req.query.id);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid stroke id' });
        return;
      }
      try {
        await strokes.deleteStroke(userId, parsed.data);
        res.json({ ok: true, id: parsed.data });
      } catch (error) {
        console.error('[Store] Error deleting stroke:', error);
        res.status(500).json({ error: 'Internal server error' });
      }
    }),
  );

  // POST /api/recognize - классифицировать всю историю штрихов пользователя
  app.post(
    '/api/recognize',
    requireAuth(identity, async (req, res, userId) => {
      try {
        const body = RecognizeBodySchema.parse(req.body);
        const width = body.width && body.width > 0 ? body.width : deps.recognition.width;
        const height = body.height && body.height > 0 ? body.height : deps.recognition.height;
        const history = await strokes.listStrokes(userId);
        const candidates = recognizer.recognize(history, width, height, body.topN ?? 0);
        metrics.recognitions.inc();
        console.log(
          `[Recognize] user=${userId} recognizer=${recognizer.kind} strokes=${history.length} raster=${width}x${height} candidates=${candidates.length}`,
        );
        const payload: RecognizeResponse = { candidates };
        res.json(payload);
      } catch (error) {
        if (error instanceof z.ZodError) {
          res.status(400).json({ error: 'Invalid recognize request', details: error.errors });
          return;
        }
        console.error('[Recognize] Error classifying strokes:', error);
        res.status(500).json({ error: 'Internal server error' });
      }
    }),
  );

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', clients: deps.clients.size });
  });

  app.get('/metrics', async (_req, res) => {
    try {
      res.set('Content-Type', metrics.contentType);
      res.send(await metrics.render());
    } catch (error) {
      console.error('[Server] Error rendering metrics:', error);
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  return app;
}
