import request from 'supertest';
import { createApp } from '../app';
import { TokenIdentityResolver } from '../auth/identity';
import { SessionStore } from '../auth/sessions';
import { BoardMetrics } from '../metrics';
import { InMemoryStrokeStore, InMemoryUserStore, MemoryBackend } from './fakes';

describe('board-service HTTP API', () => {
  let strokes: InMemoryStrokeStore;
  let users: InMemoryUserStore;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
    strokes = new InMemoryStrokeStore();
    users = new InMemoryUserStore();
    const sessions = new SessionStore(new MemoryBackend(), 3600);
    app = createApp({
      users,
      strokes,
      sessions,
      identity: new TokenIdentityResolver(sessions),
      clients: { size: 2 },
      metrics: new BoardMetrics(),
      recognition: { width: 300, height: 300, recognizer: 'raster' },
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  async function signUp(email = 'alice@example.com'): Promise<{ id: number; token: string }> {
    const res = await request(app).post('/api/register').send({ email, password: 'test-secret' });
    return { id: res.body.id, token: res.body.token };
  }

  describe('POST /api/register', () => {
    it('creates the user, normalises the email and opens a session', async () => {
      const res = await request(app).post('/api/register').send({ email: '  Alice@Example.COM ', password: 'test-secret' });
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ id: 1, email: 'alice@example.com', token: expect.any(String) });
      expect(users.users[0].passwordHash).toMatch(/^scrypt\$/);
    });

    it('returns 409 for a taken email', async () => {
      await signUp();
      const res = await request(app).post('/api/register').send({ email: 'ALICE@example.com', password: 'other' });
      expect(res.status).toBe(409);
      expect(res.body).toEqual({ error: 'Email already registered' });
    });

    it('returns 400 for missing fields', async () => {
      const res = await request(app).post('/api/register').send({ email: 'alice@example.com' });
      expect(res.status).toBe(400);
      expect(res.body.error).toBe('Invalid credentials data');
    });
  });

  describe('POST /api/login', () => {
    it('opens a new session for valid credentials', async () => {
      const { id } = await signUp();
      const res = await request(app).post('/api/login').send({ email: 'Alice@example.com', password: 'test-secret' });
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ id, email: 'alice@example.com', token: expect.any(String) });
    });

    it('returns 401 for a wrong password or unknown email', async () => {
      await signUp();
      const wrong = await request(app).post('/api/login').send({ email: 'alice@example.com', password: 'nope' });
      expect(wrong.status).toBe(401);
      expect(wrong.body).toEqual({ error: 'Invalid credentials' });
      const unknown = await request(app).post('/api/login').send({ email: 'bob@example.com', password: 'test-secret' });
      expect(unknown.status).toBe(401);
    });
  });

  describe('session lifecycle', () => {
    it('serves /api/me until logout', async () => {
      const { id, token } = await signUp();

      const me = await request(app).get('/api/me').set('Authorization', `Bearer ${token}`);
      expect(me.status).toBe(200);
      expect(me.body).toEqual({ id, email: 'alice@example.com' });

      const viaQuery = await request(app).get(`/api/me?token=${token}`);
      expect(viaQuery.status).toBe(200);

      const out = await request(app).post('/api/logout').set('Authorization', `Bearer ${token}`);
      expect(out.body).toEqual({ ok: true });

      const after = await request(app).get('/api/me').set('Authorization', `Bearer ${token}`);
      expect(after.status).toBe(401);
      expect(after.body).toEqual({ error: 'Unauthorized' });
    });

    it('lets anonymous callers log out', async () => {
      const res = await request(app).post('/api/logout');
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ ok: true });
    });
  });

  describe('strokes', () => {
    it('requires a session', async () => {
      expect((await request(app).get('/api/strokes')).status).toBe(401);
      expect((await request(app).post('/api/strokes/clear')).status).toBe(401);
      expect((await request(app).post('/api/strokes/delete?id=1')).status).toBe(401);
      expect((await request(app).post('/api/recognize')).status).toBe(401);
    });

    it('lists only the caller’s strokes in wire format', async () => {
      const { id, token } = await signUp();
      await strokes.saveStroke(id, { color: '#123', width: 4, startedAtUnixMs: 77, points: [{ x: 1, y: 2 }] });
      await strokes.saveStroke(id + 1, { color: '#fff', width: 1, startedAtUnixMs: 78, points: [{ x: 0, y: 0 }] });

      const res = await request(app).get('/api/strokes').set('Authorization', `Bearer ${token}`);

      expect(res.status).toBe(200);
      expect(res.body).toEqual([
        { id: 1, points: [{ x: 1, y: 2 }], color: '#123', width: 4, clientId: '', startedAtUnixMs: 77 },
      ]);
    });

    it('clears the caller’s strokes', async () => {
      const { id, token } = await signUp();
      await strokes.saveStroke(id, { color: '', width: 1, startedAtUnixMs: 1, points: [] });
      await strokes.saveStroke(id, { color: '', width: 1, startedAtUnixMs: 2, points: [] });

      const res = await request(app).post('/api/strokes/clear').set('Authorization', `Bearer ${token}`);

      expect(res.body).toEqual({ ok: true, deleted: 2 });
      expect(strokes.rows).toHaveLength(0);
    });

    it('deletes one stroke by id', async () => {
      const { id, token } = await signUp();
      const strokeId = await strokes.saveStroke(id, { color: '', width: 1, startedAtUnixMs: 1, points: [] });

      const res = await request(app).post(`/api/strokes/delete?id=${strokeId}`).set('Authorization', `Bearer ${token}`);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ ok: true, id: strokeId });
      expect(strokes.rows).toHaveLength(0);
    });

    it.each(['abc', '0', '-4', '2.5', ''])('rejects stroke id %p', async (raw) => {
      const { token } = await signUp();
      const res = await request(app).post(`/api/strokes/delete?id=${raw}`).set('Authorization', `Bearer ${token}`);
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Invalid stroke id' });
    });
  });

  describe('POST /api/recognize', () => {
    async function drawHorizontalLine(): Promise<string> {
      const { id, token } = await signUp();
      await strokes.saveStroke(id, {
        color: '#000',
        width: 2,
        startedAtUnixMs: 1,
        points: [
          { x: 50, y: 100 },
          { x: 250, y: 100 },
        ],
      });
      return token;
    }

    it('classifies the caller’s stroke history', async () => {
      const token = await drawHorizontalLine();
      const res = await request(app).post('/api/recognize').set('Authorization', `Bearer ${token}`).send({});
      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        candidates: [
          { text: '一', score: 0.9 },
          { text: 'ー', score: 0.7 },
        ],
      });
    });

    it('honours topN and falls back to the default raster for non-positive sizes', async () => {
      const token = await drawHorizontalLine();
      const res = await request(app)
        .post('/api/recognize')
        .set('Authorization', `Bearer ${token}`)
        .send({ topN: 1, width: 0, height: -5 });
      expect(res.body).toEqual({ candidates: [{ text: '一', score: 0.9 }] });
    });

    it('returns no candidates for an empty board', async () => {
      const { token } = await signUp();
      const res = await request(app).post('/api/recognize').set('Authorization', `Bearer ${token}`).send({});
      expect(res.body).toEqual({ candidates: [] });
    });

    it('uses the direction-based recognizer when configured', async () => {
      const sessions = new SessionStore(new MemoryBackend(), 3600);
      app = createApp({
        users,
        strokes,
        sessions,
        identity: new TokenIdentityResolver(sessions),
        clients: { size: 0 },
        metrics: new BoardMetrics(),
        recognition: { width: 300, height: 300, recognizer: 'simple' },
      });
      const { id, token } = await signUp();
      await strokes.saveStroke(id, {
        color: '#000',
        width: 2,
        startedAtUnixMs: 1,
        points: [
          { x: 10, y: 10 },
          { x: 20, y: 10 },
        ],
      });

      const res = await request(app).post('/api/recognize').set('Authorization', `Bearer ${token}`).send({});
      expect(res.body).toEqual({
        candidates: [
          { text: '一', score: 0.9 },
          { text: 'ー', score: 0.7 },
        ],
      });
    });

    it('returns 400 for a malformed request', async () => {
      const { token } = await signUp();
      const res = await request(app).post('/api/recognize').set('Authorization', `Bearer ${token}`).send({ width: 'wide' });
      expect(res.status).toBe(400);
      expect(res.body.error).toBe('Invalid recognize request');
    });
  });

  describe('operational endpoints', () => {
    it('GET /health reports the live client count', async () => {
      const res = await request(app).get('/health');
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: 'ok', clients: 2 });
    });

    it('GET /metrics exposes the service counters', async () => {
      const res = await request(app).get('/metrics');
      expect(res.status).toBe(200);
      expect(res.text).toContain('# TYPE drawboard_recognitions_total counter');
    });
  });
});
