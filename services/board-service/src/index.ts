import http from 'http';
import { createClient } from 'redis';
import { createApp } from './app';
import { TokenIdentityResolver } from './auth/identity';
import { SessionStore } from './auth/sessions';
import { loadConfig } from './config';
import { BoardMetrics } from './metrics';
import { RealtimeHub } from './realtime/hub';
import { createDatabase, migrate } from './store/db';
import { PgStrokeStore } from './store/strokes';
import { PgUserStore } from './store/users';

export interface RunningService {
  server: http.Server;
  /** Closes push connections, the HTTP server, the pool and the Redis client. */
  stop(): Promise<void>;
}

async function start(env: NodeJS.ProcessEnv = process.env): Promise<RunningService> {
  const config = loadConfig(env);

  const { pool, db } = createDatabase(config.databaseUrl);
  await migrate(pool);
  console.log('[Store] Schema ready');

  const redisClient = createClient({
    url: config.redisUrl,
  });
  redisClient.on('error', (error: Error) => {
    console.error('[Redis] Client error:', error);
  });
  await redisClient.connect();
  console.log('[Redis] Connected to Redis');

  const users = new PgUserStore(db);
  const strokes = new PgStrokeStore(db);
  const sessions = new SessionStore(redisClient, config.sessionTtlSec);
  const identity = new TokenIdentityResolver(sessions);
  const metrics = new BoardMetrics({ collectDefaults: true });

  const hub = new RealtimeHub({ identity, strokes, metrics }, config.realtime);
  const app = createApp({
    users,
    strokes,
    sessions,
    identity,
    clients: hub.registry,
    metrics,
    recognition: config.recognition,
    corsOrigin: config.corsOrigin,
  });

  const server = http.createServer(app);
  hub.attach(server);

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(config.port, () => {
      server.off('error', reject);
      resolve();
    });
  });
  const address = server.address();
  const port = typeof address === 'object' && address ? address.port : config.port;
  console.log(`[Server] Board service running on port ${port}, push endpoint ${config.realtime.path}`);

  const onSignal = (signal: NodeJS.Signals) => {
    void shutdown(signal);
  };

  const stop = async () => {
    process.off('SIGTERM', onSignal);
    process.off('SIGINT', onSignal);
    await hub.close();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    await db.destroy();
    await redisClient.quit();
  };

  let stopping = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    console.log(`[Server] ${signal} received, shutting down`);
    try {
      await stop();
      process.exit(0);
    } catch (error) {
      console.error('[Server] Shutdown failed:', error);
      process.exit(1);
    }
  };

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);

  return { server, stop };
}

if (process.env.NODE_ENV !== 'test') {
  start().catch((error) => {
    console.error('Failed to start service:', error);
    process.exit(1);
  });
}

export { start };
