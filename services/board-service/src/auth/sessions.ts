import { v4 as uuidv4 } from 'uuid';

/** The slice of the redis v4 client the session store talks to. */
export interface SessionBackend {
  get(key: string): Promise<string | null>;
  setEx(key: string, seconds: number, value: string): Promise<unknown>;
  del(key: string): Promise<unknown>;
}

const SESSION_PREFIX = 'session:';

export class SessionStore {
  constructor(
    private readonly redis: SessionBackend,
    private readonly ttlSec: number,
  ) {}

  async create(userId: number): Promise<string> {
    const token = uuidv4();
    await this.redis.setEx(SESSION_PREFIX + token, this.ttlSec, String(userId));
    return token;
  }

  async resolve(token: string): Promise<number | null> {
    if (!token) return null;
    const value = await this.redis.get(SESSION_PREFIX + token);
    if (value === null) return null;
    const userId = Number(value);
    return Number.isInteger(userId) && userId > 0 ? userId : null;
  }

  async destroy(token: string): Promise<void> {
    if (!token) return;
    await this.redis.del(SESSION_PREFIX + token);
  }
}
