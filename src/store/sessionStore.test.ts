import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

const redis = vi.hoisted(() => ({
  data: new Map<string, string>(),
  failingGets: 0,
  quits: 0,
}));

vi.mock('ioredis', () => {
  class Redis {
    constructor(public readonly url: string) {}

    on(): this {
      return this;
    }

    async get(key: string): Promise<string | null> {
      if (redis.failingGets > 0) {
        redis.failingGets--;
        throw new Error('connect ETIMEDOUT');
      }
      return redis.data.get(key) ?? null;
    }

    multi() {
      const writes: Array<[string, string]> = [];
      const chain = {
        set(key: string, value: string) {
          writes.push([key, value]);
          return chain;
        },
        async exec() {
          for (const [key, value] of writes) redis.data.set(key, value);
          return writes.map(() => [null, 'OK']);
        },
      };
      return chain;
    }

    async quit(): Promise<'OK'> {
      redis.quits++;
      return 'OK';
    }
  }
  return { Redis };
});

import { OnboardingEngineError } from '../engine/onboardingEngine.js';
import { OnboardingStore } from './sessionStore.js';

const REDIS_URL = 'redis://localhost:6379';

const FIXED_NOW = new Date('2025-03-01T12:00:00.000Z');

describe('OnboardingStore (memory)', () => {
  let store: OnboardingStore;

  beforeEach(() => {
    store = new OnboardingStore({ now: () => FIXED_NOW });
  });

  it('creates a user with a fresh session at start', () => {
    const user = store.getOrCreateUser('session-one');

    expect(user).toMatchObject({
      sessionKey: 'session-one',
      zipCode: null,
      fullName: null,
      email: null,
      licenseType: null,
      licenseStatus: null,
      createdAt: FIXED_NOW.toISOString(),
    });
    expect(store.getSession(user.id)).toEqual({
      userId: user.id,
      currentState: 'start',
      sessionData: { currentVehicle: {} },
      createdAt: FIXED_NOW.toISOString(),
      updatedAt: FIXED_NOW.toISOString(),
    });
  });

  it('returns the same user for the same session key', () => {
    const first = store.getOrCreateUser('session-one');
    const again = store.getOrCreateUser('session-one');
    const other = store.getOrCreateUser('session-two');

    expect(again.id).toBe(first.id);
    expect(other.id).not.toBe(first.id);
    expect(store.findUserBySessionKey('session-two')?.id).toBe(other.id);
    expect(store.findUserBySessionKey('unknown')).toBeUndefined();
  });

  it('stores a copy of the session data', () => {
    const user = store.getOrCreateUser('session-one');
    const data = { currentVehicle: { year: 2020 } };

    store.updateSessionState(user.id, 'collecting_vehicle_use', data);
    data.currentVehicle.year = 1999;

    expect(store.getSession(user.id)).toMatchObject({
      currentState: 'collecting_vehicle_use',
      sessionData: { currentVehicle: { year: 2020 } },
    });
  });

  it('keeps the session data when only the state moves', () => {
    const user = store.getOrCreateUser('session-one');
    store.updateSessionState(user.id, 'collecting_blind_spot', { currentVehicle: { vehicleUse: 'farming' } });
    store.updateSessionState(user.id, 'collecting_annual_mileage');

    expect(store.getSession(user.id)?.sessionData).toEqual({ currentVehicle: { vehicleUse: 'farming' } });
  });

  it('merges profile fields', () => {
    const user = store.getOrCreateUser('session-one');
    store.updateUser(user.id, { zipCode: '90210' });
    const updated = store.updateUser(user.id, { fullName: 'Jane Doe' });

    expect(updated).toMatchObject({ zipCode: '90210', fullName: 'Jane Doe', email: null });
    expect(store.getUser(user.id)).toEqual(updated);
  });

  it('appends vehicles and messages in order', () => {
    const user = store.getOrCreateUser('session-one');
    const saved = store.saveVehicle(user.id, { vin: '1HGCM82633A004352', vehicleUse: 'business' });
    store.saveMessage(user.id, 'assistant', 'Hello');
    store.saveMessage(user.id, 'user', '90210');

    expect(saved).toMatchObject({ userId: user.id, vin: '1HGCM82633A004352', vehicleUse: 'business' });
    expect(store.listVehicles(user.id)).toHaveLength(1);
    expect(store.getMessages(user.id).map((m) => [m.role, m.content])).toEqual([
      ['assistant', 'Hello'],
      ['user', '90210'],
    ]);
    expect(store.getRecord(user.id)?.vehicles[0]?.id).toBe(saved?.id);
  });

  it('hands out copies of the vehicle and message lists', () => {
    const user = store.getOrCreateUser('session-one');
    store.saveVehicle(user.id, { vin: '1HGCM82633A004352' });
    store.saveMessage(user.id, 'user', 'hello');

    store.listVehicles(user.id).pop();
    store.getMessages(user.id).push({ ...store.getMessages(user.id)[0], content: 'injected' });

    expect(store.listVehicles(user.id)).toHaveLength(1);
    expect(store.getMessages(user.id).map((m) => m.content)).toEqual(['hello']);
  });

  it('ignores writes for an unknown user', () => {
    expect(store.updateUser('nobody', { zipCode: '12345' })).toBeUndefined();
    expect(store.updateSessionState('nobody', 'completed')).toBeUndefined();
    expect(store.saveVehicle('nobody', {})).toBeUndefined();
    expect(store.saveMessage('nobody', 'user', 'hi')).toBeUndefined();
    expect(store.listVehicles('nobody')).toEqual([]);
    expect(store.getMessages('nobody')).toEqual([]);
  });

  it('loads by session key without a backing store', async () => {
    const user = store.getOrCreateUser('session-one');
    await expect(store.loadBySessionKeyAsync('session-one')).resolves.toEqual(user);
    await expect(store.loadBySessionKeyAsync('missing')).resolves.toBeUndefined();
  });
});

describe('OnboardingStore (file)', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'onboarding-store-'));
    file = path.join(dir, 'store.json');
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes the store on flush and reads it back', async () => {
    const store = new OnboardingStore({ persistPath: file });
    const user = store.getOrCreateUser('session-one');
    store.updateUser(user.id, { zipCode: '90210', licenseType: 'personal' });
    store.updateSessionState(user.id, 'collecting_blind_spot', { currentVehicle: { year: 2022, vehicleUse: 'commuting' } });
    store.saveMessage(user.id, 'user', 'commuting');
    store.flush();
    await store.close();

    const reopened = new OnboardingStore({ persistPath: file });
    const loaded = reopened.findUserBySessionKey('session-one');

    expect(loaded).toMatchObject({ id: user.id, zipCode: '90210', licenseType: 'personal' });
    expect(reopened.getSession(user.id)).toMatchObject({
      currentState: 'collecting_blind_spot',
      sessionData: { currentVehicle: { year: 2022, vehicleUse: 'commuting' } },
    });
    expect(reopened.getMessages(user.id)).toHaveLength(1);
  });

  it('flushes pending writes on close', async () => {
    const store = new OnboardingStore({ persistPath: file });
    store.getOrCreateUser('session-one');
    expect(fs.existsSync(file)).toBe(false);

    await store.close();

    expect(fs.existsSync(file)).toBe(true);
  });

  it('skips records that do not match the schema', () => {
    fs.writeFileSync(
      file,
      JSON.stringify({
        broken: { user: { id: 'broken' } },
        good: {
          user: {
            id: 'good',
            sessionKey: 'session-good',
            zipCode: null,
            fullName: 'Jane Doe',
            email: null,
            licenseType: null,
            licenseStatus: null,
            createdAt: '2025-01-01T00:00:00.000Z',
            updatedAt: '2025-01-01T00:00:00.000Z',
          },
          session: {
            userId: 'good',
            currentState: 'collecting_email',
            sessionData: 'not an object',
            createdAt: '2025-01-01T00:00:00.000Z',
            updatedAt: '2025-01-01T00:00:00.000Z',
          },
        },
      }),
    );

    const store = new OnboardingStore({ persistPath: file });

    expect(store.findUserBySessionKey('session-good')?.fullName).toBe('Jane Doe');
    expect(store.getRecord('good')).toMatchObject({
      session: { currentState: 'collecting_email', sessionData: { currentVehicle: {} } },
      vehicles: [],
      messages: [],
    });
    expect(store.getRecord('broken')).toBeUndefined();
  });
});

describe('OnboardingStore (redis)', () => {
  beforeEach(() => {
    redis.data.clear();
    redis.failingGets = 0;
    redis.quits = 0;
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes each record and its session key through to redis', () => {
    const store = new OnboardingStore({ redisUrl: REDIS_URL });
    const user = store.getOrCreateUser('session-one');
    store.updateUser(user.id, { fullName: 'Jane Doe' });

    expect(redis.data.get('onboarding:session:session-one')).toBe(user.id);
    const stored: unknown = JSON.parse(redis.data.get(`onboarding:user:${user.id}`) ?? 'null');
    expect(stored).toMatchObject({ user: { id: user.id, fullName: 'Jane Doe' }, session: { currentState: 'start' } });
  });

  it('loads a record from redis into a fresh store', async () => {
    const writer = new OnboardingStore({ redisUrl: REDIS_URL });
    const user = writer.getOrCreateUser('session-one');
    writer.updateSessionState(user.id, 'collecting_email', { currentVehicle: {} });

    const reader = new OnboardingStore({ redisUrl: REDIS_URL });
    expect(reader.findUserBySessionKey('session-one')).toBeUndefined();

    await expect(reader.loadBySessionKeyAsync('session-one')).resolves.toMatchObject({ id: user.id });
    expect(reader.getSession(user.id)?.currentState).toBe('collecting_email');
    await expect(reader.loadBySessionKeyAsync('session-two')).resolves.toBeUndefined();
  });

  it('reads from redis rather than the file when both are configured', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'onboarding-store-'));
    const file = path.join(dir, 'store.json');
    try {
      const fileOnly = new OnboardingStore({ persistPath: file });
      fileOnly.getOrCreateUser('session-file');
      await fileOnly.close();

      const both = new OnboardingStore({ persistPath: file, redisUrl: REDIS_URL });

      expect(both.findUserBySessionKey('session-file')).toBeUndefined();
      await expect(both.loadBySessionKeyAsync('session-file')).resolves.toBeUndefined();
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('fails the lookup instead of reporting a missing session when redis cannot be read', async () => {
    const writer = new OnboardingStore({ redisUrl: REDIS_URL });
    const user = writer.getOrCreateUser('session-one');

    const reader = new OnboardingStore({ redisUrl: REDIS_URL });
    redis.failingGets = 1;

    await expect(reader.loadBySessionKeyAsync('session-one')).rejects.toThrowError(
      new OnboardingEngineError('Session store unavailable for session-one', 'STORE_UNAVAILABLE'),
    );
    expect(redis.data.get('onboarding:session:session-one')).toBe(user.id);
    await expect(reader.loadBySessionKeyAsync('session-one')).resolves.toMatchObject({ id: user.id });
  });

  it('quits the client on close', async () => {
    const store = new OnboardingStore({ redisUrl: REDIS_URL });
    await store.close();
    expect(redis.quits).toBe(1);
  });
});
