import * as fs from 'fs';
import { Redis } from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { ConversationState, SessionData, VehicleDraft } from '../types/conversation.js';
import { INITIAL_STATE, LICENSE_STATUSES, LICENSE_TYPES } from '../types/conversation.js';
import type { ChatMessage, MessageRole, ProfileFields, UserProfile, VehicleRecord } from '../types/profile.js';
import type { OnboardingRecord, OnboardingSession } from '../types/session.js';
import type { OnboardingRepository } from '../types/store.js';
import { OnboardingEngineError } from '../engine/onboardingEngine.js';
import { VehicleDraftSchema, createSessionData, normalizeSessionData } from '../engine/sessionData.js';

const FILE_PERSIST_DEBOUNCE_MS = 200;
const REDIS_USER_PREFIX = 'onboarding:user:';
const REDIS_SESSION_PREFIX = 'onboarding:session:';

export interface OnboardingStoreOptions {
  /** JSON file mirroring the whole store; null keeps everything in memory */
  persistPath?: string | null;
  /** Redis connection string; each user record is written under its own key */
  redisUrl?: string | null;
  now?: () => Date;
}

export class OnboardingStore implements OnboardingRepository {
  private records: Map<string, OnboardingRecord> = new Map();
  private userIdsBySessionKey: Map<string, string> = new Map();
  private filePersistTimer: NodeJS.Timeout | null = null;
  private readonly persistPath: string | null;
  private readonly redisClient: Redis | null;
  private readonly now: () => Date;

  constructor(options: OnboardingStoreOptions = {}) {
    this.persistPath = options.persistPath ?? null;
    this.now = options.now ?? (() => new Date());
    this.redisClient = options.redisUrl ? new Redis(options.redisUrl) : null;
    if (this.redisClient) {
      this.redisClient.on('error', (e: unknown) => {
        console.error('[STORE] Redis error:', e);
      });
      console.log('[STORE] Redis initialized');
    }
    this.loadFromFile();
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  private index(record: OnboardingRecord): void {
    this.records.set(record.user.id, record);
    this.userIdsBySessionKey.set(record.user.sessionKey, record.user.id);
  }

  // ============================================
  // PERSISTENCE
  // ============================================

  private persistRecord(userId: string): void {
    const record = this.records.get(userId);
    if (!record) return;

    if (this.redisClient) {
      void this.redisClient
        .multi()
        .set(`${REDIS_USER_PREFIX}${userId}`, JSON.stringify(record))
        .set(`${REDIS_SESSION_PREFIX}${record.user.sessionKey}`, userId)
        .exec()
        .catch((e: unknown) => {
          console.error('[STORE] Redis persist error:', e);
        });
    }

    if (!this.persistPath) return;
    if (this.filePersistTimer) {
      clearTimeout(this.filePersistTimer);
    }
    this.filePersistTimer = setTimeout(() => {
      this.filePersistTimer = null;
      this.saveToFile();
    }, FILE_PERSIST_DEBOUNCE_MS);
  }

  /** Writes the file immediately instead of waiting for the debounce */
  flush(): void {
    if (this.filePersistTimer) {
      clearTimeout(this.filePersistTimer);
      this.filePersistTimer = null;
    }
    this.saveToFile();
  }

  private saveToFile(): void {
    if (!this.persistPath) return;
    try {
      const data: Record<string, OnboardingRecord> = {};
      this.records.forEach((record, id) => {
        data[id] = record;
      });
      fs.writeFileSync(this.persistPath, JSON.stringify(data, null, 2));
    } catch (e) {
      console.error('[STORE] File save error:', e);
    }
  }

  private loadFromFile(): void {
    if (!this.persistPath || this.redisClient) return; // Redis wins when both are configured

    try {
      if (fs.existsSync(this.persistPath)) {
        const parsed: unknown = JSON.parse(fs.readFileSync(this.persistPath, 'utf-8'));
        if (typeof parsed === 'object' && parsed !== null) {
          Object.values(parsed).forEach((raw: unknown) => {
            const record = reviveRecord(raw);
            if (record) this.index(record);
          });
        }
        console.log('[STORE] Loaded from file:', this.records.size, 'users');
      }
    } catch (e) {
      console.error('[STORE] File load error:', e);
    }
  }

  /** @throws {OnboardingEngineError} STORE_UNAVAILABLE when Redis cannot be read */
  async loadBySessionKeyAsync(sessionKey: string): Promise<UserProfile | undefined> {
    const loaded = this.findUserBySessionKey(sessionKey);
    if (loaded || !this.redisClient) {
      return loaded;
    }

    let data: string | null = null;
    try {
      const userId = await this.redisClient.get(`${REDIS_SESSION_PREFIX}${sessionKey}`);
      if (!userId) return undefined;
      data = await this.redisClient.get(`${REDIS_USER_PREFIX}${userId}`);
    } catch (e) {
      // a failed read is not a missing session
      console.error('[STORE] Redis get error:', e);
      throw new OnboardingEngineError(`Session store unavailable for ${sessionKey}`, 'STORE_UNAVAILABLE');
    }
    if (!data) return undefined;

    const record = reviveRecord(JSON.parse(data));
    if (!record) return undefined;
    this.index(record);
    return record.user;
  }

  async close(): Promise<void> {
    if (this.filePersistTimer) {
      this.flush();
    }
    if (this.redisClient) {
      await this.redisClient.quit();
    }
  }

  // ============================================
  // USERS & SESSIONS
  // ============================================

  getOrCreateUser(sessionKey: string): UserProfile {
    const existing = this.findUserBySessionKey(sessionKey);
    if (existing) {
      return existing;
    }

    const now = this.timestamp();
    const user: UserProfile = {
      id: uuidv4(),
      sessionKey,
      zipCode: null,
      fullName: null,
      email: null,
      licenseType: null,
      licenseStatus: null,
      createdAt: now,
      updatedAt: now,
    };
    const session: OnboardingSession = {
      userId: user.id,
      currentState: INITIAL_STATE,
      sessionData: createSessionData(),
      createdAt: now,
      updatedAt: now,
    };

    this.index({ user, session, vehicles: [], messages: [] });
    this.persistRecord(user.id);
    return user;
  }

  findUserBySessionKey(sessionKey: string): UserProfile | undefined {
    const userId = this.userIdsBySessionKey.get(sessionKey);
    return userId ? this.records.get(userId)?.user : undefined;
  }

  getRecord(userId: string): OnboardingRecord | undefined {
    return this.records.get(userId);
  }

  getUser(userId: string): UserProfile | undefined {
    return this.records.get(userId)?.user;
  }

  getSession(userId: string): OnboardingSession | undefined {
    return this.records.get(userId)?.session;
  }

  updateSessionState(
    userId: string,
    state: ConversationState,
    sessionData?: SessionData,
  ): OnboardingSession | undefined {
    const record = this.records.get(userId);
    if (!record) {
      return undefined;
    }

    const session: OnboardingSession = {
      ...record.session,
      currentState: state,
      sessionData: sessionData ? structuredClone(sessionData) : record.session.sessionData,
      updatedAt: this.timestamp(),
    };

    this.records.set(userId, { ...record, session });
    this.persistRecord(userId);
    return session;
  }

  updateUser(userId: string, fields: ProfileFields): UserProfile | undefined {
    const record = this.records.get(userId);
    if (!record) {
      return undefined;
    }

    const user: UserProfile = {
      ...record.user,
      ...fields,
      updatedAt: this.timestamp(),
    };

    this.records.set(userId, { ...record, user });
    this.persistRecord(userId);
    return user;
  }

  // ============================================
  // VEHICLES & MESSAGES
  // ============================================

  saveVehicle(userId: string, vehicle: VehicleDraft): VehicleRecord | undefined {
    const record = this.records.get(userId);
    if (!record) {
      return undefined;
    }

    const saved: VehicleRecord = {
      ...vehicle,
      id: uuidv4(),
      userId,
      createdAt: this.timestamp(),
    };

    this.records.set(userId, { ...record, vehicles: [...record.vehicles, saved] });
    this.persistRecord(userId);
    return saved;
  }

  listVehicles(userId: string): VehicleRecord[] {
    return [...(this.records.get(userId)?.vehicles ?? [])];
  }

  saveMessage(userId: string, role: MessageRole, content: string): ChatMessage | undefined {
    const record = this.records.get(userId);
    if (!record) {
      return undefined;
    }

    const message: ChatMessage = {
      id: uuidv4(),
      userId,
      role,
      content,
      timestamp: this.timestamp(),
    };

    this.records.set(userId, { ...record, messages: [...record.messages, message] });
    this.persistRecord(userId);
    return message;
  }

  getMessages(userId: string): ChatMessage[] {
    return [...(this.records.get(userId)?.messages ?? [])];
  }
}

const UserProfileSchema = z.object({
  id: z.string().min(1),
  sessionKey: z.string().min(1),
  zipCode: z.string().nullable(),
  fullName: z.string().nullable(),
  email: z.string().nullable(),
  licenseType: z.enum(LICENSE_TYPES).nullable(),
  licenseStatus: z.enum(LICENSE_STATUSES).nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const OnboardingRecordSchema = z.object({
  user: UserProfileSchema,
  session: z.object({
    userId: z.string(),
    currentState: z.string().min(1),
    sessionData: z.unknown().transform(normalizeSessionData),
    createdAt: z.string(),
    updatedAt: z.string(),
  }),
  vehicles: z
    .array(VehicleDraftSchema.extend({ id: z.string(), userId: z.string(), createdAt: z.string() }))
    .default([]),
  messages: z
    .array(
      z.object({
        id: z.string(),
        userId: z.string(),
        role: z.enum(['user', 'assistant']),
        content: z.string(),
        timestamp: z.string(),
      }),
    )
    .default([]),
});

/** Restores a record read back from JSON; records that do not match the schema are skipped */
function reviveRecord(raw: unknown): OnboardingRecord | null {
  const parsed = OnboardingRecordSchema.safeParse(raw);
  if (!parsed.success) {
    console.warn('[STORE] Skipping unreadable record:', parsed.error.issues[0]?.message);
    return null;
  }
  return parsed.data;
}
