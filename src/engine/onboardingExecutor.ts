import type { ConversationState, SessionData } from '../types/conversation.js';
import { INITIAL_STATE } from '../types/conversation.js';
import type { ChatMessage, UserProfile } from '../types/profile.js';
import type { OnboardingRecord, OnboardingSession } from '../types/session.js';
import type { OnboardingRepository } from '../types/store.js';
import type { PromptRephraser } from '../services/promptRephraser.js';
import { toOnboardingSummary, type OnboardingSummary } from '../services/summaryService.js';
import { KeyedSerialQueue } from '../utils/sessionQueue.js';
import { OnboardingEngineError, conversationEngine, parseConversationState } from './onboardingEngine.js';
import { applyValidatedValue, normalizeSessionData } from './sessionData.js';

export interface TurnResult {
  sessionId: string;
  state: ConversationState;
  progress: number;
  response: string;
  /** false when the answer was rejected and the same question is asked again */
  accepted: boolean;
  error?: string;
}

export interface OnboardingExecutorDeps {
  store: OnboardingRepository;
  rephraser: PromptRephraser;
  now?: () => Date;
}

export class OnboardingExecutor {
  private readonly queue = new KeyedSerialQueue();

  constructor(private readonly deps: OnboardingExecutorDeps) {}

  /**
   * Opens or resumes the conversation for a session key.
   * A fresh session gets the greeting and moves on to the zip question; a session
   * already under way gets its current question again.
   */
  startConversation(sessionKey: string): Promise<TurnResult> {
    return this.queue.run(sessionKey, async () => {
      const user = await this.loadOrCreateUser(sessionKey);
      const current = this.currentState(user);

      if (current !== INITIAL_STATE) {
        const response = await this.deps.rephraser.generateResponse(
          current,
          conversationEngine.getPrompt(current),
          user.fullName,
        );
        this.deps.store.saveMessage(user.id, 'assistant', response);
        return this.result(sessionKey, current, response, true);
      }

      const greeting = await this.deps.rephraser.generateResponse(
        INITIAL_STATE,
        conversationEngine.getPrompt(INITIAL_STATE),
      );
      const next = conversationEngine.nextState(INITIAL_STATE, '', this.sessionData(user));
      this.deps.store.updateSessionState(user.id, next);
      this.deps.store.saveMessage(user.id, 'assistant', greeting);
      return this.result(sessionKey, next, greeting, true);
    });
  }

  /** Runs one user turn: validate, apply, advance, reply */
  handleUserMessage(sessionKey: string, text: string): Promise<TurnResult> {
    return this.queue.run(sessionKey, async () => {
      const { store, rephraser } = this.deps;
      const user = await this.loadOrCreateUser(sessionKey);
      store.saveMessage(user.id, 'user', text);

      const current = this.currentState(user);
      const validation = conversationEngine.validate(current, text, { now: this.now() });

      if (!validation.ok) {
        const reply = await rephraser.generateErrorResponse(current, text, validation.error);
        store.saveMessage(user.id, 'assistant', reply);
        return { ...this.result(sessionKey, current, reply, false), error: validation.error };
      }

      const sessionData = this.sessionData(user);
      const effects = applyValidatedValue(current, validation.value, sessionData);
      if (effects.profileUpdate) {
        store.updateUser(user.id, effects.profileUpdate);
      }
      if (effects.completedVehicle) {
        store.saveVehicle(user.id, effects.completedVehicle);
      }

      const next = conversationEngine.nextState(current, validation.value, sessionData);
      store.updateSessionState(user.id, next, sessionData);

      const fullName = store.getUser(user.id)?.fullName ?? null;
      const reply = await rephraser.generateResponse(next, conversationEngine.getPrompt(next), fullName);
      store.saveMessage(user.id, 'assistant', reply);
      return this.result(sessionKey, next, reply, true);
    });
  }

  /** @throws {OnboardingEngineError} SESSION_NOT_FOUND */
  async getSummary(sessionKey: string): Promise<OnboardingSummary> {
    return toOnboardingSummary(await this.requireRecord(sessionKey));
  }

  /** @throws {OnboardingEngineError} SESSION_NOT_FOUND */
  async getTranscript(sessionKey: string): Promise<ChatMessage[]> {
    return (await this.requireRecord(sessionKey)).messages;
  }

  // ============================================
  // HELPERS
  // ============================================

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }

  private async loadOrCreateUser(sessionKey: string): Promise<UserProfile> {
    const loaded = await this.deps.store.loadBySessionKeyAsync(sessionKey);
    return loaded ?? this.deps.store.getOrCreateUser(sessionKey);
  }

  private async requireRecord(sessionKey: string): Promise<OnboardingRecord> {
    const user = await this.deps.store.loadBySessionKeyAsync(sessionKey);
    const record = user ? this.deps.store.getRecord(user.id) : undefined;
    if (!record) {
      throw new OnboardingEngineError(`No onboarding session for ${sessionKey}`, 'SESSION_NOT_FOUND');
    }
    return record;
  }

  private requireSession(user: UserProfile): OnboardingSession {
    const session = this.deps.store.getSession(user.id);
    if (!session) {
      throw new OnboardingEngineError(`Session missing for user ${user.id}`, 'SESSION_NOT_FOUND');
    }
    return session;
  }

  private currentState(user: UserProfile): ConversationState {
    return parseConversationState(this.requireSession(user).currentState);
  }

  /** Working copy of the stored session data; the store only sees it again through updateSessionState */
  private sessionData(user: UserProfile): SessionData {
    return normalizeSessionData(this.requireSession(user).sessionData);
  }

  private result(sessionKey: string, state: ConversationState, response: string, accepted: boolean): TurnResult {
    return {
      sessionId: sessionKey,
      state,
      progress: conversationEngine.progress(state),
      response,
      accepted,
    };
  }
}
