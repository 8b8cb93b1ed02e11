import type { ConversationState, SessionData, VehicleDraft } from './conversation.js';
import type { ChatMessage, MessageRole, ProfileFields, UserProfile, VehicleRecord } from './profile.js';
import type { OnboardingRecord, OnboardingSession } from './session.js';

export interface SessionStore {
  getOrCreateUser(sessionKey: string): UserProfile;
  findUserBySessionKey(sessionKey: string): UserProfile | undefined;
  getSession(userId: string): OnboardingSession | undefined;
  updateSessionState(
    userId: string,
    state: ConversationState,
    sessionData?: SessionData,
  ): OnboardingSession | undefined;
}

export interface ProfileStore {
  getUser(userId: string): UserProfile | undefined;
  updateUser(userId: string, fields: ProfileFields): UserProfile | undefined;
  saveVehicle(userId: string, vehicle: VehicleDraft): VehicleRecord | undefined;
  listVehicles(userId: string): VehicleRecord[];
}

export interface MessageLog {
  saveMessage(userId: string, role: MessageRole, content: string): ChatMessage | undefined;
  getMessages(userId: string): ChatMessage[];
}

export interface OnboardingRepository extends SessionStore, ProfileStore, MessageLog {
  getRecord(userId: string): OnboardingRecord | undefined;
  /** Pulls a record from the backing store into memory when it is not loaded yet */
  loadBySessionKeyAsync(sessionKey: string): Promise<UserProfile | undefined>;
}
