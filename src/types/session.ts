import type { SessionData } from './conversation.js';
import type { ChatMessage, UserProfile, VehicleRecord } from './profile.js';

export interface OnboardingSession {
  userId: string;
  /** Stored as a plain string; read it back through parseConversationState */
  currentState: string;
  sessionData: SessionData;
  createdAt: string;
  updatedAt: string;
}

/** Everything persisted for one user, stored and reloaded as a unit */
export interface OnboardingRecord {
  user: UserProfile;
  session: OnboardingSession;
  vehicles: VehicleRecord[];
  messages: ChatMessage[];
}
