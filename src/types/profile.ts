import type { LicenseStatus, LicenseType, VehicleDraft } from './conversation.js';

export interface UserProfile {
  id: string;
  sessionKey: string;
  zipCode: string | null;
  fullName: string | null;
  email: string | null;
  licenseType: LicenseType | null;
  licenseStatus: LicenseStatus | null;
  createdAt: string;
  updatedAt: string;
}

/** Fields the dialogue is allowed to write on a profile */
export type ProfileFields = Partial<
  Pick<UserProfile, 'zipCode' | 'fullName' | 'email' | 'licenseType' | 'licenseStatus'>
>;

export interface VehicleRecord extends VehicleDraft {
  id: string;
  userId: string;
  createdAt: string;
}

export type MessageRole = 'user' | 'assistant';

export interface ChatMessage {
  id: string;
  userId: string;
  role: MessageRole;
  content: string;
  timestamp: string;
}
