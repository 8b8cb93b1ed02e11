import type { ConversationState } from '../types/conversation.js';
import type { UserProfile, VehicleRecord } from '../types/profile.js';
import type { OnboardingRecord } from '../types/session.js';
import { progress } from '../engine/transitions.js';
import { parseConversationState } from '../engine/onboardingEngine.js';

export interface OnboardingSummary {
  sessionId: string;
  state: ConversationState;
  progress: number;
  statusLabel: string;
  completed: boolean;
  profile: Pick<UserProfile, 'zipCode' | 'fullName' | 'email' | 'licenseType' | 'licenseStatus'>;
  vehicles: VehicleRecord[];
  startedAt: string;
  lastActivityAt: string;
}

export function getStatusLabel(state: ConversationState, savedVehicles: number): string {
  switch (state) {
    case 'start':
      return 'Not started';
    case 'collecting_zip':
    case 'collecting_name':
    case 'collecting_email':
      return 'Contact details';
    case 'vehicle_intro':
    case 'collecting_vehicle_info':
    case 'collecting_vehicle_use':
    case 'collecting_blind_spot':
    case 'collecting_commute_days':
    case 'collecting_commute_miles':
    case 'collecting_annual_mileage':
      return `Vehicle ${savedVehicles + 1} in progress`;
    case 'ask_more_vehicles':
      return `${savedVehicles} vehicle(s) added`;
    case 'collecting_license_type':
    case 'collecting_license_status':
      return 'License details';
    case 'completed':
      return 'Onboarding complete';
  }
}

/** @throws {OnboardingEngineError} UNKNOWN_STATE when the stored state is not a known state */
export function toOnboardingSummary(record: OnboardingRecord): OnboardingSummary {
  const { user, session, vehicles } = record;
  const state = parseConversationState(session.currentState);
  const lastActivityAt = [user.updatedAt, session.updatedAt]
    .concat(record.messages.map((m) => m.timestamp))
    .reduce((latest, t) => (t > latest ? t : latest));

  return {
    sessionId: user.sessionKey,
    state,
    progress: progress(state),
    statusLabel: getStatusLabel(state, vehicles.length),
    completed: state === 'completed',
    profile: {
      zipCode: user.zipCode,
      fullName: user.fullName,
      email: user.email,
      licenseType: user.licenseType,
      licenseStatus: user.licenseStatus,
    },
    vehicles,
    startedAt: user.createdAt,
    lastActivityAt,
  };
}
