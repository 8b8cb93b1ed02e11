import type { ConversationState, SessionData, ValidatedValue } from '../types/conversation.js';

/**
 * Successor of a state. Most states have a fixed successor; three pick it from the
 * answer just given or from the vehicle being collected.
 */
export type Transition =
  | { kind: 'fixed'; next: ConversationState }
  | { kind: 'byVehicleUse' }
  | { kind: 'byMoreVehicles' }
  | { kind: 'byLicenseType' };

const to = (next: ConversationState): Transition => ({ kind: 'fixed', next });

export const TRANSITIONS: Record<ConversationState, Transition> = {
  start: to('collecting_zip'),
  collecting_zip: to('collecting_name'),
  collecting_name: to('collecting_email'),
  collecting_email: to('vehicle_intro'),
  vehicle_intro: to('collecting_vehicle_info'),
  collecting_vehicle_info: to('collecting_vehicle_use'),
  collecting_vehicle_use: to('collecting_blind_spot'),
  collecting_blind_spot: { kind: 'byVehicleUse' },
  collecting_commute_days: to('collecting_commute_miles'),
  collecting_commute_miles: to('ask_more_vehicles'),
  collecting_annual_mileage: to('ask_more_vehicles'),
  ask_more_vehicles: { kind: 'byMoreVehicles' },
  collecting_license_type: { kind: 'byLicenseType' },
  collecting_license_status: to('completed'),
  completed: to('completed'),
};

export const PROGRESS: Record<ConversationState, number> = {
  start: 0,
  collecting_zip: 10,
  collecting_name: 20,
  collecting_email: 30,
  vehicle_intro: 35,
  collecting_vehicle_info: 40,
  collecting_vehicle_use: 50,
  collecting_blind_spot: 60,
  collecting_commute_days: 65,
  collecting_commute_miles: 70,
  collecting_annual_mileage: 70,
  ask_more_vehicles: 75,
  collecting_license_type: 85,
  collecting_license_status: 95,
  completed: 100,
};

/** Forward path through the commute branch, one vehicle, non-foreign license */
export const CANONICAL_PATH: readonly ConversationState[] = [
  'start',
  'collecting_zip',
  'collecting_name',
  'collecting_email',
  'vehicle_intro',
  'collecting_vehicle_info',
  'collecting_vehicle_use',
  'collecting_blind_spot',
  'collecting_commute_days',
  'collecting_commute_miles',
  'ask_more_vehicles',
  'collecting_license_type',
  'collecting_license_status',
  'completed',
];

/**
 * Next state after a successfully validated answer.
 * Calling it with an answer that failed validation is a caller error.
 */
export function nextState(
  current: ConversationState,
  value: ValidatedValue,
  sessionData: SessionData,
): ConversationState {
  const transition = TRANSITIONS[current];
  switch (transition.kind) {
    case 'fixed':
      return transition.next;
    case 'byVehicleUse':
      // keyed on the vehicle's use, not on the blind-spot answer
      return sessionData.currentVehicle?.vehicleUse === 'commuting'
        ? 'collecting_commute_days'
        : 'collecting_annual_mileage';
    case 'byMoreVehicles':
      return value === true ? 'vehicle_intro' : 'collecting_license_type';
    case 'byLicenseType':
      // foreign licenses skip the status question
      return value === 'foreign' ? 'completed' : 'collecting_license_status';
  }
}

export function progress(state: ConversationState): number {
  return PROGRESS[state];
}

export function isTerminalState(state: ConversationState): boolean {
  const transition = TRANSITIONS[state];
  return transition.kind === 'fixed' && transition.next === state;
}
