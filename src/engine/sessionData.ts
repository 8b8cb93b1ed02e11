import { z } from 'zod';
import {
  VEHICLE_USES,
  isLicenseStatus,
  isLicenseType,
  isVehicleIdentity,
  isVehicleUse,
  type ConversationState,
  type SessionData,
  type ValidatedValue,
  type VehicleDraft,
} from '../types/conversation.js';
import type { ProfileFields } from '../types/profile.js';
import { OnboardingEngineError } from './onboardingEngine.js';

/** Writes the caller still has to perform after an answer was applied */
export interface TurnEffects {
  profileUpdate?: ProfileFields;
  completedVehicle?: VehicleDraft;
}

export function createSessionData(): SessionData {
  return { currentVehicle: {} };
}

export const VehicleDraftSchema = z.object({
  vin: z.string().optional(),
  year: z.number().int().optional(),
  make: z.string().optional(),
  bodyType: z.string().optional(),
  vehicleUse: z.enum(VEHICLE_USES).optional(),
  blindSpotWarning: z.boolean().optional(),
  daysPerWeek: z.number().int().optional(),
  oneWayMiles: z.number().optional(),
  annualMileage: z.number().int().optional(),
});

const SessionDataSchema = z.object({
  currentVehicle: VehicleDraftSchema.catch({}),
});

/** Rebuilds session data from its stored JSON form; anything unreadable becomes an empty draft */
export function normalizeSessionData(raw: unknown): SessionData {
  const parsed = SessionDataSchema.safeParse(raw);
  return parsed.success ? parsed.data : createSessionData();
}

function unexpected(state: ConversationState, value: ValidatedValue): OnboardingEngineError {
  return new OnboardingEngineError(
    `Value ${JSON.stringify(value)} does not fit state ${state}`,
    'UNEXPECTED_VALUE',
  );
}

function asString(state: ConversationState, value: ValidatedValue): string {
  if (typeof value !== 'string') throw unexpected(state, value);
  return value;
}

function asNumber(state: ConversationState, value: ValidatedValue): number {
  if (typeof value !== 'number') throw unexpected(state, value);
  return value;
}

function asBoolean(state: ConversationState, value: ValidatedValue): boolean {
  if (typeof value !== 'boolean') throw unexpected(state, value);
  return value;
}

function finalizeVehicle(sessionData: SessionData): TurnEffects {
  const completedVehicle = sessionData.currentVehicle;
  sessionData.currentVehicle = {};
  return { completedVehicle };
}

/**
 * Applies a validated answer to the caller-owned session data and returns the
 * profile/vehicle writes it implies.
 * @throws {OnboardingEngineError} UNEXPECTED_VALUE when the value was not produced by the state's validator
 */
export function applyValidatedValue(
  state: ConversationState,
  value: ValidatedValue,
  sessionData: SessionData,
): TurnEffects {
  switch (state) {
    case 'collecting_zip':
      return { profileUpdate: { zipCode: asString(state, value) } };

    case 'collecting_name':
      return { profileUpdate: { fullName: asString(state, value) } };

    case 'collecting_email':
      return { profileUpdate: { email: asString(state, value) } };

    case 'collecting_vehicle_info':
      if (!isVehicleIdentity(value)) throw unexpected(state, value);
      sessionData.currentVehicle = { ...value };
      return {};

    case 'collecting_vehicle_use':
      if (!isVehicleUse(value)) throw unexpected(state, value);
      sessionData.currentVehicle.vehicleUse = value;
      return {};

    case 'collecting_blind_spot':
      sessionData.currentVehicle.blindSpotWarning = asBoolean(state, value);
      return {};

    case 'collecting_commute_days':
      sessionData.currentVehicle.daysPerWeek = asNumber(state, value);
      return {};

    case 'collecting_commute_miles':
      sessionData.currentVehicle.oneWayMiles = asNumber(state, value);
      return finalizeVehicle(sessionData);

    case 'collecting_annual_mileage':
      sessionData.currentVehicle.annualMileage = asNumber(state, value);
      return finalizeVehicle(sessionData);

    case 'collecting_license_type':
      if (!isLicenseType(value)) throw unexpected(state, value);
      return { profileUpdate: { licenseType: value } };

    case 'collecting_license_status':
      if (!isLicenseStatus(value)) throw unexpected(state, value);
      return { profileUpdate: { licenseStatus: value } };

    case 'start':
    case 'vehicle_intro':
    case 'ask_more_vehicles':
    case 'completed':
      return {};
  }
}
