// ============================================
// CONVERSATION STATES
// ============================================

export const CONVERSATION_STATES = [
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
  'collecting_annual_mileage',
  'ask_more_vehicles',
  'collecting_license_type',
  'collecting_license_status',
  'completed',
] as const;

export type ConversationState = (typeof CONVERSATION_STATES)[number];

export const INITIAL_STATE: ConversationState = 'start';
export const TERMINAL_STATE: ConversationState = 'completed';

export function isConversationState(value: unknown): value is ConversationState {
  return typeof value === 'string' && (CONVERSATION_STATES as readonly string[]).includes(value);
}

// ============================================
// DOMAIN VALUES
// ============================================

export const VEHICLE_USES = ['commuting', 'business', 'commercial', 'farming'] as const;
export type VehicleUse = (typeof VEHICLE_USES)[number];

export const LICENSE_TYPES = ['foreign', 'personal', 'commercial'] as const;
export type LicenseType = (typeof LICENSE_TYPES)[number];

export const LICENSE_STATUSES = ['valid', 'suspended'] as const;
export type LicenseStatus = (typeof LICENSE_STATUSES)[number];

export function isVehicleUse(value: unknown): value is VehicleUse {
  return typeof value === 'string' && (VEHICLE_USES as readonly string[]).includes(value);
}

export function isLicenseType(value: unknown): value is LicenseType {
  return typeof value === 'string' && (LICENSE_TYPES as readonly string[]).includes(value);
}

export function isLicenseStatus(value: unknown): value is LicenseStatus {
  return typeof value === 'string' && (LICENSE_STATUSES as readonly string[]).includes(value);
}

// ============================================
// VALIDATED VALUES
// ============================================

export interface VinIdentity {
  vin: string;
}

export interface DescribedVehicle {
  year: number;
  make: string;
  bodyType: string;
}

/** Either a decoded-later VIN or the "Year Make Body-Type" triple */
export type VehicleIdentity = VinIdentity | DescribedVehicle;

export type ValidatedValue = string | boolean | number | VehicleIdentity;

export type ValidationResult<T = ValidatedValue> =
  | { ok: true; value: T }
  | { ok: false; error: string };

export function isVehicleIdentity(value: ValidatedValue): value is VehicleIdentity {
  return typeof value === 'object' && value !== null;
}

// ============================================
// SESSION DATA (caller-owned)
// ============================================

/** Vehicle being described across several turns; every field arrives on its own turn */
export interface VehicleDraft {
  vin?: string;
  year?: number;
  make?: string;
  bodyType?: string;
  vehicleUse?: VehicleUse;
  blindSpotWarning?: boolean;
  daysPerWeek?: number;
  oneWayMiles?: number;
  annualMileage?: number;
}

export interface SessionData {
  currentVehicle: VehicleDraft;
}
