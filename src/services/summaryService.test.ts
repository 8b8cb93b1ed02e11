import { describe, it, expect } from 'vitest';
import type { OnboardingRecord } from '../types/session.js';
import { OnboardingEngineError } from '../engine/onboardingEngine.js';
import { getStatusLabel, toOnboardingSummary } from './summaryService.js';

function record(currentState: string): OnboardingRecord {
  return {
    user: {
      id: 'user-1',
      sessionKey: 'session-1',
      zipCode: '90210',
      fullName: 'Jane Doe',
      email: 'jane@example.com',
      licenseType: null,
      licenseStatus: null,
      createdAt: '2025-01-01T10:00:00.000Z',
      updatedAt: '2025-01-01T10:02:00.000Z',
    },
    session: {
      userId: 'user-1',
      currentState,
      sessionData: { currentVehicle: {} },
      createdAt: '2025-01-01T10:00:00.000Z',
      updatedAt: '2025-01-01T10:03:00.000Z',
    },
    vehicles: [
      {
        id: 'vehicle-1',
        userId: 'user-1',
        createdAt: '2025-01-01T10:03:00.000Z',
        vin: '1HGCM82633A004352',
        vehicleUse: 'business',
        blindSpotWarning: false,
        annualMileage: 12000,
      },
    ],
    messages: [
      { id: 'm1', userId: 'user-1', role: 'user', content: 'no', timestamp: '2025-01-01T10:04:00.000Z' },
      { id: 'm2', userId: 'user-1', role: 'assistant', content: 'License?', timestamp: '2025-01-01T10:03:30.000Z' },
    ],
  };
}

describe('getStatusLabel', () => {
  it('names the section the user is in', () => {
    expect(getStatusLabel('start', 0)).toBe('Not started');
    expect(getStatusLabel('collecting_email', 0)).toBe('Contact details');
    expect(getStatusLabel('collecting_vehicle_use', 0)).toBe('Vehicle 1 in progress');
    expect(getStatusLabel('vehicle_intro', 2)).toBe('Vehicle 3 in progress');
    expect(getStatusLabel('ask_more_vehicles', 1)).toBe('1 vehicle(s) added');
    expect(getStatusLabel('collecting_license_status', 1)).toBe('License details');
    expect(getStatusLabel('completed', 1)).toBe('Onboarding complete');
  });
});

describe('toOnboardingSummary', () => {
  it('summarizes profile, vehicles and activity', () => {
    const summary = toOnboardingSummary(record('collecting_license_type'));

    expect(summary).toEqual({
      sessionId: 'session-1',
      state: 'collecting_license_type',
      progress: 85,
      statusLabel: 'License details',
      completed: false,
      profile: {
        zipCode: '90210',
        fullName: 'Jane Doe',
        email: 'jane@example.com',
        licenseType: null,
        licenseStatus: null,
      },
      vehicles: record('collecting_license_type').vehicles,
      startedAt: '2025-01-01T10:00:00.000Z',
      lastActivityAt: '2025-01-01T10:04:00.000Z',
    });
  });

  it('flags completion', () => {
    const summary = toOnboardingSummary(record('completed'));
    expect(summary.completed).toBe(true);
    expect(summary.progress).toBe(100);
  });

  it('rejects an unknown stored state', () => {
    expect(() => toOnboardingSummary(record('collecting_pets'))).toThrow(OnboardingEngineError);
  });
});
