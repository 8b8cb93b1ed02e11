import type { ConversationState } from '../types/conversation.js';

// Canned questions, one per state. The rephraser starts from these and falls back to them verbatim.
export const STATE_PROMPTS: Record<ConversationState, string> = {
  start: "Hello! I'll help you with your insurance onboarding. Let's start by getting your zip code.",
  collecting_zip: "What's your 5-digit zip code?",
  collecting_name: "Great! What's your full name?",
  collecting_email: "Thanks! What's your email address?",
  vehicle_intro:
    "Perfect! Now let's add your vehicle. I'll need either your VIN or your vehicle's year, make, and body type.",
  collecting_vehicle_info:
    "Please provide either your VIN or Year Make Body-Type (like '2022 Honda Civic').",
  collecting_vehicle_use:
    'How do you primarily use this vehicle? (commuting, commercial, farming, or business)',
  collecting_blind_spot: 'Does this vehicle have blind spot warning? (Yes or No)',
  collecting_commute_days: 'How many days per week do you commute with this vehicle?',
  collecting_commute_miles: "What's your one-way distance to work/school in miles?",
  collecting_annual_mileage: "What's the estimated annual mileage for this vehicle?",
  ask_more_vehicles: 'Would you like to add another vehicle? (Yes or No)',
  collecting_license_type: 'What type of license do you have? (Foreign, Personal, or Commercial)',
  collecting_license_status: "What's your license status? (Valid or Suspended)",
  completed: 'Thank you! Your onboarding is complete.',
};

export function getPrompt(state: ConversationState): string {
  return STATE_PROMPTS[state] ?? '';
}
