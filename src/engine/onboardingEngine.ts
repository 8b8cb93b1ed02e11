import { isConversationState, type ConversationState } from '../types/conversation.js';
import { getPrompt } from './statePrompts.js';
import { validate } from './validators.js';
import { nextState, progress } from './transitions.js';

export type OnboardingErrorCode =
  | 'UNKNOWN_STATE'
  | 'UNEXPECTED_VALUE'
  | 'SESSION_NOT_FOUND'
  | 'STORE_UNAVAILABLE';

export class OnboardingEngineError extends Error {
  constructor(
    message: string,
    public readonly code: OnboardingErrorCode,
  ) {
    super(message);
    this.name = 'OnboardingEngineError';
  }
}

/**
 * Reads a stored state string back into the enumeration
 * @throws {OnboardingEngineError} UNKNOWN_STATE when the string is not a state
 */
export function parseConversationState(raw: string): ConversationState {
  if (!isConversationState(raw)) {
    throw new OnboardingEngineError(`Unknown conversation state: ${raw}`, 'UNKNOWN_STATE');
  }
  return raw;
}

/** The synchronous contract the service drives; none of these perform I/O */
export const conversationEngine = {
  getPrompt,
  validate,
  nextState,
  progress,
};

export type ConversationEngine = typeof conversationEngine;
