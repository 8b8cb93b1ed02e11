import { readFile } from 'fs/promises';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import type { ConversationState } from '../types/conversation.js';
import type { ChatCompleter } from './openaiClient.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const DEFAULT_PROMPTS_DIR = join(__dirname, '../../prompts');

const REPHRASE_TEMPERATURE = 0.7;
const REPHRASE_MAX_TOKENS = 150;

export interface PromptRephraser {
  /** Conversational version of a canned prompt; the canned prompt itself on failure */
  generateResponse(state: ConversationState, basePrompt: string, userName?: string | null): Promise<string>;
  /** Friendly correction after a rejected answer; the guidance message on failure */
  generateErrorResponse(state: ConversationState, userInput: string, errorMessage: string): Promise<string>;
}

export interface PromptRephraserOptions {
  promptsDir?: string;
}

export function fallbackErrorResponse(errorMessage: string): string {
  return `I didn't understand that. ${errorMessage}`;
}

export function buildRephraseUserPrompt(
  state: ConversationState,
  basePrompt: string,
  userName?: string | null,
): string {
  return [
    `Current state: ${state}`,
    `Base message: ${basePrompt}`,
    `User name: ${userName || 'Not provided'}`,
    '',
    'Rewrite the base message conversationally. Use the user\'s name sparingly (about once every few turns).',
  ].join('\n');
}

export function buildErrorUserPrompt(state: ConversationState, userInput: string, errorMessage: string): string {
  return [
    `The user provided invalid input for ${state}.`,
    `User input: "${userInput}"`,
    `Error: ${errorMessage}`,
    'Create a friendly 1-2 sentence clarification.',
  ].join('\n');
}

export function createPromptRephraser(
  complete: ChatCompleter,
  options: PromptRephraserOptions = {},
): PromptRephraser {
  const promptsDir = options.promptsDir ?? DEFAULT_PROMPTS_DIR;
  const cache = new Map<string, string>();

  async function loadPromptFile(filename: string): Promise<string> {
    const cached = cache.get(filename);
    if (cached !== undefined) return cached;
    const content = (await readFile(join(promptsDir, filename), 'utf-8')).trim();
    cache.set(filename, content);
    return content;
  }

  return {
    async generateResponse(state, basePrompt, userName) {
      try {
        const systemPrompt = await loadPromptFile('system/ONBOARDING_ASSISTANT.txt');
        return await complete({
          messages: [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: buildRephraseUserPrompt(state, basePrompt, userName) },
          ],
          temperature: REPHRASE_TEMPERATURE,
          maxTokens: REPHRASE_MAX_TOKENS,
        });
      } catch (error) {
        console.error('[REPHRASE] response error:', error);
        return basePrompt;
      }
    },

    async generateErrorResponse(state, userInput, errorMessage) {
      try {
        const systemPrompt = await loadPromptFile('system/INPUT_CORRECTION.txt');
        return await complete({
          messages: [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: buildErrorUserPrompt(state, userInput, errorMessage) },
          ],
          temperature: REPHRASE_TEMPERATURE,
          maxTokens: REPHRASE_MAX_TOKENS,
        });
      } catch (error) {
        console.error('[REPHRASE] error-response error:', error);
        return fallbackErrorResponse(errorMessage);
      }
    },
  };
}

/** Sends the canned texts unchanged */
export const passthroughRephraser: PromptRephraser = {
  async generateResponse(_state, basePrompt) {
    return basePrompt;
  },
  async generateErrorResponse(_state, _userInput, errorMessage) {
    return fallbackErrorResponse(errorMessage);
  },
};
