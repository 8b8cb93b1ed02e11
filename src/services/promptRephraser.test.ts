import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { readFileSync } from 'fs';
import { join } from 'path';
import type { ChatCompleter } from './openaiClient.js';
import {
  DEFAULT_PROMPTS_DIR,
  buildErrorUserPrompt,
  buildRephraseUserPrompt,
  createPromptRephraser,
  fallbackErrorResponse,
  passthroughRephraser,
} from './promptRephraser.js';

const ASSISTANT_PROMPT = readFileSync(join(DEFAULT_PROMPTS_DIR, 'system/ONBOARDING_ASSISTANT.txt'), 'utf-8').trim();
const CORRECTION_PROMPT = readFileSync(join(DEFAULT_PROMPTS_DIR, 'system/INPUT_CORRECTION.txt'), 'utf-8').trim();

describe('prompt builders', () => {
  it('describes the step for a rephrase', () => {
    expect(buildRephraseUserPrompt('collecting_email', "Thanks! What's your email address?", 'Jane Doe')).toBe(
      [
        'Current state: collecting_email',
        "Base message: Thanks! What's your email address?",
        'User name: Jane Doe',
        '',
        "Rewrite the base message conversationally. Use the user's name sparingly (about once every few turns).",
      ].join('\n'),
    );
  });

  it('marks a missing name', () => {
    expect(buildRephraseUserPrompt('collecting_zip', 'Zip?', null).split('\n')[2]).toBe('User name: Not provided');
    expect(buildRephraseUserPrompt('collecting_zip', 'Zip?').split('\n')[2]).toBe('User name: Not provided');
  });

  it('quotes the rejected input', () => {
    expect(buildErrorUserPrompt('collecting_zip', 'abc', 'Please provide a valid 5-digit zip code.')).toBe(
      [
        'The user provided invalid input for collecting_zip.',
        'User input: "abc"',
        'Error: Please provide a valid 5-digit zip code.',
        'Create a friendly 1-2 sentence clarification.',
      ].join('\n'),
    );
  });
});

describe('createPromptRephraser', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('sends the assistant prompt and the step description', async () => {
    const complete = vi.fn<ChatCompleter>().mockResolvedValue('Hi Jane! What email should we use?');
    const rephraser = createPromptRephraser(complete);

    const reply = await rephraser.generateResponse('collecting_email', "Thanks! What's your email address?", 'Jane Doe');

    expect(reply).toBe('Hi Jane! What email should we use?');
    expect(complete).toHaveBeenCalledWith({
      messages: [
        { role: 'system', content: ASSISTANT_PROMPT },
        {
          role: 'user',
          content: buildRephraseUserPrompt('collecting_email', "Thanks! What's your email address?", 'Jane Doe'),
        },
      ],
      temperature: 0.7,
      maxTokens: 150,
    });
  });

  it('uses the correction prompt for rejected answers', async () => {
    const complete = vi.fn<ChatCompleter>().mockResolvedValue('Zip codes have five digits, could you try again?');
    const rephraser = createPromptRephraser(complete);

    await rephraser.generateErrorResponse('collecting_zip', 'abc', 'Please provide a valid 5-digit zip code.');

    const params = complete.mock.calls[0][0];
    expect(params.messages[0]).toEqual({ role: 'system', content: CORRECTION_PROMPT });
    expect(params.messages[1].content).toContain('User input: "abc"');
  });

  it('falls back to the canned prompt when the model fails', async () => {
    const complete = vi.fn<ChatCompleter>().mockRejectedValue(new Error('timeout'));
    const rephraser = createPromptRephraser(complete);

    await expect(rephraser.generateResponse('collecting_zip', "What's your 5-digit zip code?")).resolves.toBe(
      "What's your 5-digit zip code?",
    );
    await expect(
      rephraser.generateErrorResponse('collecting_zip', 'abc', 'Please provide a valid 5-digit zip code.'),
    ).resolves.toBe("I didn't understand that. Please provide a valid 5-digit zip code.");
  });

  it('falls back when the prompt file is missing', async () => {
    const complete = vi.fn<ChatCompleter>().mockResolvedValue('unused');
    const rephraser = createPromptRephraser(complete, { promptsDir: join(DEFAULT_PROMPTS_DIR, 'missing') });

    await expect(rephraser.generateResponse('collecting_zip', 'Zip?')).resolves.toBe('Zip?');
    expect(complete).not.toHaveBeenCalled();
  });
});

describe('passthroughRephraser', () => {
  it('returns the canned texts', async () => {
    await expect(passthroughRephraser.generateResponse('collecting_zip', 'Zip?', 'Jane Doe')).resolves.toBe('Zip?');
    await expect(passthroughRephraser.generateErrorResponse('collecting_zip', 'x', 'Five digits.')).resolves.toBe(
      fallbackErrorResponse('Five digits.'),
    );
  });
});
