/**
 * Walks a full onboarding conversation (two vehicles, one per mileage branch)
 * through the executor with an in-memory store and the canned prompts.
 *
 * Exits 1 when a turn is rejected or the conversation does not end completed.
 */

import { v4 as uuidv4 } from 'uuid';
import { OnboardingExecutor } from '../src/engine/onboardingExecutor.js';
import { OnboardingStore } from '../src/store/sessionStore.js';
import { passthroughRephraser } from '../src/services/promptRephraser.js';

const ANSWERS = [
  '90210',
  'Jane Doe',
  'Jane.Doe@Example.com',
  'ok',
  '2022 honda civic',
  'commuting',
  'yes',
  '5',
  '12',
  'yep',
  'ready',
  '1HGCM82633A004352',
  'business',
  'no',
  '15,000',
  'nope',
  'personal',
  'valid',
];

async function verifyFlow() {
  console.log('Onboarding flow check\n');

  const store = new OnboardingStore();
  const executor = new OnboardingExecutor({ store, rephraser: passthroughRephraser });
  const sessionId = uuidv4();

  try {
    const opening = await executor.startConversation(sessionId);
    console.log(`[${opening.state} ${opening.progress}%] bot: ${opening.response}`);

    for (const answer of ANSWERS) {
      const turn = await executor.handleUserMessage(sessionId, answer);
      console.log(`  user: ${answer}`);
      console.log(`[${turn.state} ${turn.progress}%] bot: ${turn.response}`);
      if (!turn.accepted) {
        throw new Error(`Answer "${answer}" rejected: ${turn.error}`);
      }
    }

    const summary = await executor.getSummary(sessionId);
    if (summary.state !== 'completed') {
      throw new Error(`Expected completed, got ${summary.state}`);
    }

    console.log('\nSummary:');
    console.log(JSON.stringify(summary, null, 2));
    await store.close();
  } catch (error) {
    console.error('\nERROR:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

void verifyFlow();
