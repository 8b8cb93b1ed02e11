import { z } from 'zod';
import type { FastifyInstance } from 'fastify';
import { v4 as uuidv4 } from 'uuid';
import type { OnboardingExecutor } from '../engine/onboardingExecutor.js';
import { SessionIdSchema, readSessionHeader } from '../api/onboarding.js';

const StartBodySchema = z
  .object({
    sessionId: SessionIdSchema.optional(),
  })
  .optional();

export async function registerStartRoute(app: FastifyInstance, executor: OnboardingExecutor) {
  app.post('/onboarding/start', async (req, reply) => {
    const parsed = StartBodySchema.safeParse(req.body ?? undefined);
    if (!parsed.success) {
      return reply.code(400).send({
        error: 'BAD_REQUEST',
        details: parsed.error.flatten(),
      });
    }

    const header = readSessionHeader(req.headers);
    if (!header.ok) {
      return reply.code(400).send({ error: 'BAD_REQUEST', message: header.message });
    }

    const providedSessionId = header.sessionId ?? parsed.data?.sessionId;
    const sessionId = providedSessionId ?? uuidv4();
    if (!providedSessionId) {
      app.log.info({ sessionId }, 'New onboarding session');
    }

    const result = await executor.startConversation(sessionId);
    app.log.info({ sessionId, state: result.state }, 'Onboarding conversation started');
    return reply.send(result);
  });
}
