import { z } from 'zod';
import type { FastifyInstance } from 'fastify';
import type { IncomingHttpHeaders } from 'http';
import type { OnboardingExecutor } from '../engine/onboardingExecutor.js';

export const SessionIdSchema = z.string().trim().min(8);

const MessageBodySchema = z.object({
  sessionId: SessionIdSchema.optional(),
  message: z.string().min(1),
});

const SessionParamsSchema = z.object({
  sessionId: z.string().min(1),
});

export type SessionHeader = { ok: true; sessionId?: string } | { ok: false; message: string };

/** Reads `x-session-id`; a present header follows the same rule as a body sessionId */
export function readSessionHeader(headers: IncomingHttpHeaders): SessionHeader {
  const value = headers['x-session-id'];
  const first = (Array.isArray(value) ? value[0] : value)?.trim();
  if (!first) {
    return { ok: true };
  }
  const parsed = SessionIdSchema.safeParse(first);
  return parsed.success
    ? { ok: true, sessionId: parsed.data }
    : { ok: false, message: 'x-session-id must be at least 8 characters' };
}

export async function registerOnboardingRoutes(app: FastifyInstance, executor: OnboardingExecutor) {
  app.get('/health', async () => {
    return { ok: true };
  });

  app.post('/onboarding/message', async (req, reply) => {
    const parsed = MessageBodySchema.safeParse(req.body);
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

    const sessionId = header.sessionId ?? parsed.data.sessionId;
    if (!sessionId) {
      return reply.code(400).send({
        error: 'MISSING_SESSION_ID',
        message: 'sessionId is required (x-session-id header or body)',
      });
    }

    const result = await executor.handleUserMessage(sessionId, parsed.data.message);
    if (!result.accepted) {
      app.log.info({ sessionId, state: result.state }, 'Answer rejected, asking again');
    } else {
      app.log.info({ sessionId, state: result.state, progress: result.progress }, 'Answer accepted');
    }
    return reply.send(result);
  });

  app.get('/onboarding/:sessionId', async (req, reply) => {
    const parsed = SessionParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      return reply.code(400).send({
        error: 'BAD_REQUEST',
        details: parsed.error.flatten(),
      });
    }
    return reply.send(await executor.getSummary(parsed.data.sessionId));
  });

  app.get('/onboarding/:sessionId/messages', async (req, reply) => {
    const parsed = SessionParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      return reply.code(400).send({
        error: 'BAD_REQUEST',
        details: parsed.error.flatten(),
      });
    }
    const messages = await executor.getTranscript(parsed.data.sessionId);
    return reply.send({ sessionId: parsed.data.sessionId, messages });
  });
}
