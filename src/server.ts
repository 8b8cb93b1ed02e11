import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import { env } from './env.js';
import { OnboardingExecutor } from './engine/onboardingExecutor.js';
import { OnboardingEngineError } from './engine/onboardingEngine.js';
import { OnboardingStore } from './store/sessionStore.js';
import { createChatCompleter } from './services/openaiClient.js';
import { createPromptRephraser, passthroughRephraser } from './services/promptRephraser.js';
import { registerOnboardingRoutes } from './api/onboarding.js';
import { registerStartRoute } from './routes/start.js';

export interface BuildServerOptions {
  executor?: OnboardingExecutor;
  logger?: FastifyServerOptions['logger'];
}

function createDefaultExecutor(): { executor: OnboardingExecutor; store: OnboardingStore } {
  const store = new OnboardingStore({
    persistPath: env.ONBOARDING_PERSIST_PATH ?? null,
    redisUrl: env.REDIS_URL ?? null,
  });
  const rephraser = env.OPENAI_API_KEY
    ? createPromptRephraser(
        createChatCompleter({
          apiKey: env.OPENAI_API_KEY,
          model: env.OPENAI_MODEL,
          fallbackModel: env.OPENAI_FALLBACK_MODEL,
        }),
      )
    : passthroughRephraser;
  if (!env.OPENAI_API_KEY) {
    console.warn('[OPENAI] OPENAI_API_KEY not set, prompts are sent without rephrasing');
  }
  return { executor: new OnboardingExecutor({ store, rephraser }), store };
}

export function buildServer(options: BuildServerOptions = {}): FastifyInstance {
  const app = Fastify({ logger: options.logger ?? { level: env.LOG_LEVEL } });

  let executor = options.executor;
  if (!executor) {
    const defaults = createDefaultExecutor();
    executor = defaults.executor;
    app.addHook('onClose', async () => {
      await defaults.store.close();
    });
  }

  app.setErrorHandler((error, req, reply) => {
    if (error instanceof OnboardingEngineError && error.code === 'SESSION_NOT_FOUND') {
      return reply.code(404).send({ error: error.code, message: error.message });
    }
    if (error instanceof OnboardingEngineError && error.code === 'STORE_UNAVAILABLE') {
      req.log.error({ err: error }, 'Session store unavailable');
      return reply.code(503).send({ error: error.code, message: error.message });
    }
    if (error.validation || error.statusCode === 400) {
      return reply.code(400).send({ error: 'BAD_REQUEST', message: error.message });
    }
    req.log.error({ err: error }, 'Request failed');
    return reply.code(500).send({
      error: 'INTERNAL_ERROR',
      message: error.message,
    });
  });

  const routesExecutor = executor;
  void app.register(async (instance) => {
    await registerOnboardingRoutes(instance, routesExecutor);
    await registerStartRoute(instance, routesExecutor);
  });

  return app;
}
