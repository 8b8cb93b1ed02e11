import { env } from './env.js';
import { buildServer } from './server.js';

const app = buildServer();

void (async () => {
  try {
    await app.listen({ port: env.PORT, host: env.HOST });
  } catch (err: unknown) {
    app.log.error(err);
    process.exit(1);
  }
})();

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(err);
        process.exit(1);
      },
    );
  });
}

export default app;
