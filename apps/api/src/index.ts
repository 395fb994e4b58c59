import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createAppContext } from './context.js';

const config = loadConfig();
const ctx = createAppContext(config);
const app = createApp(ctx);

let shuttingDown = false;

async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  ctx.logger.info({ signal }, 'Shutting down');

  try {
    await app.close();
    const drained = await ctx.scheduler.drain(config.shutdownTimeoutMs);
    if (!drained) {
      ctx.logger.warn({ timeoutMs: config.shutdownTimeoutMs }, 'Runs did not finish before shutdown');
    }
  } finally {
    ctx.close();
  }
  process.exit(0);
}

const start = async () => {
  try {
    if (config.migrateOnStart) {
      await ctx.migrate();
    }
    ctx.scheduler.start();
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`API server listening on http://${config.host}:${config.port}`);
  } catch (err) {
    app.log.fatal({ err }, 'API server failed to start');
    ctx.close();
    process.exit(1);
  }
};

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      ctx.logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  });
}

await start();
