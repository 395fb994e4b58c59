import Fastify, { type FastifyBaseLogger } from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import type { AppContext } from './context.js';
import { toHttpError } from './errors.js';
import { healthRoutes } from './modules/health/health.controller.js';
import { threadRoutes } from './modules/threads/threads.controller.js';
import { messageRoutes } from './modules/messages/messages.controller.js';
import { runRoutes } from './modules/runs/runs.controller.js';
import { assistantRoutes } from './modules/assistants/assistants.controller.js';
import { workflowRoutes } from './modules/workflows/workflows.controller.js';
import { mcpConfigRoutes } from './modules/mcp-configs/mcp-configs.controller.js';
import { executionRoutes } from './modules/executions/executions.controller.js';
import { fileRoutes } from './modules/files/files.controller.js';

export function createApp(ctx: AppContext) {
  const logger: FastifyBaseLogger = ctx.logger;
  const app = Fastify({ logger });

  app.setErrorHandler((error, req, reply) => {
    const { statusCode, detail } = toHttpError(error);
    if (statusCode >= 500) {
      req.log.error({ err: error }, 'Request failed');
    }
    return reply.status(statusCode).send({ detail });
  });

  app.register(cors);
  app.register(multipart, {
    limits: { fileSize: ctx.config.maxUploadBytes, files: 1 },
    throwFileSizeLimit: false,
  });
  app.register(healthRoutes);
  app.register(threadRoutes, { ctx });
  app.register(messageRoutes, { ctx });
  app.register(runRoutes, { ctx });
  app.register(assistantRoutes, { ctx });
  app.register(workflowRoutes, { ctx });
  app.register(mcpConfigRoutes, { ctx });
  app.register(executionRoutes, { ctx });
  app.register(fileRoutes, { ctx });

  return app;
}
