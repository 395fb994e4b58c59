import type { FastifyInstance } from 'fastify';
import { buildHealthPayload } from './health.schema.js';

export async function healthRoutes(app: FastifyInstance) {
  app.get('/health', async () => buildHealthPayload());
}
