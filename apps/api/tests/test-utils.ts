/**
 * Test utilities for the HTTP API
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import type { Agent, AgentContext, AgentRegistry } from '@threadline/core';
import { createApp } from '../src/app.js';
import { parseConfig } from '../src/config.js';
import { createAppContext, type AppContext } from '../src/context.js';

export const WORKSPACE = 'ws-test';
export const headers = { 'x-workspace-id': WORKSPACE };

export interface TestApp {
  app: ReturnType<typeof createApp>;
  ctx: AppContext;
  dataDir: string;
  close(): Promise<void>;
}

export async function createTestApp(
  options: { env?: Record<string, string>; agents?: AgentRegistry } = {}
): Promise<TestApp> {
  const dataDir = await mkdtemp(join(tmpdir(), 'threadline-api-'));
  const config = parseConfig({
    DATA_DIR: dataDir,
    DATABASE_URL: ':memory:',
    LOG_LEVEL: 'silent',
    ...options.env,
  });
  const ctx = createAppContext(config, { agents: options.agents });
  await ctx.migrate();
  const app = createApp(ctx);
  await app.ready();

  return {
    app,
    ctx,
    dataDir,
    close: async () => {
      await app.close();
      await ctx.scheduler.drain(1000);
      ctx.close();
      await rm(dataDir, { recursive: true, force: true });
    },
  };
}

/** Returns once the signal is aborted. */
export class WaitForCancelAgent implements Agent {
  async act({ signal }: AgentContext): Promise<void> {
    if (signal.aborted) return;
    await new Promise<void>((resolve) => {
      signal.addEventListener('abort', () => resolve(), { once: true });
    });
  }
}

const eventLineSchema = z.object({ event: z.string(), data: z.unknown() });

export function parseEventLines(payload: string) {
  return payload
    .trim()
    .split('\n')
    .map((line) => eventLineSchema.parse(JSON.parse(line)));
}

export function multipartUpload(filename: string, contentType: string, content: string) {
  const boundary = '----threadline-test-boundary';
  const payload =
    `--${boundary}\r\n` +
    `Content-Disposition: form-data; name="file"; filename="${filename}"\r\n` +
    `Content-Type: ${contentType}\r\n\r\n` +
    `${content}\r\n` +
    `--${boundary}--\r\n`;
  return {
    payload,
    headers: { ...headers, 'content-type': `multipart/form-data; boundary=${boundary}` },
  };
}

export async function createAssistant(app: TestApp['app'], body: Record<string, unknown> = {}) {
  const res = await app.inject({ method: 'POST', url: '/assistants', headers, payload: { name: 'Helper', ...body } });
  return z.object({ id: z.string() }).parse(res.json());
}
