import { z } from 'zod';
import { mcpServerSchema } from '@threadline/sdk';

export const createMcpConfigSchema = z.object({
  name: z.string().min(1).max(256),
  mcp_server: mcpServerSchema,
});

export const modifyMcpConfigSchema = createMcpConfigSchema.partial();

export type CreateMcpConfigInput = z.infer<typeof createMcpConfigSchema>;
export type ModifyMcpConfigInput = z.infer<typeof modifyMcpConfigSchema>;
