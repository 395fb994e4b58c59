import { z } from 'zod';

export const createWorkflowSchema = z.object({
  name: z.string().min(1).max(256),
  description: z.string(),
  tags: z.array(z.string().min(1)).default([]),
  assistant_id: z.string().min(1),
});

export const modifyWorkflowSchema = z
  .object({
    name: z.string().min(1).max(256),
    description: z.string(),
    tags: z.array(z.string().min(1)),
    assistant_id: z.string().min(1),
  })
  .partial();

/** `?tags=a,b` or a repeated `?tags=a&tags=b`. */
export const listWorkflowsQuerySchema = z.object({
  tags: z
    .union([z.string(), z.array(z.string())])
    .optional()
    .transform((value) =>
      value === undefined
        ? undefined
        : [value]
            .flat()
            .flatMap((tag) => tag.split(','))
            .map((tag) => tag.trim())
            .filter((tag) => tag.length > 0)
    ),
});

export type CreateWorkflowInput = z.infer<typeof createWorkflowSchema>;
export type ModifyWorkflowInput = z.infer<typeof modifyWorkflowSchema>;
