import { z } from 'zod';

const assistantFields = {
  name: z.string().max(256).nullish(),
  description: z.string().nullish(),
  avatar: z.string().nullish(),
  tools: z.array(z.string().min(1)),
  system: z.string().nullish(),
};

export const createAssistantSchema = z.object({
  ...assistantFields,
  tools: assistantFields.tools.default([]),
});

export const modifyAssistantSchema = z.object(assistantFields).partial();

export type CreateAssistantInput = z.infer<typeof createAssistantSchema>;
export type ModifyAssistantInput = z.infer<typeof modifyAssistantSchema>;
