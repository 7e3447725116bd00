import { z } from 'zod';

const messageRoleSchema = z.enum(['system', 'user', 'assistant', 'tool']);

export const messageSchema = z.object({
  role: messageRoleSchema,
  content: z.string(),
  name: z.string().min(1).optional(),
  toolCallId: z.string().min(1).optional(),
});

export const sessionSchema = z.array(messageSchema);
