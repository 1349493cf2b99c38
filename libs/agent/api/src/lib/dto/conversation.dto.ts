import { z } from 'zod';
import { ConversationStatus } from '@career-agent/shared/types';

export const updateStatusRequestSchema = z.object({
  status: z.nativeEnum(ConversationStatus),
});

export type UpdateStatusRequestDto = z.infer<typeof updateStatusRequestSchema>;
