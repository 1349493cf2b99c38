import { z } from 'zod';
import { DEFAULT_AGENT_TYPE } from '@career-agent/shared/types';

/**
 * Inbound duplex frame: { agentType, message, conversationId? }
 */
export const duplexFrameSchema = z.object({
  agentType: z.string().min(1).default(DEFAULT_AGENT_TYPE),
  message: z.string().trim().min(1, 'message must not be empty'),
  conversationId: z.string().min(1).optional(),
});

export type DuplexFrame = z.infer<typeof duplexFrameSchema>;
