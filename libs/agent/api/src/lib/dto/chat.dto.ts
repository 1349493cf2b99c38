import { z } from 'zod';
import { AgentResponse, DEFAULT_AGENT_TYPE } from '@career-agent/shared/types';

/**
 * Chat API DTOs
 *
 * Schemas validate request bodies through ZodValidationPipe
 */

export const ANONYMOUS_USER = 'anonymous';

export const chatRequestSchema = z.object({
  message: z.string().trim().min(1, 'message must not be empty'),
  agentType: z.string().min(1).default(DEFAULT_AGENT_TYPE),
  userId: z.string().min(1).optional(), // omitted: anonymous, reply is not pushed
  conversationId: z.string().min(1).optional(),
});

export type ChatRequestDto = z.infer<typeof chatRequestSchema>;

export const analyzeSkillsRequestSchema = z.object({
  text: z.string().trim().min(1, 'text must not be empty'),
  userId: z.string().min(1).optional(), // omitted: anonymous, reply is not pushed
  documentType: z.string().min(1).default('text'),
  existingSkills: z.array(z.string()).default([]),
  conversationId: z.string().min(1).optional(),
});

export type AnalyzeSkillsRequestDto = z.infer<typeof analyzeSkillsRequestSchema>;

export const careerGuidanceRequestSchema = z.object({
  userId: z.string().min(1),
  careerGoals: z.array(z.string().min(1)).min(1, 'at least one career goal is required'),
  industryPreferences: z.array(z.string()).default([]),
  locationPreferences: z.array(z.string()).default([]),
  conversationId: z.string().min(1).optional(),
});

export type CareerGuidanceRequestDto = z.infer<typeof careerGuidanceRequestSchema>;

export interface ChatTurnResponseDto {
  conversationId: string;
  messageId: string;
  agentResponse: AgentResponse;
  delivered: boolean; // pushed to a live connection
  timestamp: string;
}
