import {
  AgentMessage,
  AgentResponse,
  ConversationStatus,
} from '@career-agent/shared/types';

/**
 * Read model returned by the conversation history endpoint
 */
export interface ConversationHistory {
  conversationId: string;
  userId: string;
  sessionType: string;
  status: ConversationStatus;
  activeAgents: string[];
  goals: string[];
  achievements: string[];
  messageCount: number;
  responseCount: number;
  agentParticipation: Record<string, number>; // responses per agent type
  messages: AgentMessage[];
  responses: AgentResponse[];
  createdAt: Date;
  lastActivity: Date;
  durationMinutes: number;
}
