import { v4 as uuidv4 } from 'uuid';
import { AgentMessage, MessagePayload } from '@career-agent/shared/types';

export interface NewMessageInput {
  conversationId: string;
  agentType: string;
  senderId: string;
  content: string;
  payload: MessagePayload;
  attachments?: string[];
}

export function createMessage(input: NewMessageInput): AgentMessage {
  return {
    id: uuidv4(),
    conversationId: input.conversationId,
    agentType: input.agentType,
    senderId: input.senderId,
    content: input.content,
    attachments: input.attachments ?? [],
    timestamp: new Date(),
    processed: false,
    ...input.payload,
  };
}
