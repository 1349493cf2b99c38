import { ConversationSession } from '@career-agent/shared/types';

/**
 * Injection token for IConversationRepository
 * Use this token when injecting the repository via @Inject()
 */
export const CONVERSATION_REPOSITORY = 'CONVERSATION_REPOSITORY';

export interface IConversationRepository {
  save(session: ConversationSession): Promise<void>;
  findById(conversationId: string): Promise<ConversationSession | null>;
  count(): Promise<number>;
}
