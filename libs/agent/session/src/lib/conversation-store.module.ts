import { Module } from '@nestjs/common';
import { CONVERSATION_REPOSITORY } from './interfaces';
import { InMemoryConversationRepository } from './repositories/in-memory-conversation.repository';
import { ConversationStoreService } from './conversation-store.service';

/**
 * ConversationStore Module
 *
 * Exports:
 * - CONVERSATION_REPOSITORY token (bound to InMemoryConversationRepository)
 * - ConversationStoreService (append and lookup over conversation sessions)
 */
@Module({
  providers: [
    {
      provide: CONVERSATION_REPOSITORY,
      useClass: InMemoryConversationRepository,
    },
    ConversationStoreService,
  ],
  exports: [CONVERSATION_REPOSITORY, ConversationStoreService],
})
export class ConversationStoreModule {}
