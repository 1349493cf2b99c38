import { Injectable } from '@nestjs/common';
import { ConversationSession } from '@career-agent/shared/types';
import { IConversationRepository } from '../interfaces';

@Injectable()
export class InMemoryConversationRepository implements IConversationRepository {
  private sessions = new Map<string, ConversationSession>();

  async save(session: ConversationSession): Promise<void> {
    this.sessions.set(session.id, session);
  }

  async findById(conversationId: string): Promise<ConversationSession | null> {
    return this.sessions.get(conversationId) || null;
  }

  async count(): Promise<number> {
    return this.sessions.size;
  }
}
