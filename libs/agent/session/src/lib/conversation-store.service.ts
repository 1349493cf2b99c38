import { Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  AgentLimits,
  AgentMessage,
  AgentResponse,
  ConversationContext,
  ConversationSession,
  ConversationStatus,
} from '@career-agent/shared/types';
import { KeyedMutex } from '@career-agent/shared/utils';
import {
  CONVERSATION_REPOSITORY,
  ConversationHistory,
  IConversationRepository,
} from './interfaces';
import {
  ConversationMismatchError,
  ConversationNotFoundError,
  MessageReferenceError,
} from './errors';

export const DEFAULT_SESSION_TYPE = 'general';

/**
 * ConversationStoreService - Conversation session state
 *
 * Every read-modify-write runs under a lock keyed by conversation id, so
 * concurrent turns on one conversation interleave but never lose an append,
 * while unrelated conversations never wait on each other.
 */
@Injectable()
export class ConversationStoreService {
  private readonly logger = new Logger(ConversationStoreService.name);
  private readonly locks = new KeyedMutex();

  constructor(
    @Inject(CONVERSATION_REPOSITORY)
    private readonly repository: IConversationRepository
  ) {}

  /**
   * Return the session for a known id, or create an ACTIVE one.
   * A missing id gets a fresh one.
   */
  async getOrCreate(
    conversationId: string | undefined,
    userId: string,
    sessionType: string = DEFAULT_SESSION_TYPE
  ): Promise<ConversationSession> {
    const id = conversationId || uuidv4();

    return this.locks.runExclusive(id, async () => {
      const existing = await this.repository.findById(id);
      if (existing) {
        if (existing.userId !== userId) {
          throw new ConversationMismatchError(
            id,
            `Conversation ${id} belongs to a different user`
          );
        }
        return existing;
      }

      const now = new Date();
      const session: ConversationSession = {
        id,
        userId,
        sessionType,
        status: ConversationStatus.ACTIVE,
        activeAgents: [],
        messages: [],
        responses: [],
        context: {},
        goals: [],
        achievements: [],
        createdAt: now,
        lastActivity: now,
        durationMinutes: 0,
      };

      await this.repository.save(session);
      this.logger.log(`[${id}] Created ${sessionType} conversation for user ${userId}`);
      return session;
    });
  }

  /**
   * Append an inbound message. The stored message is frozen.
   */
  async appendMessage(conversationId: string, message: AgentMessage): Promise<AgentMessage> {
    if (message.conversationId !== conversationId) {
      throw new ConversationMismatchError(
        conversationId,
        `Message ${message.id} belongs to conversation ${message.conversationId}, not ${conversationId}`
      );
    }

    return this.locks.runExclusive(conversationId, async () => {
      const session = await this.require(conversationId);

      const stored: AgentMessage = Object.freeze({
        ...message,
        attachments: Object.freeze([...message.attachments]),
      });
      session.messages.push(stored);
      this.touch(session);

      await this.repository.save(session);
      this.logger.debug(
        `[${conversationId}] Appended message ${stored.id} (${session.messages.length} total)`
      );
      return stored;
    });
  }

  /**
   * Append a response. Its message id must refer to a message already in
   * the session; otherwise the session is left untouched.
   */
  async appendResponse(
    conversationId: string,
    response: AgentResponse
  ): Promise<AgentResponse> {
    return this.locks.runExclusive(conversationId, async () => {
      const session = await this.require(conversationId);

      if (!session.messages.some((m) => m.id === response.messageId)) {
        const error = new MessageReferenceError(conversationId, response.messageId);
        this.logger.error(`[${conversationId}] ${error.message}`);
        throw error;
      }

      const stored: AgentResponse = Object.freeze({ ...response });
      session.responses.push(stored);
      if (!session.activeAgents.includes(response.agentType)) {
        session.activeAgents.push(response.agentType);
      }
      this.touch(session);

      await this.repository.save(session);
      return stored;
    });
  }

  async messagesByAgent(conversationId: string, agentType: string): Promise<AgentMessage[]> {
    const session = await this.require(conversationId);
    return session.messages.filter((m) => m.agentType === agentType);
  }

  async latestMessage(conversationId: string): Promise<AgentMessage | null> {
    const session = await this.require(conversationId);
    return session.messages[session.messages.length - 1] ?? null;
  }

  async addGoals(conversationId: string, goals: string[]): Promise<string[]> {
    return this.locks.runExclusive(conversationId, async () => {
      const session = await this.require(conversationId);
      for (const goal of goals) {
        if (!session.goals.includes(goal)) {
          session.goals.push(goal);
        }
      }
      this.touch(session);
      await this.repository.save(session);
      return [...session.goals];
    });
  }

  async updateStatus(
    conversationId: string,
    status: ConversationStatus
  ): Promise<ConversationSession> {
    return this.locks.runExclusive(conversationId, async () => {
      const session = await this.require(conversationId);
      if (session.status !== status) {
        this.logger.log(`[${conversationId}] Status ${session.status} -> ${status}`);
        session.status = status;
      }
      this.touch(session);
      await this.repository.save(session);
      return session;
    });
  }

  async getConversation(conversationId: string): Promise<ConversationSession> {
    return this.require(conversationId);
  }

  async countConversations(): Promise<number> {
    return this.repository.count();
  }

  /**
   * Context handed to agent handlers: goals, shared context and the
   * most recent messages across all agents.
   */
  async getContext(
    conversationId: string,
    historySize: number = AgentLimits.CONTEXT_HISTORY_SIZE
  ): Promise<ConversationContext> {
    const session = await this.require(conversationId);
    const recent = historySize > 0 ? session.messages.slice(-historySize) : [];

    return {
      conversationId: session.id,
      sessionType: session.sessionType,
      goals: [...session.goals],
      shared: { ...session.context },
      recentMessages: recent.map((m) => ({
        agentType: m.agentType,
        content: m.content,
        timestamp: m.timestamp.toISOString(),
      })),
    };
  }

  async getHistory(conversationId: string): Promise<ConversationHistory> {
    const session = await this.require(conversationId);

    const agentParticipation: Record<string, number> = {};
    for (const response of session.responses) {
      agentParticipation[response.agentType] = (agentParticipation[response.agentType] ?? 0) + 1;
    }

    return {
      conversationId: session.id,
      userId: session.userId,
      sessionType: session.sessionType,
      status: session.status,
      activeAgents: [...session.activeAgents],
      goals: [...session.goals],
      achievements: [...session.achievements],
      messageCount: session.messages.length,
      responseCount: session.responses.length,
      agentParticipation,
      messages: [...session.messages],
      responses: [...session.responses],
      createdAt: session.createdAt,
      lastActivity: session.lastActivity,
      durationMinutes: session.durationMinutes,
    };
  }

  // ========================================================================
  // Private Helpers
  // ========================================================================

  private async require(conversationId: string): Promise<ConversationSession> {
    const session = await this.repository.findById(conversationId);
    if (!session) {
      throw new ConversationNotFoundError(conversationId);
    }
    return session;
  }

  /**
   * lastActivity never moves backwards; duration follows it
   */
  private touch(session: ConversationSession): void {
    const now = Math.max(Date.now(), session.lastActivity.getTime());
    session.lastActivity = new Date(now);
    session.durationMinutes = (now - session.createdAt.getTime()) / 60000;
  }
}
