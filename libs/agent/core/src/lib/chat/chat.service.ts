import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  AgentMessage,
  DispatchResult,
  LEDGER_UPDATES_EVENT,
  MessagePayload,
  ProfileContext,
} from '@career-agent/shared/types';
import { errorMessage } from '@career-agent/shared/utils';
import { ConnectionRegistryService } from '@career-agent/agent/connections';
import { ConversationStoreService, createMessage } from '@career-agent/agent/session';
import { AgentRouterService } from '../router/agent-router.service';
import { toAgentResponseEnvelope } from '../aggregator/response-aggregator';
import { LedgerSubmission, PROFILE_STORE, ProfileStore } from '../interfaces';

export interface ChatTurnInput {
  userId: string;
  agentType: string;
  content: string;
  payload: MessagePayload;
  conversationId?: string;
  sessionType?: string;
  attachments?: string[];
  goals?: string[];
  typingIndicators?: boolean; // duplex callers only
  /** Push or queue the reply for userId (default true); false for anonymous callers */
  notify?: boolean;
}

export interface ChatTurnResult {
  conversationId: string;
  message: AgentMessage;
  result: DispatchResult;
  delivered: boolean;
}

/**
 * ChatService - one chat turn, shared by the HTTP and duplex surfaces
 *
 * conversation -> profile -> append message -> dispatch -> append response
 * -> ledger event -> deliver (or queue) the envelope
 */
@Injectable()
export class ChatService {
  private readonly logger = new Logger(ChatService.name);

  constructor(
    private readonly store: ConversationStoreService,
    private readonly router: AgentRouterService,
    private readonly registry: ConnectionRegistryService,
    private readonly eventEmitter: EventEmitter2,
    @Inject(PROFILE_STORE)
    private readonly profiles: ProfileStore
  ) {}

  async handleTurn(input: ChatTurnInput): Promise<ChatTurnResult> {
    const { userId, agentType } = input;
    const notify = input.notify ?? true;

    const session = await this.store.getOrCreate(input.conversationId, userId, input.sessionType);
    const conversationId = session.id;

    if (input.goals && input.goals.length > 0) {
      await this.store.addGoals(conversationId, input.goals);
    }

    const profile = await this.loadProfile(userId);

    const message = await this.store.appendMessage(
      conversationId,
      createMessage({
        conversationId,
        agentType,
        senderId: userId,
        content: input.content,
        payload: input.payload,
        attachments: input.attachments,
      })
    );
    if (notify) {
      this.registry.trackConversation(userId, conversationId);
    }

    if (notify && input.typingIndicators) {
      await this.registry.sendTypingIndicator(userId, agentType, true);
    }

    const result = await this.router.dispatch(agentType, message, {
      conversation: await this.store.getContext(conversationId),
      profile,
    });
    const response = await this.store.appendResponse(conversationId, result.response);

    if (response.externalUpdates.length > 0) {
      const submission: LedgerSubmission = {
        userId,
        conversationId,
        messageId: message.id,
        agentType,
        updates: [...response.externalUpdates],
      };
      this.eventEmitter.emit(LEDGER_UPDATES_EVENT, submission);
    }

    const delivered = notify
      ? await this.registry.send(userId, toAgentResponseEnvelope(response, conversationId))
      : false;

    if (notify && input.typingIndicators) {
      await this.registry.sendTypingIndicator(userId, agentType, false);
    }

    this.logger.log(
      `[${conversationId}] Turn for ${userId} via ${agentType}: ${result.status}` +
        (delivered ? ', delivered' : notify ? ', queued' : ', not pushed')
    );

    return { conversationId, message, result, delivered };
  }

  /**
   * Profile context for handler input. Missing or failing lookups degrade
   * to an empty context.
   */
  private async loadProfile(userId: string): Promise<ProfileContext> {
    try {
      return (await this.profiles.findProfile(userId)) ?? {};
    } catch (error) {
      this.logger.warn(`[${userId}] Profile lookup failed, continuing without: ${errorMessage(error)}`);
      return {};
    }
  }
}
