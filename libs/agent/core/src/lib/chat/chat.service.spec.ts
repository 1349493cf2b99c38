/**
 * ChatService Tests
 * Real store, registry and router; stub handlers and collaborators
 */

import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  Channel,
  ExternalUpdateType,
  LEDGER_UPDATES_EVENT,
  MessageKind,
  MessagePayload,
} from '@career-agent/shared/types';
import { ConnectionRegistryService } from '@career-agent/agent/connections';
import {
  CONVERSATION_REPOSITORY,
  ConversationStoreService,
  InMemoryConversationRepository,
} from '@career-agent/agent/session';
import { MockConnection } from '@career-agent/agent/connections/testing';
import { ChatService } from './chat.service';
import { AgentRouterService } from '../router/agent-router.service';
import { AGENT_HANDLERS, PROFILE_STORE, ProfileStore } from '../interfaces';
import { StubAgentHandler } from '../../test-utils/fake-reasoning';

describe('ChatService', () => {
  let chat: ChatService;
  let store: ConversationStoreService;
  let registry: ConnectionRegistryService;
  let router: AgentRouterService;
  let careerAdvisor: StubAgentHandler;
  let emit: jest.Mock;
  let profiles: jest.Mocked<ProfileStore>;

  const text: MessagePayload = { kind: MessageKind.TEXT, metadata: { channel: Channel.WEBSOCKET } };

  beforeEach(async () => {
    careerAdvisor = new StubAgentHandler('career_advisor');
    const skillsAnalyzer = new StubAgentHandler('skills_analyzer', async () => ({
      content: 'Found 1 skill',
      analysis: {},
      actionItems: [],
      confidence: 0.7,
      externalUpdates: [
        { type: ExternalUpdateType.SKILL_ANALYSIS, data: { skills: ['TypeScript'], confidence: 0.7 } },
      ],
    }));

    emit = jest.fn();
    const mockProfiles = {
      findProfile: jest.fn().mockResolvedValue(null),
      saveProfile: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ChatService,
        AgentRouterService,
        ConnectionRegistryService,
        ConversationStoreService,
        { provide: CONVERSATION_REPOSITORY, useClass: InMemoryConversationRepository },
        { provide: AGENT_HANDLERS, useValue: [careerAdvisor, skillsAnalyzer] },
        {
          provide: ConfigService,
          useValue: new ConfigService({ connections: { flushDelayMs: 0 }, agents: { timeoutMs: 1000 } }),
        },
        { provide: EventEmitter2, useValue: { emit } },
        { provide: PROFILE_STORE, useValue: mockProfiles },
      ],
    }).compile();

    chat = module.get<ChatService>(ChatService);
    store = module.get<ConversationStoreService>(ConversationStoreService);
    registry = module.get<ConnectionRegistryService>(ConnectionRegistryService);
    router = module.get<AgentRouterService>(AgentRouterService);
    profiles = module.get(PROFILE_STORE);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should deliver typing indicators around the response on a live connection', async () => {
    const handle = new MockConnection();
    await registry.connect(handle, 'u1');

    const turn = await chat.handleTurn({
      userId: 'u1',
      agentType: 'career_advisor',
      content: 'hello',
      payload: text,
      typingIndicators: true,
    });

    expect(turn.delivered).toBe(true);
    expect(turn.result.status).toBe('success');
    expect(handle.types).toEqual([
      'connection_established',
      'typing_indicator',
      'agent_response',
      'typing_indicator',
    ]);
    expect(handle.envelopes[1]).toMatchObject({ agent: 'career_advisor', isTyping: true });
    expect(handle.envelopes[2]).toMatchObject({
      agent: 'career_advisor',
      response: 'Echo: hello',
      conversationId: turn.conversationId,
      messageId: turn.message.id,
    });
    expect(handle.envelopes[3]).toMatchObject({ isTyping: false });
  });

  it('should queue the response for an offline user', async () => {
    const turn = await chat.handleTurn({
      userId: 'u1',
      agentType: 'career_advisor',
      content: 'hello',
      payload: text,
      typingIndicators: true,
    });

    expect(turn.delivered).toBe(false);
    expect(registry.queueLength('u1')).toBe(1);
    expect(registry.getQueuedEnvelopes('u1')[0].type).toBe('agent_response');
  });

  it('should queue the response when the user disconnects during dispatch', async () => {
    const handle = new MockConnection();
    await registry.connect(handle, 'u1');
    router.register(
      new StubAgentHandler('network_connector', async () => {
        registry.disconnect('u1', handle);
        return { content: 'Three people to meet', analysis: {}, actionItems: [], confidence: 0.6 };
      })
    );

    const turn = await chat.handleTurn({
      userId: 'u1',
      agentType: 'network_connector',
      content: 'Who should I meet?',
      payload: text,
      typingIndicators: true,
    });

    expect(turn.delivered).toBe(false);
    expect(handle.types).toEqual(['connection_established', 'typing_indicator']);
    expect(registry.queueLength('u1')).toBe(1);
    expect(registry.getQueuedEnvelopes('u1')[0]).toMatchObject({
      type: 'agent_response',
      response: 'Three people to meet',
    });
  });

  it('should neither push nor queue replies when notify is off', async () => {
    const listener = new MockConnection();
    await registry.connect(listener, 'anonymous');

    const turn = await chat.handleTurn({
      userId: 'anonymous',
      agentType: 'career_advisor',
      content: 'my salary is 90k, should I quit?',
      payload: text,
      typingIndicators: true,
      notify: false,
    });

    expect(turn.delivered).toBe(false);
    expect(turn.result.status).toBe('success');
    expect(listener.types).toEqual(['connection_established']);
    expect(registry.queueLength('anonymous')).toBe(0);
    expect(registry.getUserConnectionInfo('anonymous').activeConversations).toEqual([]);
    expect((await store.getConversation(turn.conversationId)).responses).toHaveLength(1);
  });

  it('should store the message and the response', async () => {
    const turn = await chat.handleTurn({
      userId: 'u1',
      agentType: 'career_advisor',
      content: 'hello',
      payload: text,
    });

    const session = await store.getConversation(turn.conversationId);
    expect(session.messages.map((m) => m.content)).toEqual(['hello']);
    expect(session.responses).toHaveLength(1);
    expect(session.responses[0].messageId).toBe(turn.message.id);
    expect(registry.getUserConnectionInfo('u1').activeConversations).toEqual([turn.conversationId]);
  });

  it('should continue an existing conversation with its history as context', async () => {
    const first = await chat.handleTurn({
      userId: 'u1',
      agentType: 'career_advisor',
      content: 'hello',
      payload: text,
    });
    await chat.handleTurn({
      userId: 'u1',
      agentType: 'career_advisor',
      content: 'and then?',
      conversationId: first.conversationId,
      payload: text,
    });

    const context = careerAdvisor.calls[1].context.conversation;
    expect(context.conversationId).toBe(first.conversationId);
    expect(context.recentMessages.map((m) => m.content)).toEqual(['hello', 'and then?']);
  });

  it('should store a degraded response for an unknown agent', async () => {
    const turn = await chat.handleTurn({
      userId: 'u1',
      agentType: 'astrologer',
      content: 'hello',
      payload: text,
    });

    expect(turn.result.status).toBe('degraded');
    expect(turn.result.response.confidence).toBe(0);
    expect((await store.getConversation(turn.conversationId)).responses).toHaveLength(1);
  });

  it('should pass the stored profile to the handler', async () => {
    profiles.findProfile.mockResolvedValue({ headline: 'Backend engineer' });

    await chat.handleTurn({ userId: 'u1', agentType: 'career_advisor', content: 'hi', payload: text });

    expect(careerAdvisor.calls[0].context.profile).toEqual({ headline: 'Backend engineer' });
  });

  it('should continue with an empty profile when the lookup fails', async () => {
    profiles.findProfile.mockRejectedValue(new Error('profile store down'));

    const turn = await chat.handleTurn({
      userId: 'u1',
      agentType: 'career_advisor',
      content: 'hi',
      payload: text,
    });

    expect(turn.result.status).toBe('success');
    expect(careerAdvisor.calls[0].context.profile).toEqual({});
  });

  it('should emit external updates for the ledger', async () => {
    const turn = await chat.handleTurn({
      userId: 'u1',
      agentType: 'skills_analyzer',
      content: 'I write TypeScript',
      payload: text,
    });

    expect(emit).toHaveBeenCalledWith(LEDGER_UPDATES_EVENT, {
      userId: 'u1',
      conversationId: turn.conversationId,
      messageId: turn.message.id,
      agentType: 'skills_analyzer',
      updates: [
        { type: ExternalUpdateType.SKILL_ANALYSIS, data: { skills: ['TypeScript'], confidence: 0.7 } },
      ],
    });
  });

  it('should not emit when there are no external updates', async () => {
    await chat.handleTurn({ userId: 'u1', agentType: 'career_advisor', content: 'hi', payload: text });

    expect(emit).not.toHaveBeenCalled();
  });

  it('should record goals on the conversation', async () => {
    const turn = await chat.handleTurn({
      userId: 'u1',
      agentType: 'career_advisor',
      content: 'Guide me',
      payload: text,
      sessionType: 'career_guidance',
      goals: ['Lead a platform team'],
    });

    const session = await store.getConversation(turn.conversationId);
    expect(session.sessionType).toBe('career_guidance');
    expect(session.goals).toEqual(['Lead a platform team']);
    expect(careerAdvisor.calls[0].context.conversation.goals).toEqual(['Lead a platform team']);
  });
});
