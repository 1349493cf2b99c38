/**
 * ConversationStoreService Tests
 */

import { Test, TestingModule } from '@nestjs/testing';
import {
  AgentResponse,
  Channel,
  ConversationStatus,
  MessageKind,
} from '@career-agent/shared/types';
import { ConversationStoreService } from './conversation-store.service';
import { CONVERSATION_REPOSITORY } from './interfaces';
import { InMemoryConversationRepository } from './repositories/in-memory-conversation.repository';
import {
  ConversationMismatchError,
  ConversationNotFoundError,
  MessageReferenceError,
} from './errors';
import { createMessage } from './message.factory';

describe('ConversationStoreService', () => {
  let store: ConversationStoreService;

  const textMessage = (conversationId: string, content: string, agentType = 'career_advisor') =>
    createMessage({
      conversationId,
      agentType,
      senderId: 'u1',
      content,
      payload: { kind: MessageKind.TEXT, metadata: { channel: Channel.HTTP } },
    });

  const responseTo = (messageId: string, agentType = 'career_advisor'): AgentResponse => ({
    messageId,
    agentType,
    content: 'ok',
    analysis: {},
    actionItems: [],
    externalUpdates: [],
    confidence: 0.8,
    processingTime: 0.1,
    timestamp: new Date(),
  });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ConversationStoreService,
        { provide: CONVERSATION_REPOSITORY, useClass: InMemoryConversationRepository },
      ],
    }).compile();

    store = module.get<ConversationStoreService>(ConversationStoreService);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('getOrCreate', () => {
    it('should create an active session with empty collections', async () => {
      const session = await store.getOrCreate('c1', 'u1', 'career_guidance');

      expect(session).toMatchObject({
        id: 'c1',
        userId: 'u1',
        sessionType: 'career_guidance',
        status: ConversationStatus.ACTIVE,
        activeAgents: [],
        messages: [],
        responses: [],
        goals: [],
        achievements: [],
        durationMinutes: 0,
      });
    });

    it('should return the existing session for a known id', async () => {
      const first = await store.getOrCreate('c1', 'u1');
      const second = await store.getOrCreate('c1', 'u1');

      expect(second).toBe(first);
      expect(await store.countConversations()).toBe(1);
    });

    it('should generate an id when none is given', async () => {
      const session = await store.getOrCreate(undefined, 'u1');

      expect(session.id).toMatch(/^[0-9a-f-]{36}$/);
      expect(session.sessionType).toBe('general');
    });

    it('should create a single session under concurrent calls', async () => {
      const sessions = await Promise.all([
        store.getOrCreate('c1', 'u1'),
        store.getOrCreate('c1', 'u1'),
        store.getOrCreate('c1', 'u1'),
      ]);

      expect(sessions[1]).toBe(sessions[0]);
      expect(sessions[2]).toBe(sessions[0]);
    });

    it('should reject a conversation owned by another user', async () => {
      await store.getOrCreate('c1', 'u1');

      await expect(store.getOrCreate('c1', 'u2')).rejects.toBeInstanceOf(
        ConversationMismatchError
      );
    });
  });

  describe('appendMessage', () => {
    it('should append in order and reflect it in latestMessage and messagesByAgent', async () => {
      await store.getOrCreate('c1', 'u1');
      const hello = await store.appendMessage('c1', textMessage('c1', 'hello'));
      const skills = await store.appendMessage(
        'c1',
        textMessage('c1', 'my skills', 'skills_analyzer')
      );
      const again = await store.appendMessage('c1', textMessage('c1', 'again'));

      expect((await store.latestMessage('c1'))?.id).toBe(again.id);
      expect((await store.messagesByAgent('c1', 'career_advisor')).map((m) => m.id)).toEqual([
        hello.id,
        again.id,
      ]);
      expect((await store.messagesByAgent('c1', 'skills_analyzer')).map((m) => m.id)).toEqual([
        skills.id,
      ]);
    });

    it('should freeze stored messages', async () => {
      await store.getOrCreate('c1', 'u1');
      const stored = await store.appendMessage('c1', textMessage('c1', 'hello'));

      expect(Object.isFrozen(stored)).toBe(true);
      expect(Object.isFrozen(stored.attachments)).toBe(true);
    });

    it('should reject a message for another conversation', async () => {
      await store.getOrCreate('c1', 'u1');

      await expect(store.appendMessage('c1', textMessage('c2', 'hello'))).rejects.toBeInstanceOf(
        ConversationMismatchError
      );
      expect(await store.latestMessage('c1')).toBeNull();
    });

    it('should reject an unknown conversation', async () => {
      await expect(store.appendMessage('nope', textMessage('nope', 'hi'))).rejects.toBeInstanceOf(
        ConversationNotFoundError
      );
    });

    it('should keep every append under concurrent writers', async () => {
      await store.getOrCreate('c1', 'u1');

      await Promise.all(
        Array.from({ length: 20 }, (_, i) => store.appendMessage('c1', textMessage('c1', `m${i}`)))
      );

      const session = await store.getConversation('c1');
      expect(session.messages).toHaveLength(20);
      expect(session.messages.map((m) => m.content)).toEqual(
        Array.from({ length: 20 }, (_, i) => `m${i}`)
      );
    });

    it('should never move lastActivity backwards', async () => {
      const start = new Date('2026-01-01T10:00:00Z').getTime();
      jest.useFakeTimers();
      jest.setSystemTime(start);
      await store.getOrCreate('c1', 'u1');

      jest.setSystemTime(start + 6 * 60 * 1000);
      await store.appendMessage('c1', textMessage('c1', 'later'));
      jest.setSystemTime(start + 60 * 1000); // clock steps back
      await store.appendMessage('c1', textMessage('c1', 'skewed'));

      const session = await store.getConversation('c1');
      expect(session.lastActivity.getTime()).toBe(start + 6 * 60 * 1000);
      expect(session.durationMinutes).toBe(6);
    });
  });

  describe('appendResponse', () => {
    it('should append a response for a known message and engage the agent', async () => {
      await store.getOrCreate('c1', 'u1');
      const message = await store.appendMessage('c1', textMessage('c1', 'hello'));

      await store.appendResponse('c1', responseTo(message.id));
      await store.appendResponse('c1', responseTo(message.id));

      const session = await store.getConversation('c1');
      expect(session.responses).toHaveLength(2);
      expect(session.activeAgents).toEqual(['career_advisor']);
    });

    it('should fail with MessageReferenceError and leave responses unchanged', async () => {
      await store.getOrCreate('c1', 'u1');
      await store.appendMessage('c1', textMessage('c1', 'hello'));

      await expect(store.appendResponse('c1', responseTo('missing'))).rejects.toBeInstanceOf(
        MessageReferenceError
      );

      const session = await store.getConversation('c1');
      expect(session.responses).toEqual([]);
      expect(session.activeAgents).toEqual([]);
    });
  });

  describe('context and history', () => {
    it('should hand the most recent messages to handlers', async () => {
      await store.getOrCreate('c1', 'u1');
      await store.addGoals('c1', ['Become a staff engineer']);
      for (let i = 0; i < 4; i++) {
        await store.appendMessage('c1', textMessage('c1', `m${i}`));
      }

      const context = await store.getContext('c1', 2);

      expect(context.goals).toEqual(['Become a staff engineer']);
      expect(context.recentMessages.map((m) => m.content)).toEqual(['m2', 'm3']);
    });

    it('should not duplicate goals', async () => {
      await store.getOrCreate('c1', 'u1');

      await store.addGoals('c1', ['a', 'b']);
      const goals = await store.addGoals('c1', ['b', 'c']);

      expect(goals).toEqual(['a', 'b', 'c']);
    });

    it('should count responses per agent', async () => {
      await store.getOrCreate('c1', 'u1');
      const message = await store.appendMessage('c1', textMessage('c1', 'hello'));
      await store.appendResponse('c1', responseTo(message.id, 'career_advisor'));
      await store.appendResponse('c1', responseTo(message.id, 'skills_analyzer'));
      await store.appendResponse('c1', responseTo(message.id, 'career_advisor'));

      const history = await store.getHistory('c1');

      expect(history.messageCount).toBe(1);
      expect(history.responseCount).toBe(3);
      expect(history.agentParticipation).toEqual({ career_advisor: 2, skills_analyzer: 1 });
      expect(history.activeAgents).toEqual(['career_advisor', 'skills_analyzer']);
    });

    it('should update the status', async () => {
      await store.getOrCreate('c1', 'u1');

      const session = await store.updateStatus('c1', ConversationStatus.PAUSED);

      expect(session.status).toBe(ConversationStatus.PAUSED);
    });
  });
});
