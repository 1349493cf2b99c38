import { ConfigService } from '@nestjs/config';
import { AgentType, Channel, MessageKind } from '@career-agent/shared/types';
import { createMessage } from '@career-agent/agent/session';
import { HttpReasoningCollaborator } from './http-reasoning.collaborator';
import { getAgentConfig } from '../agents/agent-registry';
import { createDispatchContext } from '../../test-utils/fake-reasoning';

describe('HttpReasoningCollaborator', () => {
  let collaborator: HttpReasoningCollaborator;
  let post: jest.Mock;

  const request = {
    agent: getAgentConfig(AgentType.SKILLS_ANALYZER),
    message: createMessage({
      conversationId: 'c1',
      agentType: AgentType.SKILLS_ANALYZER,
      senderId: 'u1',
      content: 'Five years of TypeScript and PostgreSQL',
      payload: {
        kind: MessageKind.SKILL_EXTRACTION,
        metadata: { channel: Channel.HTTP, documentType: 'resume', existingSkills: [] },
      },
    }),
    context: createDispatchContext(),
  };

  const completion = (content: string | null) => ({
    data: { choices: [{ message: { content } }] },
  });

  beforeEach(() => {
    collaborator = new HttpReasoningCollaborator(
      new ConfigService({ reasoning: { apiKey: 'test-secret', model: 'test-model' } })
    );
    post = jest.fn();
    collaborator['client'].post = post;
  });

  it('should require an API key', () => {
    expect(() => new HttpReasoningCollaborator(new ConfigService({}))).toThrow(
      'REASONING_API_KEY environment variable is required'
    );
  });

  it('should send the agent prompt and the message as JSON', async () => {
    post.mockResolvedValue(completion(JSON.stringify({ summary: 'Found 2 skills' })));

    await collaborator.reason(request);

    const [url, body] = post.mock.calls[0];
    expect(url).toBe('/chat/completions');
    expect(body.model).toBe('test-model');
    expect(body.response_format).toEqual({ type: 'json_object' });
    expect(body.messages[0]).toEqual({ role: 'system', content: request.agent.systemPrompt });
    expect(JSON.parse(body.messages[1].content)).toMatchObject({
      message: 'Five years of TypeScript and PostgreSQL',
      kind: 'skill_extraction',
      metadata: { documentType: 'resume' },
    });
  });

  it('should fill defaults for fields the model left out', async () => {
    post.mockResolvedValue(
      completion(JSON.stringify({ summary: 'Found 2 skills', skills: ['TypeScript', 'PostgreSQL'] }))
    );

    const result = await collaborator.reason(request);

    expect(result).toEqual({
      summary: 'Found 2 skills',
      analysis: {},
      actionItems: [],
      confidence: 0.5,
      careerPaths: [],
      skills: ['TypeScript', 'PostgreSQL'],
      profileUpdates: [],
    });
  });

  it('should reject malformed JSON', async () => {
    post.mockResolvedValue(completion('not json'));

    await expect(collaborator.reason(request)).rejects.toThrow(
      'Reasoning service returned malformed JSON'
    );
  });

  it('should reject an empty reply', async () => {
    post.mockResolvedValue(completion(null));

    await expect(collaborator.reason(request)).rejects.toThrow(
      'Reasoning service returned an empty reply'
    );
  });

  it('should reject a reply without a summary', async () => {
    post.mockResolvedValue(completion(JSON.stringify({ analysis: {} })));

    await expect(collaborator.reason(request)).rejects.toThrow(
      'Reasoning service reply did not match the expected shape'
    );
  });
});
