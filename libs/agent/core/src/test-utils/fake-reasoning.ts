/**
 * Test doubles for the reasoning collaborator and agent handlers
 */

import { AgentMessage, DispatchContext } from '@career-agent/shared/types';
import {
  AgentHandler,
  HandlerResult,
  ReasoningCollaborator,
  ReasoningRequest,
  ReasoningResult,
} from '../lib/interfaces';

export function createReasoningResult(overrides?: Partial<ReasoningResult>): ReasoningResult {
  return {
    summary: 'You are well placed for a senior backend role.',
    analysis: { strengths: ['TypeScript', 'distributed systems'] },
    actionItems: ['Lead a design review this quarter'],
    confidence: 0.8,
    careerPaths: [],
    skills: [],
    profileUpdates: [],
    ...overrides,
  };
}

export class FakeReasoningCollaborator implements ReasoningCollaborator {
  readonly requests: ReasoningRequest[] = [];

  constructor(private readonly result: ReasoningResult = createReasoningResult()) {}

  async reason(request: ReasoningRequest): Promise<ReasoningResult> {
    this.requests.push(request);
    return this.result;
  }
}

/**
 * Handler whose behaviour is a plain function, for router and chat tests
 */
export class StubAgentHandler implements AgentHandler {
  readonly calls: Array<{ message: AgentMessage; context: DispatchContext }> = [];

  constructor(
    readonly agentType: string,
    private readonly behaviour: (message: AgentMessage) => Promise<HandlerResult> = async (
      message
    ) => ({
      content: `Echo: ${message.content}`,
      analysis: {},
      actionItems: [],
      confidence: 0.9,
    })
  ) {}

  async handle(message: AgentMessage, context: DispatchContext): Promise<HandlerResult> {
    this.calls.push({ message, context });
    return this.behaviour(message);
  }
}

export function createDispatchContext(conversationId = 'c1'): DispatchContext {
  return {
    conversation: {
      conversationId,
      sessionType: 'general',
      goals: [],
      shared: {},
      recentMessages: [],
    },
    profile: {},
  };
}
