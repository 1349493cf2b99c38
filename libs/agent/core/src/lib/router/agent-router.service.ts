import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  AgentLimits,
  AgentMessage,
  DispatchContext,
  DispatchFailure,
  DispatchFailureKind,
  DispatchResult,
} from '@career-agent/shared/types';
import { TimeoutError, errorMessage, withTimeout } from '@career-agent/shared/utils';
import { AGENT_HANDLERS, AgentHandler } from '../interfaces';
import { buildDegradedResponse, buildResponse } from '../aggregator/response-aggregator';

/**
 * AgentRouterService - transport-independent dispatch
 *
 * dispatch() always resolves with a response: unknown agents, handler
 * errors and handlers that exceed the processing window come back as a
 * degraded result instead of a rejection.
 */
@Injectable()
export class AgentRouterService {
  private readonly logger = new Logger(AgentRouterService.name);
  private readonly handlers = new Map<string, AgentHandler>();
  private readonly timeoutMs: number;

  constructor(
    @Inject(AGENT_HANDLERS) handlers: AgentHandler[],
    private readonly config: ConfigService
  ) {
    this.timeoutMs = this.config.get<number>('agents.timeoutMs', AgentLimits.PROCESSING_TIMEOUT);
    handlers.forEach((handler) => this.register(handler));
    this.logger.log(
      `Registered ${this.handlers.size} agent handlers (timeout ${this.timeoutMs}ms)`
    );
  }

  register(handler: AgentHandler): void {
    if (this.handlers.has(handler.agentType)) {
      this.logger.warn(`Replacing handler for ${handler.agentType}`);
    }
    this.handlers.set(handler.agentType, handler);
  }

  unregister(agentType: string): boolean {
    return this.handlers.delete(agentType);
  }

  listAgents(): string[] {
    return Array.from(this.handlers.keys());
  }

  async dispatch(
    agentType: string,
    message: AgentMessage,
    context: DispatchContext
  ): Promise<DispatchResult> {
    const startTime = Date.now();
    const elapsed = () => (Date.now() - startTime) / 1000;

    const handler = this.handlers.get(agentType);
    if (!handler) {
      this.logger.warn(`[${message.conversationId}] Unknown agent type: ${agentType}`);
      return this.degraded(message, agentType, {
        kind: DispatchFailureKind.UNKNOWN_AGENT,
        message: `Unknown agent type: ${agentType}`,
      }, elapsed());
    }

    this.logger.log(`[${message.conversationId}] Dispatching message ${message.id} to ${agentType}`);

    try {
      // Synchronous throws from a handler land in the catch below
      const execution = Promise.resolve().then(() => handler.handle(message, context));
      const result = await withTimeout(
        execution,
        this.timeoutMs,
        `Agent ${agentType} did not respond within ${this.timeoutMs}ms`
      );

      const response = buildResponse(message.id, agentType, result, elapsed());
      this.logger.log(
        `[${message.conversationId}] ${agentType} responded in ${response.processingTime.toFixed(2)}s ` +
          `(confidence ${response.confidence})`
      );
      return { status: 'success', response };
    } catch (error) {
      const failure: DispatchFailure =
        error instanceof TimeoutError
          ? { kind: DispatchFailureKind.TIMEOUT, message: error.message }
          : { kind: DispatchFailureKind.HANDLER_FAILURE, message: errorMessage(error) };

      this.logger.error(`[${message.conversationId}] ${agentType} failed: ${failure.message}`);
      return this.degraded(message, agentType, failure, elapsed());
    }
  }

  private degraded(
    message: AgentMessage,
    agentType: string,
    failure: DispatchFailure,
    elapsedSeconds: number
  ): DispatchResult {
    return {
      status: 'degraded',
      response: buildDegradedResponse(message.id, agentType, failure, elapsedSeconds),
      failure,
    };
  }
}
