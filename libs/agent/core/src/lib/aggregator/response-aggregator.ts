/**
 * Response Aggregator
 *
 * Pure functions that stamp handler output into the canonical AgentResponse
 * and the duplex `agent_response` envelope. Nothing here stores or sends.
 */

import {
  AgentResponse,
  AgentResponseEnvelope,
  DispatchFailure,
  DispatchFailureKind,
  EnvelopeType,
} from '@career-agent/shared/types';
import { HandlerResult } from '../interfaces';

export const RETRY_ACTION = 'Please try again or contact support';

/**
 * Clamp to [0, 1]; anything that is not a finite number counts as 0
 */
export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

/**
 * Non-negative, finite duration in seconds
 */
export function normalizeDuration(seconds: number): number {
  if (!Number.isFinite(seconds) || seconds < 0) {
    return 0;
  }
  return seconds;
}

export function buildResponse(
  messageId: string,
  agentType: string,
  result: HandlerResult,
  elapsedSeconds: number
): AgentResponse {
  return {
    messageId,
    agentType,
    content: result.content,
    analysis: { ...result.analysis },
    actionItems: [...result.actionItems],
    externalUpdates: [...(result.externalUpdates ?? [])],
    confidence: clampConfidence(result.confidence),
    processingTime: normalizeDuration(result.processingTime ?? elapsedSeconds),
    timestamp: new Date(),
  };
}

/**
 * Same shape as a successful response: apology text, the error in the
 * analysis, a single retry action and zero confidence.
 */
export function buildDegradedResponse(
  messageId: string,
  agentType: string,
  failure: DispatchFailure,
  elapsedSeconds: number
): AgentResponse {
  return {
    messageId,
    agentType,
    content: degradedContent(agentType, failure),
    analysis: { error: failure.message },
    actionItems: [RETRY_ACTION],
    externalUpdates: [],
    confidence: 0,
    processingTime: normalizeDuration(elapsedSeconds),
    timestamp: new Date(),
  };
}

export function toAgentResponseEnvelope(
  response: AgentResponse,
  conversationId: string
): AgentResponseEnvelope {
  return {
    type: EnvelopeType.AGENT_RESPONSE,
    agent: response.agentType,
    response: response.content,
    analysis: response.analysis,
    actions: [...response.actionItems],
    confidence: response.confidence,
    conversationId,
    messageId: response.messageId,
    timestamp: response.timestamp.toISOString(),
  };
}

function degradedContent(agentType: string, failure: DispatchFailure): string {
  switch (failure.kind) {
    case DispatchFailureKind.UNKNOWN_AGENT:
      return `I couldn't find an agent called "${agentType}". Please choose one of the available agents.`;
    case DispatchFailureKind.TIMEOUT:
      return 'I took too long to analyze your request and had to stop. Please try again.';
    default:
      return `I encountered an error processing your request: ${failure.message}`;
  }
}
