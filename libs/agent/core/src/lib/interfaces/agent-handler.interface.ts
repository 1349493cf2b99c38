import {
  AgentMessage,
  AnalysisPayload,
  DispatchContext,
  ExternalUpdateDescriptor,
} from '@career-agent/shared/types';

/**
 * Injection token for the list of AgentHandler instances the router starts with
 */
export const AGENT_HANDLERS = 'AGENT_HANDLERS';

export interface HandlerResult {
  content: string;
  analysis: AnalysisPayload;
  actionItems: string[];
  confidence: number;
  processingTime?: number; // seconds; measured by the router when absent
  externalUpdates?: ExternalUpdateDescriptor[];
}

export interface AgentHandler {
  readonly agentType: string;
  handle(message: AgentMessage, context: DispatchContext): Promise<HandlerResult>;
}
