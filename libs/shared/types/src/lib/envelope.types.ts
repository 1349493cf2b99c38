/**
 * Duplex Envelope Types
 * Shared between the Connection Registry, the WebSocket gateway and the chat flow
 */

import { EnvelopeType, NotificationType } from './enums';
import { AnalysisPayload } from './conversation.types';

// ============================================================================
// Base Envelope Properties
// ============================================================================

interface BaseEnvelope {
  timestamp?: string; // Stamped by the registry on delivery
  queuedAt?: string; // Stamped when the envelope entered an offline queue
  deliveredFromQueue?: boolean;
  broadcast?: boolean;
}

// ============================================================================
// Connection Envelopes
// ============================================================================

export interface ConnectionEstablishedEnvelope extends BaseEnvelope {
  type: EnvelopeType.CONNECTION_ESTABLISHED;
  message: string;
  userId: string;
  features: {
    realTimeChat: boolean;
    agentCommunication: boolean;
    liveUpdates: boolean;
  };
  availableAgents: string[];
}

// ============================================================================
// Agent Envelopes
// ============================================================================

export interface AgentResponseEnvelope extends BaseEnvelope {
  type: EnvelopeType.AGENT_RESPONSE;
  agent: string;
  response: string;
  analysis: AnalysisPayload;
  actions: string[];
  confidence: number;
  conversationId: string;
  messageId: string;
}

export interface TypingIndicatorEnvelope extends BaseEnvelope {
  type: EnvelopeType.TYPING_INDICATOR;
  agent: string;
  isTyping: boolean;
}

// ============================================================================
// System Envelopes
// ============================================================================

export interface SystemNotificationEnvelope extends BaseEnvelope {
  type: EnvelopeType.SYSTEM_NOTIFICATION;
  notification: {
    type: NotificationType;
    message: string;
    count?: number;
  };
}

export interface ErrorEnvelope extends BaseEnvelope {
  type: EnvelopeType.ERROR;
  message: string;
}

// ============================================================================
// Union Types
// ============================================================================

export type Envelope =
  | ConnectionEstablishedEnvelope
  | AgentResponseEnvelope
  | TypingIndicatorEnvelope
  | SystemNotificationEnvelope
  | ErrorEnvelope;

/**
 * Caller-defined envelope (e.g. `{ type: 'ping' }`); delivered as-is
 */
export interface CustomEnvelope extends BaseEnvelope {
  type: string;
  [key: string]: unknown;
}

export type OutboundEnvelope = Envelope | CustomEnvelope;
