/**
 * Shared enums used across the entire application
 * Router, Conversation Store, Connection Registry and the API all reference these constants
 */

// ============================================================================
// Agent Types
// ============================================================================

export enum AgentType {
  CAREER_ADVISOR = 'career_advisor',
  SKILLS_ANALYZER = 'skills_analyzer',
  NETWORK_CONNECTOR = 'network_connector',
  OPPORTUNITY_MATCHER = 'opportunity_matcher',
  PROFILE_ANALYZER = 'profile_analyzer',
}

export const AgentTypeLabel: Record<AgentType, string> = {
  [AgentType.CAREER_ADVISOR]: 'Career Advisor',
  [AgentType.SKILLS_ANALYZER]: 'Skills Analyzer',
  [AgentType.NETWORK_CONNECTOR]: 'Network Connector',
  [AgentType.OPPORTUNITY_MATCHER]: 'Opportunity Matcher',
  [AgentType.PROFILE_ANALYZER]: 'Profile Analyzer',
};

export const DEFAULT_AGENT_TYPE = AgentType.CAREER_ADVISOR;

export const isAgentType = (value: string): value is AgentType => {
  return Object.values<string>(AgentType).includes(value);
};

// ============================================================================
// Message Kinds
// ============================================================================

export enum MessageKind {
  TEXT = 'text',
  FILE_UPLOAD = 'file_upload',
  SKILL_EXTRACTION = 'skill_extraction',
  CAREER_ANALYSIS = 'career_analysis',
  NETWORK_RECOMMENDATION = 'network_recommendation',
  OPPORTUNITY_MATCH = 'opportunity_match',
  PROFILE_UPDATE = 'profile_update',
  SYSTEM = 'system',
}

// ============================================================================
// Conversation Status
// ============================================================================

export enum ConversationStatus {
  ACTIVE = 'active', // Initial state
  PAUSED = 'paused',
  COMPLETED = 'completed',
  ERROR = 'error',
}

// ============================================================================
// Transport Channels
// ============================================================================

export enum Channel {
  HTTP = 'http',
  WEBSOCKET = 'websocket',
}

// ============================================================================
// Duplex Envelope Types
// ============================================================================

export enum EnvelopeType {
  CONNECTION_ESTABLISHED = 'connection_established',
  AGENT_RESPONSE = 'agent_response',
  TYPING_INDICATOR = 'typing_indicator',
  SYSTEM_NOTIFICATION = 'system_notification',
  ERROR = 'error',
}

export enum NotificationType {
  QUEUED_MESSAGES = 'queued_messages',
}

// ============================================================================
// External Update Types (applied by the ledger collaborator)
// ============================================================================

export enum ExternalUpdateType {
  CAREER_RECOMMENDATION = 'career_recommendation',
  SKILL_ANALYSIS = 'skill_analysis',
  PROFILE_UPDATE = 'profile_update',
}

// ============================================================================
// Dispatch Failures
// ============================================================================

export enum DispatchFailureKind {
  UNKNOWN_AGENT = 'unknown_agent',
  HANDLER_FAILURE = 'handler_failure',
  TIMEOUT = 'timeout',
}

// ============================================================================
// Limits and Time Constants (in milliseconds unless noted)
// ============================================================================

export const ConnectionLimits = {
  MAX_QUEUE_SIZE: 100,
  QUEUE_FLUSH_DELAY: 100, // Pacing between queued deliveries
  WRITE_TIMEOUT: 5000,
  MAX_IDLE_MINUTES: 30,
} as const;

export const AgentLimits = {
  PROCESSING_TIMEOUT: 30000,
  CONTEXT_HISTORY_SIZE: 10, // Recent messages handed to handlers
} as const;

// ============================================================================
// Event Names (for EventEmitter)
// ============================================================================

export const LEDGER_UPDATES_EVENT = 'ledger.updates';
