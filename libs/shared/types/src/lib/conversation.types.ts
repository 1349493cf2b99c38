/**
 * Conversation domain types
 * Shared between the Conversation Store, Agent Router, and API surface
 */

import {
  Channel,
  ConversationStatus,
  DispatchFailureKind,
  ExternalUpdateType,
  MessageKind,
} from './enums';

// ============================================================================
// Message Metadata (tagged by message kind)
// ============================================================================

export interface TextMetadata {
  channel: Channel;
}

export interface SkillExtractionMetadata {
  channel: Channel;
  documentType: string;
  existingSkills: string[];
}

export interface CareerAnalysisMetadata {
  channel: Channel;
  careerGoals: string[];
  industryPreferences: string[];
  locationPreferences: string[];
}

/**
 * Opaque extension bag for kinds whose payload is defined by a collaborator
 */
export type ExtensionMetadata = Record<string, unknown>;

export type MessagePayload =
  | { kind: MessageKind.TEXT; metadata: TextMetadata }
  | { kind: MessageKind.SKILL_EXTRACTION; metadata: SkillExtractionMetadata }
  | { kind: MessageKind.CAREER_ANALYSIS; metadata: CareerAnalysisMetadata }
  | {
      kind:
        | MessageKind.FILE_UPLOAD
        | MessageKind.NETWORK_RECOMMENDATION
        | MessageKind.OPPORTUNITY_MATCH
        | MessageKind.PROFILE_UPDATE
        | MessageKind.SYSTEM;
      metadata: ExtensionMetadata;
    };

// ============================================================================
// Messages
// ============================================================================

interface BaseMessage {
  readonly id: string;
  readonly conversationId: string;
  readonly agentType: string; // Requested agent; may be unknown to the router
  readonly senderId: string;
  readonly content: string;
  readonly attachments: readonly string[];
  readonly timestamp: Date;
  readonly processed: boolean;
}

export type AgentMessage = BaseMessage & Readonly<MessagePayload>;

// ============================================================================
// External Update Descriptors
// ============================================================================

export interface CareerRecommendationUpdate {
  type: ExternalUpdateType.CAREER_RECOMMENDATION;
  data: {
    recommendedPaths: Record<string, unknown>[];
    confidence: number;
  };
}

export interface SkillAnalysisUpdate {
  type: ExternalUpdateType.SKILL_ANALYSIS;
  data: {
    skills: string[];
    confidence: number;
  };
}

export interface ProfileUpdate {
  type: ExternalUpdateType.PROFILE_UPDATE;
  data: {
    fieldPath: string; // Dot notation, e.g. "skills.0.level"
    newValue: unknown;
    reason: string;
    confidence: number;
  };
}

export type ExternalUpdateDescriptor =
  | CareerRecommendationUpdate
  | SkillAnalysisUpdate
  | ProfileUpdate;

// ============================================================================
// Responses
// ============================================================================

/**
 * Analysis payload produced by the reasoning collaborator.
 * Opaque to the routing layer.
 */
export type AnalysisPayload = Record<string, unknown>;

export interface AgentResponse {
  readonly messageId: string;
  readonly agentType: string;
  readonly content: string;
  readonly analysis: AnalysisPayload;
  readonly actionItems: readonly string[];
  readonly externalUpdates: readonly ExternalUpdateDescriptor[];
  readonly confidence: number; // 0..1
  readonly processingTime: number; // seconds
  readonly timestamp: Date;
}

export interface DispatchFailure {
  kind: DispatchFailureKind;
  message: string;
}

export type DispatchResult =
  | { status: 'success'; response: AgentResponse }
  | { status: 'degraded'; response: AgentResponse; failure: DispatchFailure };

// ============================================================================
// Conversation Sessions
// ============================================================================

export interface ConversationSession {
  id: string;
  userId: string;
  sessionType: string;
  status: ConversationStatus;
  activeAgents: string[]; // Unique, in order of first engagement
  messages: AgentMessage[];
  responses: AgentResponse[];
  context: Record<string, unknown>;
  goals: string[];
  achievements: string[];
  createdAt: Date;
  lastActivity: Date;
  durationMinutes: number;
}

// ============================================================================
// Handler Context
// ============================================================================

/**
 * Profile context used to enrich handler input.
 * Empty when the profile store has nothing for the user.
 */
export type ProfileContext = Record<string, unknown>;

export interface ConversationContext {
  conversationId: string;
  sessionType: string;
  goals: string[];
  shared: Record<string, unknown>;
  recentMessages: Array<{
    agentType: string;
    content: string;
    timestamp: string;
  }>;
}

export interface DispatchContext {
  conversation: ConversationContext;
  profile: ProfileContext;
}
