import {
  AgentMessage,
  AnalysisPayload,
  DispatchContext,
  ExternalUpdateDescriptor,
  ProfileContext,
} from '@career-agent/shared/types';
import { AgentConfig } from './agent-config.interface';

// ============================================================================
// Reasoning
// ============================================================================

export const REASONING_COLLABORATOR = 'REASONING_COLLABORATOR';

export interface ReasoningRequest {
  agent: AgentConfig;
  message: AgentMessage;
  context: DispatchContext;
}

export interface ProposedProfileChange {
  fieldPath: string;
  newValue?: unknown;
  reason: string;
}

export interface ReasoningResult {
  summary: string;
  analysis: AnalysisPayload;
  actionItems: string[];
  confidence: number;
  careerPaths: Record<string, unknown>[];
  skills: string[];
  profileUpdates: ProposedProfileChange[];
}

export interface ReasoningCollaborator {
  reason(request: ReasoningRequest): Promise<ReasoningResult>;
}

// ============================================================================
// Ledger
// ============================================================================

export const LEDGER_COLLABORATOR = 'LEDGER_COLLABORATOR';

export interface LedgerSubmission {
  userId: string;
  conversationId: string;
  messageId: string;
  agentType: string;
  updates: ExternalUpdateDescriptor[];
}

export interface LedgerReceipt {
  submissionId: string;
  accepted: number;
}

export interface LedgerCollaborator {
  apply(submission: LedgerSubmission): Promise<LedgerReceipt>;
}

// ============================================================================
// Profiles
// ============================================================================

export const PROFILE_STORE = 'PROFILE_STORE';

export interface ProfileStore {
  findProfile(userId: string): Promise<ProfileContext | null>;
  saveProfile(userId: string, profile: ProfileContext): Promise<ProfileContext>;
}
