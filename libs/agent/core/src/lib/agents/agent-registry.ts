import {
  AgentType,
  AgentTypeLabel,
  ExternalUpdateType,
  MessageKind,
} from '@career-agent/shared/types';
import { AgentConfig } from '../interfaces';
import {
  CAREER_ADVISOR_PROMPT,
  SKILLS_ANALYZER_PROMPT,
  NETWORK_CONNECTOR_PROMPT,
  OPPORTUNITY_MATCHER_PROMPT,
  PROFILE_ANALYZER_PROMPT,
} from './prompts';

/**
 * Base System Prompt - prepended to every agent prompt
 */
export const BASE_SYSTEM_PROMPT = `# Your Role and Purpose

You are one of several specialized agents in a professional network assistant. Users come to you for help with their careers: understanding their skills, choosing a direction, finding people and opportunities.

## Key Principles

1. **Grounded**: Base conclusions on the user's profile, goals and what they wrote
2. **Specific**: Prefer named roles, skills and steps over general advice
3. **Honest**: Say when the information is too thin to conclude anything

## Response Format

Reply with a single JSON object and nothing else:

{
  "summary": "<reply shown to the user>",
  "analysis": { <structured findings> },
  "actionItems": ["<next step>", ...],
  "confidence": <number between 0 and 1>,
  "careerPaths": [ { ... } ],
  "skills": ["<skill>", ...],
  "profileUpdates": [ { "fieldPath": "...", "newValue": ..., "reason": "..." } ]
}

Leave any list you have nothing for empty.

---

`;

// Simple key-value registry
export const AGENT_CONFIGS: Record<AgentType, AgentConfig> = {
  [AgentType.CAREER_ADVISOR]: {
    type: AgentType.CAREER_ADVISOR,
    name: AgentTypeLabel[AgentType.CAREER_ADVISOR],
    description: 'Career path recommendations, skill gaps and timelines',
    capabilities: ['career_path_analysis', 'skill_gap_analysis', 'goal_tracking'],
    supportedMessageKinds: [MessageKind.TEXT, MessageKind.CAREER_ANALYSIS],
    systemPrompt: CAREER_ADVISOR_PROMPT,
    updateTypes: [ExternalUpdateType.CAREER_RECOMMENDATION],
  },

  [AgentType.SKILLS_ANALYZER]: {
    type: AgentType.SKILLS_ANALYZER,
    name: AgentTypeLabel[AgentType.SKILLS_ANALYZER],
    description: 'Skill extraction and proficiency assessment from free text',
    capabilities: ['skill_extraction', 'proficiency_assessment', 'resume_parsing'],
    supportedMessageKinds: [MessageKind.TEXT, MessageKind.SKILL_EXTRACTION, MessageKind.FILE_UPLOAD],
    systemPrompt: SKILLS_ANALYZER_PROMPT,
    updateTypes: [ExternalUpdateType.SKILL_ANALYSIS],
  },

  [AgentType.NETWORK_CONNECTOR]: {
    type: AgentType.NETWORK_CONNECTOR,
    name: AgentTypeLabel[AgentType.NETWORK_CONNECTOR],
    description: 'People, communities and events worth connecting with',
    capabilities: ['connection_recommendations', 'community_discovery'],
    supportedMessageKinds: [MessageKind.TEXT, MessageKind.NETWORK_RECOMMENDATION],
    systemPrompt: NETWORK_CONNECTOR_PROMPT,
    updateTypes: [],
  },

  [AgentType.OPPORTUNITY_MATCHER]: {
    type: AgentType.OPPORTUNITY_MATCHER,
    name: AgentTypeLabel[AgentType.OPPORTUNITY_MATCHER],
    description: 'Roles, projects and programs matched to the profile',
    capabilities: ['opportunity_matching', 'fit_scoring'],
    supportedMessageKinds: [MessageKind.TEXT, MessageKind.OPPORTUNITY_MATCH],
    systemPrompt: OPPORTUNITY_MATCHER_PROMPT,
    updateTypes: [],
  },

  [AgentType.PROFILE_ANALYZER]: {
    type: AgentType.PROFILE_ANALYZER,
    name: AgentTypeLabel[AgentType.PROFILE_ANALYZER],
    description: 'Profile completeness review and field-level improvements',
    capabilities: ['profile_review', 'profile_updates'],
    supportedMessageKinds: [MessageKind.TEXT, MessageKind.PROFILE_UPDATE],
    systemPrompt: PROFILE_ANALYZER_PROMPT,
    updateTypes: [ExternalUpdateType.PROFILE_UPDATE],
  },
};

// Lookup helper - prepends the base system prompt
export function getAgentConfig(type: AgentType): AgentConfig {
  const config = AGENT_CONFIGS[type];
  if (!config) {
    throw new Error(`Unknown agent type: ${type}`);
  }

  return {
    ...config,
    systemPrompt: BASE_SYSTEM_PROMPT + config.systemPrompt,
  };
}
