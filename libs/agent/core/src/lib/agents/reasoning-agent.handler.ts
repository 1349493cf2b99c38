import {
  AgentMessage,
  DispatchContext,
  ExternalUpdateDescriptor,
  ExternalUpdateType,
} from '@career-agent/shared/types';
import {
  AgentConfig,
  AgentHandler,
  HandlerResult,
  ReasoningCollaborator,
  ReasoningResult,
} from '../interfaces';

const MAX_RECOMMENDED_PATHS = 3;

/**
 * Agent handler backed by the reasoning collaborator.
 *
 * The collaborator's analysis passes through untouched; career paths,
 * skills and profile changes become external-update descriptors, limited
 * to the update types the agent is configured for.
 */
export class ReasoningAgentHandler implements AgentHandler {
  constructor(
    private readonly config: AgentConfig,
    private readonly reasoning: ReasoningCollaborator
  ) {}

  get agentType(): string {
    return this.config.type;
  }

  async handle(message: AgentMessage, context: DispatchContext): Promise<HandlerResult> {
    const startTime = Date.now();
    const result = await this.reasoning.reason({ agent: this.config, message, context });

    return {
      content: result.summary,
      analysis: result.analysis,
      actionItems: result.actionItems,
      confidence: result.confidence,
      processingTime: (Date.now() - startTime) / 1000,
      externalUpdates: this.toExternalUpdates(result),
    };
  }

  private toExternalUpdates(result: ReasoningResult): ExternalUpdateDescriptor[] {
    const allowed = new Set(this.config.updateTypes);
    const updates: ExternalUpdateDescriptor[] = [];

    if (allowed.has(ExternalUpdateType.CAREER_RECOMMENDATION) && result.careerPaths.length > 0) {
      updates.push({
        type: ExternalUpdateType.CAREER_RECOMMENDATION,
        data: {
          recommendedPaths: result.careerPaths.slice(0, MAX_RECOMMENDED_PATHS),
          confidence: result.confidence,
        },
      });
    }

    if (allowed.has(ExternalUpdateType.SKILL_ANALYSIS) && result.skills.length > 0) {
      updates.push({
        type: ExternalUpdateType.SKILL_ANALYSIS,
        data: {
          skills: result.skills,
          confidence: result.confidence,
        },
      });
    }

    if (allowed.has(ExternalUpdateType.PROFILE_UPDATE)) {
      for (const change of result.profileUpdates) {
        updates.push({
          type: ExternalUpdateType.PROFILE_UPDATE,
          data: {
            fieldPath: change.fieldPath,
            newValue: change.newValue,
            reason: change.reason,
            confidence: result.confidence,
          },
        });
      }
    }

    return updates;
  }
}

export function createAgentHandlers(
  configs: AgentConfig[],
  reasoning: ReasoningCollaborator
): AgentHandler[] {
  return configs.map((config) => new ReasoningAgentHandler(config, reasoning));
}
