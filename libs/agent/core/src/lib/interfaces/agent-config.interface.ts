import { AgentType, ExternalUpdateType, MessageKind } from '@career-agent/shared/types';

export interface AgentConfig {
  type: AgentType;
  name: string;
  description: string;
  capabilities: string[];
  supportedMessageKinds: MessageKind[];
  systemPrompt: string;
  updateTypes: ExternalUpdateType[]; // External updates this agent may request
}
