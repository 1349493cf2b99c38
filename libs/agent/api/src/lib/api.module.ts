import { Module } from '@nestjs/common';
import { AgentModule } from '@career-agent/agent/core';
import { AgentController } from './agent.controller';
import { ConversationController } from './conversation.controller';
import { StatusController } from './status.controller';
import { ProfileController } from './profile.controller';
import { AgentGateway } from './agent.gateway';

@Module({
  imports: [AgentModule],
  controllers: [AgentController, ConversationController, StatusController, ProfileController],
  providers: [AgentGateway],
})
export class ApiModule {}
