import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { AgentType } from '@career-agent/shared/types';
import { ConnectionsModule } from '@career-agent/agent/connections';
import { ConversationStoreModule } from '@career-agent/agent/session';
import {
  AGENT_HANDLERS,
  LEDGER_COLLABORATOR,
  PROFILE_STORE,
  REASONING_COLLABORATOR,
  ReasoningCollaborator,
} from './interfaces';
import { createAgentHandlers, getAgentConfig } from './agents';
import { AgentRouterService } from './router/agent-router.service';
import { HttpReasoningCollaborator } from './collaborators/http-reasoning.collaborator';
import { createLedgerCollaborator } from './collaborators/ledger.collaborators';
import { InMemoryProfileStore } from './collaborators/in-memory-profile.store';
import { LedgerForwarderService } from './ledger/ledger-forwarder.service';
import { ChatService } from './chat/chat.service';

@Module({
  imports: [
    EventEmitterModule.forRoot({
      wildcard: true,
      delimiter: '.',
      maxListeners: 20,
      verboseMemoryLeak: true,
    }),
    ConnectionsModule,
    ConversationStoreModule,
  ],
  providers: [
    {
      provide: REASONING_COLLABORATOR,
      useClass: HttpReasoningCollaborator,
    },
    {
      provide: LEDGER_COLLABORATOR,
      useFactory: createLedgerCollaborator,
      inject: [ConfigService],
    },
    {
      provide: PROFILE_STORE,
      useClass: InMemoryProfileStore,
    },
    {
      provide: AGENT_HANDLERS,
      useFactory: (reasoning: ReasoningCollaborator) =>
        createAgentHandlers(Object.values(AgentType).map(getAgentConfig), reasoning),
      inject: [REASONING_COLLABORATOR],
    },
    AgentRouterService,
    LedgerForwarderService,
    ChatService,
  ],
  exports: [
    AgentRouterService,
    ChatService,
    PROFILE_STORE,
    ConnectionsModule,
    ConversationStoreModule,
  ],
})
export class AgentModule {}
