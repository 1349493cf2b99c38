// Interfaces
export * from './lib/interfaces';

// Agents
export * from './lib/agents';

// Services
export * from './lib/aggregator/response-aggregator';
export * from './lib/router/agent-router.service';
export * from './lib/chat/chat.service';
export * from './lib/ledger/ledger-forwarder.service';

// Collaborators
export * from './lib/collaborators/http-reasoning.collaborator';
export * from './lib/collaborators/ledger.collaborators';
export * from './lib/collaborators/in-memory-profile.store';

// Module
export * from './lib/agent.module';
