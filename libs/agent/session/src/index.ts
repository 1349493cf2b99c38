// Interfaces
export * from './lib/interfaces';

// Repositories
export * from './lib/repositories/in-memory-conversation.repository';

// Services
export * from './lib/conversation-store.service';
export * from './lib/message.factory';
export * from './lib/errors';

// Module
export * from './lib/conversation-store.module';
