export * from './lib/enums';
export * from './lib/conversation.types';
export * from './lib/envelope.types';
