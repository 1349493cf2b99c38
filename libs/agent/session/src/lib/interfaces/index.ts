export * from './conversation-repository.interface';
export * from './conversation-history.interface';
