export * from './agent-config.interface';
export * from './agent-handler.interface';
export * from './collaborators.interface';
