export * from './lib/api.module';
export * from './lib/agent.controller';
export * from './lib/conversation.controller';
export * from './lib/status.controller';
export * from './lib/profile.controller';
export * from './lib/agent.gateway';
export * from './lib/dto';
export * from './lib/pipes/zod-validation.pipe';
export * from './lib/filters/domain-exception.filter';
