export * from './agent-registry';
export * from './reasoning-agent.handler';
