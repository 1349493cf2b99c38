export * from './lib/connections.module';
export * from './lib/connection-registry.service';
export * from './lib/interfaces/connection.interface';
export * from './lib/errors';
