export * from './test-utils/mock-connection';
