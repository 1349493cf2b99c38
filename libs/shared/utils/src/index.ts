export * from './lib/keyed-mutex';
export * from './lib/timeout';
