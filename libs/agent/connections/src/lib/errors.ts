export class TransportFailureError extends Error {
  readonly kind = 'transport_failure' as const;

  constructor(readonly userId: string, reason: string) {
    super(`Write to ${userId} failed: ${reason}`);
    this.name = 'TransportFailureError';
  }
}
