export class ConversationNotFoundError extends Error {
  readonly kind = 'conversation_not_found' as const;

  constructor(readonly conversationId: string) {
    super(`Conversation ${conversationId} not found`);
    this.name = 'ConversationNotFoundError';
  }
}

/**
 * A message or session that belongs to a different conversation or user
 */
export class ConversationMismatchError extends Error {
  readonly kind = 'conversation_mismatch' as const;

  constructor(readonly conversationId: string, message: string) {
    super(message);
    this.name = 'ConversationMismatchError';
  }
}

/**
 * A response that references a message the conversation does not hold
 */
export class MessageReferenceError extends Error {
  readonly kind = 'reference_error' as const;

  constructor(readonly conversationId: string, readonly messageId: string) {
    super(`Response references unknown message ${messageId} in conversation ${conversationId}`);
    this.name = 'MessageReferenceError';
  }
}

export type ConversationStoreError =
  | ConversationNotFoundError
  | ConversationMismatchError
  | MessageReferenceError;
