import {
  ArgumentsHost,
  Catch,
  ConflictException,
  HttpException,
  NotFoundException,
} from '@nestjs/common';
import { BaseExceptionFilter } from '@nestjs/core';
import {
  ConversationMismatchError,
  ConversationNotFoundError,
  ConversationStoreError,
  MessageReferenceError,
} from '@career-agent/agent/session';

export function toHttpException(error: ConversationStoreError): HttpException {
  switch (error.kind) {
    case 'conversation_not_found':
      return new NotFoundException({ statusCode: 404, error: error.kind, message: error.message });
    case 'conversation_mismatch':
    case 'reference_error':
      return new ConflictException({ statusCode: 409, error: error.kind, message: error.message });
  }
}

/**
 * Maps conversation store errors to HTTP responses
 */
@Catch(ConversationNotFoundError, ConversationMismatchError, MessageReferenceError)
export class DomainExceptionFilter extends BaseExceptionFilter {
  catch(exception: ConversationStoreError, host: ArgumentsHost): void {
    super.catch(toHttpException(exception), host);
  }
}
