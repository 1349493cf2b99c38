import { ConflictException, NotFoundException } from '@nestjs/common';
import {
  ConversationMismatchError,
  ConversationNotFoundError,
  MessageReferenceError,
} from '@career-agent/agent/session';
import { toHttpException } from './domain-exception.filter';

describe('toHttpException', () => {
  it('should map a missing conversation to 404', () => {
    const exception = toHttpException(new ConversationNotFoundError('c9'));

    expect(exception).toBeInstanceOf(NotFoundException);
    expect(exception.getResponse()).toMatchObject({ statusCode: 404, error: 'conversation_not_found' });
  });

  it('should map a bad message reference to 409', () => {
    const exception = toHttpException(new MessageReferenceError('c1', 'm9'));

    expect(exception).toBeInstanceOf(ConflictException);
    expect(exception.getResponse()).toEqual({
      statusCode: 409,
      error: 'reference_error',
      message: 'Response references unknown message m9 in conversation c1',
    });
  });

  it('should map a conversation owned by another user to 409', () => {
    const exception = toHttpException(new ConversationMismatchError('c1', 'owned by another user'));

    expect(exception.getStatus()).toBe(409);
  });
});
