import { BadRequestException } from '@nestjs/common';
import { ZodValidationPipe } from './zod-validation.pipe';
import { chatRequestSchema } from '../dto';

describe('ZodValidationPipe', () => {
  const pipe = new ZodValidationPipe(chatRequestSchema);

  it('should apply defaults and trim the message', () => {
    expect(pipe.transform({ message: '  hello  ' })).toEqual({
      message: 'hello',
      agentType: 'career_advisor',
    });
  });

  it('should list every issue with its path', () => {
    let caught: unknown;
    try {
      pipe.transform({ message: '   ', userId: 42 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(BadRequestException);
    const body = caught instanceof BadRequestException ? caught.getResponse() : null;
    expect(body).toEqual({
      statusCode: 400,
      message: 'Validation failed',
      errors: ['message: message must not be empty', 'userId: Expected string, received number'],
    });
  });
});
