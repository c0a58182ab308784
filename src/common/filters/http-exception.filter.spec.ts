import { BadRequestException, ConflictException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { HttpExceptionFilter } from './http-exception.filter';
import { CancelledError, StageTimeoutError, TranscriptionFailedError } from '../errors/pipeline.errors';

function capture(exception: unknown) {
  const reply = { status: jest.fn().mockReturnThis(), send: jest.fn() };
  new HttpExceptionFilter().catch(exception, new ExecutionContextHost([{}, reply]));
  return { status: reply.status.mock.calls[0][0], body: reply.send.mock.calls[0][0] };
}

describe('HttpExceptionFilter', () => {
  it('keeps the code and message of structured exceptions', () => {
    const result = capture(new ConflictException({ code: 'CONFLICT', message: '转录尚未完成' }));
    expect(result).toEqual({
      status: 409,
      body: { data: null, error: { code: 'CONFLICT', message: '转录尚未完成' } },
    });
  });

  it('joins validation messages', () => {
    const result = capture(new BadRequestException(['title should not be empty', 'audio_key must be a string']));
    expect(result.status).toBe(400);
    expect(result.body.error).toEqual({
      code: 'INVALID_INPUT',
      message: 'title should not be empty; audio_key must be a string',
    });
  });

  it.each<[Error, number, string]>([
    [new CancelledError('deleted'), 409, 'CANCELLED'],
    [new StageTimeoutError(500), 504, 'STAGE_TIMEOUT'],
    [new TranscriptionFailedError('engine down'), 502, 'TRANSCRIPTION_FAILED'],
  ])('maps pipeline error %s', (error, status, code) => {
    const result = capture(error);
    expect(result.status).toBe(status);
    expect(result.body.error).toEqual({ code, message: error.message });
  });

  it('reports unexpected errors as internal', () => {
    const result = capture(new Error('boom'));
    expect(result).toEqual({
      status: 500,
      body: { data: null, error: { code: 'INTERNAL_ERROR', message: 'boom' } },
    });
  });
});
