import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { FastifyReply } from 'fastify';
import { ApiResponse, ErrorCode } from '../interfaces/response.interface';
import { PipelineError, PipelineErrorCode } from '../errors/pipeline.errors';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<FastifyReply>();

    let status = HttpStatus.INTERNAL_SERVER_ERROR;
    let errorCode: string = ErrorCode.INTERNAL_ERROR;
    let message = 'Internal server error';
    let details: Record<string, unknown> | undefined;

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      const exceptionResponse = exception.getResponse();
      errorCode = this.mapStatusToErrorCode(status);

      if (isRecord(exceptionResponse)) {
        const { code, message: responseMessage } = exceptionResponse;
        // ValidationPipe 给出的是字符串数组
        message = Array.isArray(responseMessage)
          ? responseMessage.join('; ')
          : typeof responseMessage === 'string'
            ? responseMessage
            : exception.message;
        if (typeof code === 'string') errorCode = code;
        if (isRecord(exceptionResponse.details)) details = exceptionResponse.details;
      } else {
        message = exceptionResponse;
      }
    } else if (exception instanceof PipelineError) {
      status = this.mapPipelineStatus(exception.code);
      errorCode = exception.code;
      message = exception.message;
      if (status >= 500) {
        this.logger.error(`Pipeline error: ${exception.message}`, exception.stack);
      }
    } else if (exception instanceof Error) {
      message = exception.message;
      this.logger.error(`Unhandled error: ${exception.message}`, exception.stack);
    }

    const errorResponse: ApiResponse = {
      data: null,
      error: {
        code: errorCode,
        message,
        ...(details && { details }),
      },
    };

    response.status(status).send(errorResponse);
  }

  private mapPipelineStatus(code: PipelineErrorCode): HttpStatus {
    switch (code) {
      case PipelineErrorCode.UNSUPPORTED_FORMAT:
      case PipelineErrorCode.INVALID_RANGE:
        return HttpStatus.BAD_REQUEST;
      case PipelineErrorCode.CANCELLED:
        return HttpStatus.CONFLICT;
      case PipelineErrorCode.STAGE_TIMEOUT:
        return HttpStatus.GATEWAY_TIMEOUT;
      default:
        return HttpStatus.BAD_GATEWAY;
    }
  }

  private mapStatusToErrorCode(status: number): ErrorCode {
    switch (status) {
      case HttpStatus.BAD_REQUEST:
        return ErrorCode.INVALID_INPUT;
      case HttpStatus.UNAUTHORIZED:
        return ErrorCode.UNAUTHORIZED;
      case HttpStatus.FORBIDDEN:
        return ErrorCode.FORBIDDEN;
      case HttpStatus.NOT_FOUND:
        return ErrorCode.NOT_FOUND;
      case HttpStatus.TOO_MANY_REQUESTS:
        return ErrorCode.RATE_LIMITED;
      case HttpStatus.CONFLICT:
        return ErrorCode.CONFLICT;
      default:
        return ErrorCode.INTERNAL_ERROR;
    }
  }
}
