// src/contracts/pipeline-exception.filter.ts
import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Inject,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { IndexBuildError, PipelineError } from '../shared/errors/pipeline.errors';
import { LOGGER_SERVICE, type LoggerService } from '../shared/types';

/** Client went away or the run was cancelled; nginx's convention. */
export const CLIENT_CLOSED_REQUEST = 499;

export function httpStatusFor(error: PipelineError): number {
  switch (error.kind) {
    case 'EmptyDocumentError':
    case 'SchemaValidationExhausted':
      return HttpStatus.UNPROCESSABLE_ENTITY;
    case 'DocumentNotIndexedError':
      return HttpStatus.NOT_FOUND;
    case 'IndexBuildError':
      return error instanceof IndexBuildError && error.conflict
        ? HttpStatus.CONFLICT
        : HttpStatus.INTERNAL_SERVER_ERROR;
    case 'EmbeddingServiceError':
    case 'GenerationServiceError':
      return HttpStatus.BAD_GATEWAY;
    case 'Timeout':
      return HttpStatus.GATEWAY_TIMEOUT;
    case 'Cancelled':
      return CLIENT_CLOSED_REQUEST;
  }
}

@Catch(PipelineError, RangeError)
export class PipelineExceptionFilter implements ExceptionFilter {
  constructor(@Inject(LOGGER_SERVICE) private readonly logger: LoggerService) {}

  async catch(exception: PipelineError | RangeError, host: ArgumentsHost): Promise<void> {
    const ctx = host.switchToHttp();
    const res = ctx.getResponse<Response>();
    const req = ctx.getRequest<Request>();

    if (!(exception instanceof PipelineError)) {
      res.status(HttpStatus.BAD_REQUEST).json({
        statusCode: HttpStatus.BAD_REQUEST,
        message: exception.message,
        error: 'Bad Request',
      });
      return;
    }

    const status = httpStatusFor(exception);
    if (status >= 500 && status !== CLIENT_CLOSED_REQUEST) {
      await this.logger.error(`${req.method} ${req.url} -> ${status}: ${exception.message}`, exception.stack, {
        method: req.method,
        url: req.url,
        headers: Object.fromEntries(
          Object.entries(req.headers).map(([k, v]) => [k, Array.isArray(v) ? v.join(', ') : (v ?? '')]),
        ),
        body: {},
      });
    }

    if (!res.headersSent) {
      res.status(status).json(exception.toJSON());
    }
  }
}
