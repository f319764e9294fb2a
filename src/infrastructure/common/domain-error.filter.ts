import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Inject,
} from '@nestjs/common';
import { IncomingHttpHeaders } from 'node:http';
import {
  DomainError,
  DomainErrorKind,
  ValidationErrors,
} from '@domain/errors/domain.errors';
import { ILoggerPort } from '../logging/logger.port';

export const CLIENT_CLOSED_REQUEST = 499;
export const GENERATION_FAILED_MESSAGE = 'Could not generate tailored resume, please retry';

const STATUS_BY_KIND: Record<DomainErrorKind, number> = {
  validation: HttpStatus.BAD_REQUEST,
  not_found: HttpStatus.NOT_FOUND,
  state: HttpStatus.CONFLICT,
  service_unavailable: HttpStatus.SERVICE_UNAVAILABLE,
  malformed_output: HttpStatus.BAD_GATEWAY,
  cancelled: CLIENT_CLOSED_REQUEST,
};

// Backend text stays in the logs for these kinds.
const OPAQUE_KINDS: ReadonlySet<DomainErrorKind> = new Set<DomainErrorKind>([
  'service_unavailable',
  'malformed_output',
  'cancelled',
]);

export interface ErrorResponseBody {
  statusCode: number;
  error: string;
  message: string | string[];
  code?: string;
  fields?: string[];
  path: string;
  timestamp: string;
  correlationId?: string;
}

interface ReplyLike {
  status(code: number): { send(payload: ErrorResponseBody): unknown };
}

interface RequestLike {
  url: string;
  headers: IncomingHttpHeaders;
}

@Catch()
export class DomainErrorFilter implements ExceptionFilter {
  constructor(@Inject('ILoggerPort') private readonly logger: ILoggerPort) {}

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const reply = ctx.getResponse<ReplyLike>();
    const request = ctx.getRequest<RequestLike>();

    const body: ErrorResponseBody = {
      ...this.describe(exception),
      path: request.url,
      timestamp: new Date().toISOString(),
      correlationId: firstHeader(request.headers['x-correlation-id']),
    };

    if (body.statusCode >= 500) {
      this.logger.error('Request failed', exception, DomainErrorFilter.name, {
        path: body.path,
        statusCode: body.statusCode,
        code: body.code,
      });
    }

    reply.status(body.statusCode).send(body);
  }

  private describe(
    exception: unknown
  ): Pick<ErrorResponseBody, 'statusCode' | 'error' | 'message' | 'code' | 'fields'> {
    if (exception instanceof DomainError) {
      const statusCode = STATUS_BY_KIND[exception.kind];
      return {
        statusCode,
        error: statusLabel(statusCode),
        message: OPAQUE_KINDS.has(exception.kind) ? GENERATION_FAILED_MESSAGE : exception.message,
        code: exception.code,
        fields: exception.kind === 'validation' ? validationFields(exception) : undefined,
      };
    }

    if (exception instanceof HttpException) {
      const statusCode = exception.getStatus();
      return { statusCode, error: statusLabel(statusCode), message: httpMessage(exception) };
    }

    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      error: statusLabel(HttpStatus.INTERNAL_SERVER_ERROR),
      message: 'Internal Server Error',
    };
  }
}

function statusLabel(status: number): string {
  if (status === CLIENT_CLOSED_REQUEST) return 'CLIENT_CLOSED_REQUEST';
  return HttpStatus[status] || 'Error';
}

function validationFields(error: DomainError): string[] | undefined {
  const fields =
    error instanceof ValidationErrors
      ? error.errors.flatMap((e) => (e.field ? [e.field] : []))
      : error.field
        ? [error.field]
        : [];
  return fields.length > 0 ? fields : undefined;
}

function httpMessage(exception: HttpException): string | string[] {
  const response = exception.getResponse();
  if (typeof response === 'string') return response;
  if ('message' in response) {
    const { message } = response;
    if (typeof message === 'string') return message;
    if (Array.isArray(message)) {
      return message.filter((item): item is string => typeof item === 'string');
    }
  }
  return exception.message;
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return (Array.isArray(value) ? value[0] : value) || undefined;
}
