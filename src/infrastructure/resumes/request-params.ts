import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { IncomingHttpHeaders, ServerResponse } from 'node:http';
import { DomainErrorCode, ValidationError } from '@domain/errors/domain.errors';

export const CALLER_HEADER = 'x-user-id';

/** Reads the caller id set by the upstream gateway. */
export function callerIdFrom(headers: IncomingHttpHeaders): string {
  const value = headers[CALLER_HEADER];
  const first = (Array.isArray(value) ? value[0] : value)?.trim();
  if (!first) {
    throw new ValidationError(DomainErrorCode.REQUIRED_FIELD, 'header is required', CALLER_HEADER);
  }
  return first;
}

/**
 * Aborts when the connection closes before a response was written, so
 * in-flight backend calls stop once the client has gone away.
 */
export function disconnectSignal(response: ServerResponse): AbortSignal {
  const controller = new AbortController();
  response.once('close', () => {
    if (!response.writableFinished) controller.abort();
  });
  return controller.signal;
}

export const CallerId = createParamDecorator((_data: unknown, ctx: ExecutionContext) =>
  callerIdFrom(ctx.switchToHttp().getRequest<{ headers: IncomingHttpHeaders }>().headers)
);

export const DisconnectSignal = createParamDecorator((_data: unknown, ctx: ExecutionContext) =>
  disconnectSignal(ctx.switchToHttp().getResponse<{ raw: ServerResponse }>().raw)
);
