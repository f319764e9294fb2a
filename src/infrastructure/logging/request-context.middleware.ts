import { Injectable, NestMiddleware } from '@nestjs/common';
import { IncomingMessage, ServerResponse } from 'node:http';
import { randomUUID } from 'node:crypto';
import { RequestContext, RequestContextService } from './request-context.service';

function headerValue(req: IncomingMessage, name: string): string | undefined {
  const value = req.headers[name];
  const first = Array.isArray(value) ? value[0] : value;
  return first || undefined;
}

@Injectable()
export class RequestContextMiddleware implements NestMiddleware<IncomingMessage, ServerResponse> {
  constructor(private readonly requestContext: RequestContextService) {}

  use(req: IncomingMessage, _res: ServerResponse, next: () => void) {
    const requestId = headerValue(req, 'x-request-id') || randomUUID();
    const correlationId = headerValue(req, 'x-correlation-id') || requestId;
    const userId = headerValue(req, 'x-user-id');
    const serviceName = process.env.APP_NAME || 'resume-tailor';

    const context: RequestContext = {
      requestId,
      correlationId,
      serviceName,
      userId,
      method: req.method,
      path: req.url,
    };
    this.requestContext.runWith(context, () => next());
  }
}
