import { IncomingMessage, ServerResponse } from 'node:http';
import { Socket } from 'node:net';
import { RequestContextMiddleware } from './request-context.middleware';
import { RequestContext, RequestContextService } from './request-context.service';

function request(headers: Record<string, string>): IncomingMessage {
  const req = new IncomingMessage(new Socket());
  req.method = 'POST';
  req.url = '/api/resumes/resume-1/tailor';
  req.headers = headers;
  return req;
}

describe('RequestContextMiddleware', () => {
  const requestContext = new RequestContextService();
  const middleware = new RequestContextMiddleware(requestContext);

  function capture(headers: Record<string, string>): RequestContext | undefined {
    const req = request(headers);
    const seen: { context?: RequestContext } = {};
    middleware.use(req, new ServerResponse(req), () => {
      seen.context = requestContext.getStore();
    });
    return seen.context;
  }

  it('should expose forwarded ids to the rest of the request', () => {
    const store = capture({
      'x-request-id': 'req-42',
      'x-correlation-id': 'corr-7',
      'x-user-id': 'user-1',
    });
    expect(store).toMatchObject({
      requestId: 'req-42',
      correlationId: 'corr-7',
      userId: 'user-1',
      method: 'POST',
      path: '/api/resumes/resume-1/tailor',
    });
  });

  it('should generate a request id and reuse it for correlation', () => {
    const store = capture({});
    expect(store?.requestId).toMatch(/^[0-9a-f-]{36}$/);
    expect(store?.correlationId).toBe(store?.requestId);
    expect(store?.userId).toBeUndefined();
  });

  it('should leave no context behind after the request', () => {
    capture({ 'x-request-id': 'req-1' });
    expect(requestContext.getStore()).toBeUndefined();
  });
});
