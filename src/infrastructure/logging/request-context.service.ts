import { Injectable } from '@nestjs/common';
import { AsyncLocalStorage } from 'node:async_hooks';

/** Values attached to every log line written while a request is handled. */
export interface RequestContext {
  readonly requestId: string;
  readonly correlationId: string;
  readonly serviceName: string;
  /** Caller forwarded by the gateway in `x-user-id`. */
  readonly userId?: string;
  readonly method?: string;
  readonly path?: string;
}

@Injectable()
export class RequestContextService {
  private readonly storage = new AsyncLocalStorage<RequestContext>();

  runWith<T>(context: RequestContext, callback: () => T): T {
    return this.storage.run(context, callback);
  }

  getStore(): RequestContext | undefined {
    return this.storage.getStore();
  }
}
