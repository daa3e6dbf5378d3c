import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';
import { Request } from 'express';

export interface RequestContextData {
  requestId: string;
  ip?: string;
  userAgent?: string;
}

const storage = new AsyncLocalStorage<RequestContextData>();

const firstHeader = (value: string | string[] | undefined): string | undefined =>
  Array.isArray(value) ? value[0] : value;

export class RequestContext {
  static run(data: RequestContextData, callback: () => void) {
    storage.run(data, callback);
  }

  static get(): RequestContextData | undefined {
    return storage.getStore();
  }

  static bindRequest(req: Request): RequestContextData {
    const requestId = firstHeader(req.headers['x-request-id']) || randomUUID();
    const forwardedFor = firstHeader(req.headers['x-forwarded-for']);
    return {
      requestId,
      ip: (req.ip || forwardedFor || '').split(',')[0].trim(),
      userAgent: firstHeader(req.headers['user-agent']),
    };
  }
}
