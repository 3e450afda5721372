import { Request } from 'express';
import { RequestContext } from './interfaces/request-context.interface';

export function requestContextOf(request: Request): RequestContext {
  return {
    ipAddress: request.ip,
    userAgent: request.get('User-Agent'),
  };
}
