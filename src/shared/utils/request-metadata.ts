import { Request } from 'express';

/** Client details recorded alongside every audited write */
export interface RequestMetadata {
  ipAddress: string;
  userAgent: string;
}

export function requestMetadata(req: Request): RequestMetadata {
  return {
    ipAddress: req.ip || req.socket.remoteAddress || 'unknown',
    userAgent: req.headers['user-agent'] || 'unknown',
  };
}
