import type { Request, Response, NextFunction } from 'express';

export interface ActionDatetime {
  createdAtUtc: Date;
  createdAtIpAddress: string;
  createdAtUserAgent: string;
  updatedAtUtc: Date;
  updatedAtIpAddress: string;
  updatedAtUserAgent: string;
}

/**
 * Middleware to set actionDatetime object in res.locals
 * Fields: createdAtUtc, createdAtIpAddress, createdAtUserAgent and the updatedAt* twins
 */
export function middlewareActionDatetime(req: Request, res: Response, next: NextFunction) {
  const now = new Date();
  const ip = (
    req.headers['x-forwarded-for']?.toString().split(',').shift() ||
    req.socket?.remoteAddress ||
    req.ip ||
    ''
  );
  const userAgent = req.headers['user-agent'] || '';

  res.locals.actionDatetime = {
    createdAtUtc: now,
    createdAtIpAddress: ip,
    createdAtUserAgent: userAgent,
    updatedAtUtc: now,
    updatedAtIpAddress: ip,
    updatedAtUserAgent: userAgent,
  };
  next();
}

export default middlewareActionDatetime;
