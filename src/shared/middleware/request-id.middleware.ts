/**
 * Request ID Middleware
 * Tags every request with an id that appears in logs and error responses
 */

import { randomUUID } from 'node:crypto';
import type { Request, Response, NextFunction } from 'express';

const REQUEST_ID_HEADER = 'X-Request-Id';

// Client-supplied ids are accepted only when they look like an opaque token
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{8,128}$/;

export function requestId(req: Request, res: Response, next: NextFunction): void {
  const supplied = req.get(REQUEST_ID_HEADER);
  req.requestId = supplied && REQUEST_ID_PATTERN.test(supplied) ? supplied : randomUUID();
  res.setHeader(REQUEST_ID_HEADER, req.requestId);
  next();
}
