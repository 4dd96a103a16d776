import crypto from 'node:crypto';
import type { Request } from 'express';

const readHeader = (req: Request, name: string): string | undefined => {
  const raw = req.headers[name];

  if (typeof raw === 'string' && raw.trim().length > 0) return raw.trim();
  if (
    Array.isArray(raw) &&
    typeof raw[0] === 'string' &&
    raw[0].trim().length > 0
  )
    return raw[0].trim();

  return undefined;
};

/**
 * Generated ids are written back onto the request so the controller and the
 * exception filter report the same id.
 */
export const getRequestId = (req: Request): string => {
  const existing = readHeader(req, 'x-request-id');
  if (existing) return existing;

  const generated = crypto.randomUUID();
  req.headers['x-request-id'] = generated;
  return generated;
};

/** Absent header means the request is sessionless. */
export const getSessionId = (req: Request): string | undefined =>
  readHeader(req, 'x-session-id');
