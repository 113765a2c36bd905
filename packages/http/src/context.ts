import type { Request, Response } from 'express';
import type { RequestContext } from '@fieldseal/keypairs';

export const CLIENT_ID_HEADER = 'x-client-id';

/** Audit context of a client request */
export function clientContext(req: Request): RequestContext {
  return {
    actorId: req.get(CLIENT_ID_HEADER) ?? undefined,
    actorType: 'client',
    ipAddress: req.ip,
  };
}

/** Audit context of a request that passed adminAuth */
export function adminContext(req: Request, res: Response): RequestContext {
  const adminId: unknown = res.locals['adminId'];
  return {
    actorId: typeof adminId === 'string' ? adminId : 'unknown-admin',
    actorType: 'admin',
    ipAddress: req.ip,
  };
}
