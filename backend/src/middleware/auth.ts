import type { NextFunction, Request, RequestHandler, Response } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { config } from '../config.js';
import { forbidden, unauthorized } from '../errors.js';

const tokenSchema = z.object({
  sub: z.string().min(1),
  name: z.string().optional(),
  permissions: z.array(z.string()).default([]),
});

export type AuthenticatedUser = {
  id: string;
  name: string;
  permissions: string[];
};

declare global {
  namespace Express {
    interface Request {
      user?: AuthenticatedUser;
    }
  }
}

export const requireAuth: RequestHandler = (req, _res, next) => {
  const authHeader = req.headers.authorization ?? '';
  const token = authHeader.startsWith('Bearer ') ? authHeader.slice(7) : null;
  if (!token) {
    return next(unauthorized());
  }

  let payload: unknown;
  try {
    payload = jwt.verify(token, config.jwtSecret);
  } catch {
    return next(unauthorized('invalid token'));
  }

  const claims = tokenSchema.safeParse(payload);
  if (!claims.success) {
    return next(unauthorized('invalid token claims'));
  }

  req.user = {
    id: claims.data.sub,
    name: claims.data.name ?? claims.data.sub,
    permissions: claims.data.permissions,
  };
  return next();
};

export function requirePermission(...required: string[]): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (!req.user) {
      return next(unauthorized());
    }

    const userPermissions = req.user.permissions;
    if (userPermissions.includes('*')) {
      return next();
    }

    const hasPermission = required.some((permission) => userPermissions.includes(permission));
    if (!hasPermission) {
      return next(forbidden());
    }

    return next();
  };
}
