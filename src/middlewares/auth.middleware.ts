import { Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { Queryable, pool } from '../connections/db/connection';
import { appConfig } from '../connections/config/app.config';
import { User } from '../connections/db/models/user.model';
import { USER_ROLE, USER_STATUS, UserRole, isUserRole } from '../constants/user.constants';
import { Actor, AuthRequest, AuthUser } from '../types/request.types';
import { ResponseHandler } from '../utils/response';

/**
 * Looks up an active user; null when missing, banned or deleted
 */
export type UserResolver = (userId: string) => Promise<AuthUser | null>;

const tokenPayloadSchema = z.object({
  userId: z.string().min(1),
});

export const createPgUserResolver = (db: Queryable = pool): UserResolver => async userId => {
  const result = await db.query<Pick<User, 'id' | 'username'> & { role: string }>(
    'SELECT id, username, role FROM users WHERE id = $1 AND status = $2',
    [userId, USER_STATUS.ACTIVE]
  );

  const user = result.rows[0];
  if (!user || !isUserRole(user.role)) {
    return null;
  }

  return { id: user.id, username: user.username, role: user.role };
};

const bearerToken = (req: AuthRequest): string | undefined => {
  const [scheme, token] = (req.headers.authorization ?? '').split(' ');
  return scheme === 'Bearer' && token ? token : undefined;
};

export const createAuthMiddleware = (resolveUser: UserResolver) => {
  const resolveUserFromToken = async (token: string): Promise<AuthUser> => {
    const { userId } = tokenPayloadSchema.parse(jwt.verify(token, appConfig.jwtSecret));

    const user = await resolveUser(userId);
    if (!user) {
      throw new Error('User not found or inactive');
    }
    return user;
  };

  const authenticate = async (req: AuthRequest, res: Response, next: NextFunction) => {
    const token = bearerToken(req);
    if (!token) {
      return ResponseHandler.unauthorized(res, 'Token not provided');
    }

    try {
      req.user = await resolveUserFromToken(token);
    } catch (error) {
      return ResponseHandler.unauthorized(res, error instanceof jwt.TokenExpiredError ? 'Token expired' : 'Invalid token');
    }

    next();
  };

  // Guests pass through without req.user; a bad token is treated as no token
  const optionalAuthenticate = async (req: AuthRequest, _res: Response, next: NextFunction) => {
    const token = bearerToken(req);
    if (token) {
      try {
        req.user = await resolveUserFromToken(token);
      } catch {
        req.user = undefined;
      }
    }

    next();
  };

  return { authenticate, optionalAuthenticate };
};

export type AuthMiddleware = ReturnType<typeof createAuthMiddleware>;

export const requireRole = (...roles: UserRole[]) => {
  return (req: AuthRequest, res: Response, next: NextFunction) => {
    if (!req.user) {
      return ResponseHandler.unauthorized(res, 'Not authenticated');
    }

    if (!roles.includes(req.user.role)) {
      return ResponseHandler.forbidden(res, 'Access denied');
    }

    next();
  };
};

export const toActor = (user?: AuthUser): Actor | null =>
  user ? { id: user.id, isAdmin: user.role === USER_ROLE.ADMIN } : null;
