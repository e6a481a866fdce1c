import { Request } from 'express';
import { UserRole } from '../constants/user.constants';

/**
 * Authenticated user attached by the auth middleware
 */
export interface AuthUser {
  id: string;
  username: string;
  role: UserRole;
}

export interface AuthRequest extends Request {
  user?: AuthUser;
}

/**
 * Who is acting, as the hierarchy services see it
 */
export interface Actor {
  id: string;
  isAdmin: boolean;
}
