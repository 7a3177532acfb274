import { Request } from 'express';

export type UserRole = 'USER' | 'ADMIN';

// Shape attached to req.user by JwtStrategy.
export interface JwtUser {
  userId: string;
  email: string;
  role: UserRole;
}

export interface AuthenticatedRequest extends Request {
  user: JwtUser;
}

export interface OptionalAuthRequest extends Request {
  user?: JwtUser;
}
