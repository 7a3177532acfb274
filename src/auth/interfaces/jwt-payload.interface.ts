import { UserRole } from '../../common/interfaces/authenticated-request.interface';

export interface JwtPayload {
  sub: string;
  email: string;
  role: UserRole;
  type?: 'refresh';
}
