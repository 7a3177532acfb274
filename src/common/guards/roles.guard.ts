import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ROLES_KEY } from '../decorators/roles.decorator';
import { AuthorizationException } from '../exceptions/app.exception';
import { OptionalAuthRequest, UserRole } from '../interfaces/authenticated-request.interface';

// Runs after JwtAuthGuard; routes without @Roles are left alone.
@Injectable()
export class RolesGuard implements CanActivate {
  constructor(private readonly reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const required = this.reflector.getAllAndOverride<UserRole[] | undefined>(ROLES_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (!required || required.length === 0) {
      return true;
    }
    const { user } = context.switchToHttp().getRequest<OptionalAuthRequest>();
    if (!user || !required.includes(user.role)) {
      throw new AuthorizationException('관리자 권한이 필요합니다.');
    }
    return true;
  }
}
