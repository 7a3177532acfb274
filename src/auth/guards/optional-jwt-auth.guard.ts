import { CanActivate, ExecutionContext, Injectable, Logger } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { ExtractJwt } from 'passport-jwt';
import { OptionalAuthRequest } from '../../common/interfaces/authenticated-request.interface';
import { errorMessage } from '../../common/utils/http-error.util';
import { AuthService } from '../auth.service';
import { JwtPayload } from '../interfaces/jwt-payload.interface';

const extractToken = ExtractJwt.fromAuthHeaderAsBearerToken();

/**
 * Never rejects. A valid bearer token sets req.user; a missing or bad one leaves it unset.
 */
@Injectable()
export class OptionalJwtAuthGuard implements CanActivate {
  private readonly logger = new Logger(OptionalJwtAuthGuard.name);

  constructor(
    private readonly jwtService: JwtService,
    private readonly authService: AuthService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<OptionalAuthRequest>();
    request.user = undefined;

    const token = extractToken(request);
    if (!token) {
      return true;
    }

    try {
      const payload = await this.jwtService.verifyAsync<JwtPayload>(token);
      request.user = (await this.authService.validatePayload(payload)) ?? undefined;
    } catch (error) {
      this.logger.debug(`Ignoring invalid token: ${errorMessage(error)}`);
    }
    return true;
  }
}
