import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { AuthenticationException } from '../../common/exceptions/app.exception';
import { JwtUser } from '../../common/interfaces/authenticated-request.interface';
import { AuthService } from '../auth.service';
import { JwtPayload } from '../interfaces/jwt-payload.interface';

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(
    configService: ConfigService,
    private readonly authService: AuthService,
  ) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: configService.getOrThrow<string>('JWT_SECRET'),
      algorithms: ['HS256'],
    });
  }

  // Passport has already verified the signature; the result becomes req.user
  async validate(payload: JwtPayload): Promise<JwtUser> {
    const user = await this.authService.validatePayload(payload);
    if (!user) {
      throw new AuthenticationException('유효하지 않은 토큰입니다.');
    }
    return user;
  }
}
