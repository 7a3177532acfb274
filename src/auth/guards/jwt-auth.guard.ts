import { Injectable } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';

// Activates JwtStrategy
@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {}
