import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import * as bcrypt from 'bcrypt';
import { AuthenticationException } from '../common/exceptions/app.exception';
import { JwtUser } from '../common/interfaces/authenticated-request.interface';
import { errorMessage } from '../common/utils/http-error.util';
import { CreateUserDto } from '../user/dto/create-user.dto';
import { UpdateUserDto } from '../user/dto/update-user.dto';
import { toUserResponse, UserResponseDto } from '../user/dto/user-response.dto';
import { User, UserDocument } from '../user/schemas/user.schema';
import { UserService } from '../user/user.service';
import { ChangePasswordDto } from './dto/change-password.dto';
import { JwtPayload } from './interfaces/jwt-payload.interface';

const SALT_ROUNDS = 10;

export interface LoginResponse {
  access_token: string;
  refresh_token: string;
  token_type: 'bearer';
  expires_in: number;
  user: UserResponseDto;
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly userService: UserService,
    private readonly jwtService: JwtService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Checks email and password for LocalStrategy.
   * Returns null on bad credentials; an inactive account is rejected outright.
   */
  async validateUser(email: string, password: string): Promise<UserDocument | null> {
    const user = await this.userService.findOneByEmail(email);
    if (!user || !(await bcrypt.compare(password, user.hashedPassword))) {
      return null;
    }
    if (!user.isActive) {
      throw new AuthenticationException('비활성화된 계정입니다.');
    }
    return user;
  }

  /**
   * Resolves a verified access-token payload to the request user.
   * Refresh tokens, unknown users and inactive users resolve to null.
   */
  async validatePayload(payload: JwtPayload): Promise<JwtUser | null> {
    if (payload.type === 'refresh') {
      return null;
    }
    const user = await this.userService.findOneById(payload.sub);
    if (!user || !user.isActive) {
      return null;
    }
    return { userId: user._id.toString(), email: user.email, role: user.role };
  }

  async register(dto: CreateUserDto): Promise<UserResponseDto> {
    if (await this.userService.findOneByEmail(dto.email)) {
      throw new BadRequestException('이미 등록된 이메일입니다.');
    }
    if (await this.userService.findOneByNickname(dto.nickname)) {
      throw new BadRequestException('이미 사용 중인 닉네임입니다.');
    }

    const { password, ...profile } = dto;
    const hashedPassword = await bcrypt.hash(password, SALT_ROUNDS);
    const user = await this.userService.create({ ...profile, hashedPassword });

    this.logger.log(`Registered user ${user.email}`);
    return toUserResponse(user);
  }

  async login(user: Pick<User, '_id'>): Promise<LoginResponse> {
    const updated = await this.userService.recordLogin(user._id.toString());
    const payload: JwtPayload = {
      sub: updated._id.toString(),
      email: updated.email,
      role: updated.role,
    };
    const expireMinutes = this.configService.get<number>('ACCESS_TOKEN_EXPIRE_MINUTES') ?? 30;
    const refreshDays = this.configService.get<number>('REFRESH_TOKEN_EXPIRE_DAYS') ?? 7;

    return {
      access_token: this.jwtService.sign(payload, { expiresIn: `${expireMinutes}m` }),
      refresh_token: this.jwtService.sign({ ...payload, type: 'refresh' }, { expiresIn: `${refreshDays}d` }),
      token_type: 'bearer',
      expires_in: expireMinutes * 60,
      user: toUserResponse(updated),
    };
  }

  async refresh(refreshToken: string): Promise<{ access_token: string; token_type: 'bearer'; expires_in: number }> {
    let payload: JwtPayload;
    try {
      payload = await this.jwtService.verifyAsync<JwtPayload>(refreshToken);
    } catch (error) {
      this.logger.debug(`Refresh token rejected: ${errorMessage(error)}`);
      throw new AuthenticationException('유효하지 않은 리프레시 토큰입니다.');
    }
    if (payload.type !== 'refresh') {
      throw new AuthenticationException('유효하지 않은 리프레시 토큰입니다.');
    }

    const user = await this.userService.findOneById(payload.sub);
    if (!user || !user.isActive) {
      throw new AuthenticationException('비활성화된 계정입니다.');
    }

    const expireMinutes = this.configService.get<number>('ACCESS_TOKEN_EXPIRE_MINUTES') ?? 30;
    const accessPayload: JwtPayload = { sub: user._id.toString(), email: user.email, role: user.role };
    return {
      access_token: this.jwtService.sign(accessPayload, { expiresIn: `${expireMinutes}m` }),
      token_type: 'bearer',
      expires_in: expireMinutes * 60,
    };
  }

  async getProfile(userId: string): Promise<UserResponseDto> {
    const user = await this.userService.findOneById(userId);
    if (!user) {
      throw new NotFoundException('사용자를 찾을 수 없습니다.');
    }
    return toUserResponse(user);
  }

  async updateProfile(userId: string, dto: UpdateUserDto): Promise<UserResponseDto> {
    if (dto.nickname) {
      const owner = await this.userService.findOneByNickname(dto.nickname);
      if (owner && owner._id.toString() !== userId) {
        throw new BadRequestException('이미 사용 중인 닉네임입니다.');
      }
    }
    const updated = await this.userService.update(userId, dto);
    return toUserResponse(updated);
  }

  async changePassword(userId: string, dto: ChangePasswordDto): Promise<void> {
    const user = await this.userService.findOneById(userId);
    if (!user) {
      throw new NotFoundException('사용자를 찾을 수 없습니다.');
    }
    if (!(await bcrypt.compare(dto.currentPassword, user.hashedPassword))) {
      throw new BadRequestException('현재 비밀번호가 올바르지 않습니다.');
    }
    if (dto.currentPassword === dto.newPassword) {
      throw new BadRequestException('새 비밀번호는 현재 비밀번호와 달라야 합니다.');
    }

    const hashedPassword = await bcrypt.hash(dto.newPassword, SALT_ROUNDS);
    await this.userService.update(userId, { hashedPassword });
    this.logger.log(`Password changed for user ${userId}`);
  }
}
