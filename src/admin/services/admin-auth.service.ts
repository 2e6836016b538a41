import { createHash, timingSafeEqual } from 'crypto';
import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { cfg } from '@common/config/config.service';
import type { AdminSessionPayload } from '@shared/types/request';
import { AdminSessionRto } from '../rto/auth.rto';

const digest = (value: string): Buffer => createHash('sha256').update(value, 'utf8').digest();

@Injectable()
export class AdminAuthService {
  private readonly logger = new Logger(AdminAuthService.name);

  constructor(private readonly jwtService: JwtService) {}

  /** Both sides are hashed first so the comparison never depends on the input length. */
  verifyPassword(candidate: string): boolean {
    return timingSafeEqual(digest(candidate), digest(cfg.admin.password));
  }

  async login(password: string): Promise<AdminSessionRto> {
    if (!this.verifyPassword(password)) {
      this.logger.warn('Rejected admin login with a wrong password');
      throw new UnauthorizedException('Invalid password');
    }

    const { secretKey, sessionTtl } = cfg.admin;
    const payload: AdminSessionPayload = { sub: 'admin' };
    const accessToken = await this.jwtService.signAsync(payload, { secret: secretKey, expiresIn: sessionTtl });

    this.logger.log('Admin signed in');
    return { accessToken, expiresIn: sessionTtl };
  }
}
