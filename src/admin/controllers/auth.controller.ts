import { Body, Controller, HttpCode, HttpStatus, Post, Res } from '@nestjs/common';
import { ApiOperation, ApiTags, ApiUnauthorizedResponse } from '@nestjs/swagger';
import { Throttle } from '@nestjs/throttler';
import { Response } from 'express';
import { cfg } from '@common/config/config.service';
import { ApiSuccessResponse } from '@shared/decorators/api-success-response.decorator';
import { success, SuccessResponseRto } from '@shared/response.rto';
import { AdminLoginDto } from '../dto/login.dto';
import { AdminSessionRto } from '../rto/auth.rto';
import { AdminAuthService } from '../services/admin-auth.service';

@ApiTags('admin: auth')
@Controller('admin')
export class AuthController {
  constructor(private readonly adminAuthService: AdminAuthService) {}

  @Post('login')
  @Throttle({ short: { ttl: 60000, limit: 5 } })
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Sign in with the shared admin password' })
  @ApiSuccessResponse(AdminSessionRto)
  @ApiUnauthorizedResponse({ description: 'Wrong password' })
  async login(
    @Body() dto: AdminLoginDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<SuccessResponseRto<AdminSessionRto>> {
    const session = await this.adminAuthService.login(dto.password);
    res.cookie(cfg.admin.cookieName, session.accessToken, {
      httpOnly: true,
      sameSite: 'lax',
    });
    return success(session);
  }

  @Post('logout')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Clear the admin session cookie' })
  logout(@Res({ passthrough: true }) res: Response): void {
    res.clearCookie(cfg.admin.cookieName);
  }
}
