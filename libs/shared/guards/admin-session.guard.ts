import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { cfg } from '@common/config/config.service';
import { AdminSessionPayload, IRequest } from '@shared/types/request';

/** Accepts the session cookie set at login or an `Authorization: Bearer` header. */
@Injectable()
export class AdminSessionGuard implements CanActivate {
	constructor(private readonly jwtService: JwtService) {}

	async canActivate(context: ExecutionContext): Promise<boolean> {
		const request = context.switchToHttp().getRequest<IRequest>();
		const token = this.extractToken(request);

		if (!token) {
			throw new UnauthorizedException('Admin session is required');
		}

		try {
			request.admin = await this.jwtService.verifyAsync<AdminSessionPayload>(token, {
				secret: cfg.admin.secretKey,
			});
			return true;
		} catch {
			throw new UnauthorizedException('Admin session is invalid or expired');
		}
	}

	private extractToken(request: IRequest): string | undefined {
		const cookies: Record<string, unknown> = request.cookies ?? {};
		const fromCookie = cookies[cfg.admin.cookieName];
		if (typeof fromCookie === 'string' && fromCookie) {
			return fromCookie;
		}

		const authHeader = request.headers.authorization;
		if (!authHeader) return undefined;

		const [bearer, token] = authHeader.split(' ');
		return bearer === 'Bearer' && token ? token : undefined;
	}
}
