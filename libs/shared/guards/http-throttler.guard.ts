import { ExecutionContext, Injectable } from '@nestjs/common';
import { ThrottlerGuard } from '@nestjs/throttler';

/** Rate limits HTTP routes only; Telegram updates also pass through global guards and carry no response object. */
@Injectable()
export class HttpThrottlerGuard extends ThrottlerGuard {
	protected async shouldSkip(context: ExecutionContext): Promise<boolean> {
		return context.getType() !== 'http';
	}
}
