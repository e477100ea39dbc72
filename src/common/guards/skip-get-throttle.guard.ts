import { Injectable, ExecutionContext } from '@nestjs/common';
import { ThrottlerGuard } from '@nestjs/throttler';
import { Request } from 'express';

/**
 * ThrottlerGuard that never throttles read-only requests.
 * Balance and history lookups are free, recording transactions is rate limited.
 */
@Injectable()
export class SkipGetThrottleGuard extends ThrottlerGuard {
  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<Request>();

    if (request.method === 'GET' || request.method === 'HEAD') {
      return true;
    }

    return super.canActivate(context);
  }
}
