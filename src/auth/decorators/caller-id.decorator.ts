import {
  createParamDecorator,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';
import type { AuthenticatedRequest } from '../guards/clerk-auth.guard';

/** Caller address set by ClerkAuthGuard. */
export const CallerId = createParamDecorator(
  (_: unknown, ctx: ExecutionContext): string => {
    const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!request.callerId) {
      throw new UnauthorizedException('Authentication required');
    }
    return request.callerId;
  },
);
