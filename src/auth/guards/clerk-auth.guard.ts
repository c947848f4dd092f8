import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { extractBearerToken, verifyCallerToken } from '../clerk-token';

export interface AuthenticatedRequest {
  headers: Record<string, string | string[] | undefined>;
  callerId?: string;
}

@Injectable()
export class ClerkAuthGuard implements CanActivate {
  private readonly logger = new Logger(ClerkAuthGuard.name);

  constructor(private readonly config: ConfigService) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = extractBearerToken(request.headers['authorization']);

    if (!token) {
      this.logger.warn('Request missing Authorization Bearer token');
      throw new UnauthorizedException(
        'Missing or invalid authorization header',
      );
    }

    const secretKey = this.config.get<string>('clerk.secretKey');
    if (!secretKey) {
      this.logger.error('CLERK_SECRET_KEY is not set in environment');
      throw new UnauthorizedException('Server auth configuration error');
    }

    try {
      const callerId = await verifyCallerToken(token, secretKey);
      this.logger.debug(`Authenticated caller=${callerId}`);
      request.callerId = callerId;
      return true;
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      this.logger.warn(msg);
      throw new UnauthorizedException(msg);
    }
  }
}
