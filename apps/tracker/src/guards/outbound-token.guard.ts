import { Injectable, CanActivate, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';

export const OUTBOUND_TOKEN_HEADER = 'x-outbound-auth-token';

/**
 * Garmin's outbound service sends the configured token in a header with every post.
 * Open when TRACKER_API_TOKEN is unset.
 */
@Injectable()
export class OutboundTokenGuard implements CanActivate {
  constructor(private readonly configService: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const expectedToken = this.configService.get<string>('TRACKER_API_TOKEN');

    if (!expectedToken) {
      return true;
    }

    const request = context.switchToHttp().getRequest<Request>();
    const token = request.headers[OUTBOUND_TOKEN_HEADER];

    if (token !== expectedToken) {
      throw new UnauthorizedException('Invalid outbound auth token');
    }

    return true;
  }
}
