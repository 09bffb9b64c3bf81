import {
  CanActivate,
  ExecutionContext,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';
import { timingSafeEqual } from 'node:crypto';

/**
 * Accepts `Authorization: Bearer <ADMIN_API_TOKEN>`; with no token
 * configured every admin call is refused
 */
@Injectable()
export class AdminTokenGuard implements CanActivate {
  constructor(private readonly configService: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const auth = context.switchToHttp().getRequest<Request>().header('authorization');
    if (!auth) {
      throw new UnauthorizedException('Authorization header required');
    }

    const token = this.configService.get<string>('ADMIN_API_TOKEN') || '';
    const expected = Buffer.from(`Bearer ${token}`);
    const received = Buffer.from(auth);
    if (
      !token ||
      expected.length !== received.length ||
      !timingSafeEqual(expected, received)
    ) {
      throw new UnauthorizedException('Invalid admin token');
    }
    return true;
  }
}
