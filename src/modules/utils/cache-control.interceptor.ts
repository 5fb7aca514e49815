import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Response } from 'express';
import { Observable } from 'rxjs';

@Injectable()
export class CacheControlInterceptor implements NestInterceptor {
  constructor(private readonly configService: ConfigService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const response = context.switchToHttp().getResponse<Response>();
    const maxAge = this.configService.get<number>(
      'HTTP_CACHE_MAX_AGE_SECONDS',
      300,
    );

    // Set before the handler runs so the header goes out with the body
    if (!response.headersSent) {
      response.setHeader('Cache-Control', `public, max-age=${maxAge}`);
    }

    return next.handle();
  }
}
