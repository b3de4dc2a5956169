import { Injectable, NestMiddleware, Logger } from '@nestjs/common';
import type { Request, Response, NextFunction } from 'express';
import { AuthenticatedUserContext } from '../../modules/auth/jwt.strategy';

@Injectable()
export class LoggingMiddleware implements NestMiddleware {
  private readonly logger = new Logger('HTTP');

  use(
    request: Request & { user?: AuthenticatedUserContext },
    response: Response,
    next: NextFunction,
  ): void {
    const { ip, method, originalUrl } = request;
    const userAgent = request.get('user-agent') || '';
    const startTime = Date.now();

    this.logger.log(`Request: ${method} ${originalUrl} - ${userAgent} ${ip}`);

    response.on('finish', () => {
      const { statusCode } = response;
      const contentLength = response.get('content-length');
      const responseTime = Date.now() - startTime;
      // Guards run after middleware, so the user is only known by now
      const userId = request.user?.id ?? 'anonymous';
      const line = `Response: ${method} ${originalUrl} ${statusCode} ${contentLength || 0}b - ${responseTime}ms [${userId}]`;

      if (statusCode >= 500) {
        this.logger.error(line);
      } else if (statusCode >= 400) {
        this.logger.warn(line);
      } else {
        this.logger.log(line);
      }
    });

    next();
  }
}
