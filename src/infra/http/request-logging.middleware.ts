import { Inject, Injectable, LoggerService, NestMiddleware } from '@nestjs/common';
import type { NextFunction, Request, Response } from 'express';
import { APP_LOGGER } from '../logging/logging.module';

/** Logs one line per finished response: method, path, client IP, duration and status. */
@Injectable()
export class RequestLoggingMiddleware implements NestMiddleware {
  constructor(@Inject(APP_LOGGER) private readonly logger: LoggerService) {}

  use(req: Request, res: Response, next: NextFunction): void {
    const start = process.hrtime.bigint();
    res.on('finish', () => {
      const tookMs = Number(process.hrtime.bigint() - start) / 1e6;
      this.logger.log(
        `[${req.method}] ${req.originalUrl} from ${req.ip ?? 'unknown'} took ${tookMs.toFixed(1)}ms ${res.statusCode}`,
      );
    });
    next();
  }
}
