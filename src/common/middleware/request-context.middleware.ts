import { Injectable, NestMiddleware } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { asyncLocalStorage, RequestContext } from '../logger/request-context';

export const CORRELATION_ID_HEADER = 'X-Correlation-ID';

function firstHeader(value: string | string[] | undefined): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  const trimmed = first?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Opens the request context for everything downstream of this middleware:
 * correlation id plus the acting username forwarded by the authenticating
 * proxy. The context ends with the request.
 */
@Injectable()
export class RequestContextMiddleware implements NestMiddleware {
  private readonly actorHeader: string;

  constructor(configService: ConfigService) {
    this.actorHeader = configService.get<string>('app.actorHeader') ?? 'x-remote-user';
  }

  use(req: Request, res: Response, next: NextFunction): void {
    const correlationId =
      firstHeader(req.headers[CORRELATION_ID_HEADER.toLowerCase()]) || uuidv4();

    res.setHeader(CORRELATION_ID_HEADER, correlationId);

    const context: RequestContext = {
      correlationId,
      username: firstHeader(req.headers[this.actorHeader]),
      method: req.method,
      path: req.originalUrl,
      ip: req.ip || req.socket?.remoteAddress,
    };

    asyncLocalStorage.run(context, () => {
      next();
    });
  }
}
