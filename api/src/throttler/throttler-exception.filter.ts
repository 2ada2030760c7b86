import { Catch, ExceptionFilter, ArgumentsHost } from '@nestjs/common';
import { ThrottlerException } from '@nestjs/throttler';
import type { Request, Response } from 'express';
import { LINKING_PAGES, renderLinkingPage } from '../linking/linking-pages';
import { RATE_LIMIT_WINDOW_MS } from './rate-limit.decorator';

const RETRY_AFTER_SECONDS = RATE_LIMIT_WINDOW_MS / 1000;

/**
 * 429 for throttled visitors. People who followed a DM'd link get the same
 * kind of page as the rest of the linking flow; everything else gets JSON.
 */
@Catch(ThrottlerException)
export class ThrottlerExceptionFilter implements ExceptionFilter {
  catch(_exception: ThrottlerException, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const req = ctx.getRequest<Request>();
    const res = ctx.getResponse<Response>();

    res.status(429).setHeader('Retry-After', String(RETRY_AFTER_SECONDS));
    if (req.accepts(['json', 'html']) === 'html') {
      res.type('html').send(renderLinkingPage(LINKING_PAGES.throttled));
      return;
    }
    res.json({
      statusCode: 429,
      message: 'Too many requests. Please try again later.',
      retryAfter: RETRY_AFTER_SECONDS,
    });
  }
}
