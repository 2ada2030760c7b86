import { Injectable } from '@nestjs/common';
import { ThrottlerGuard } from '@nestjs/throttler';

/**
 * Every request reaches the bot from nginx on loopback, so `req.ip` is the
 * same for all visitors. nginx passes the client address in X-Real-IP.
 */
export function visitorAddress(req: Record<string, unknown>): string {
  const headers = req.headers;
  if (typeof headers === 'object' && headers !== null && 'x-real-ip' in headers) {
    const realIp = headers['x-real-ip'];
    if (typeof realIp === 'string' && realIp !== '') return realIp;
  }
  return typeof req.ip === 'string' ? req.ip : 'unknown';
}

@Injectable()
export class RealIpThrottlerGuard extends ThrottlerGuard {
  protected async getTracker(req: Record<string, unknown>): Promise<string> {
    return visitorAddress(req);
  }
}
