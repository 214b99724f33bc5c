import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { Request } from 'express';
import { isValidTimeZone } from '../utils/time.util';

export const TIME_ZONE_HEADER = 'x-time-zone';

/** Caller's IANA zone from `X-Time-Zone`, or null when absent or unknown. */
export function readClientTimeZone(raw: string | string[] | undefined): string | null {
  const value = String((Array.isArray(raw) ? raw[0] : raw) ?? '').trim();
  return value && isValidTimeZone(value) ? value : null;
}

export const ClientTimeZone = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): string | null => {
    const req = ctx.switchToHttp().getRequest<Request>();
    return readClientTimeZone(req.headers[TIME_ZONE_HEADER]);
  }
);
