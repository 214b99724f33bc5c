import { Injectable } from '@nestjs/common';
import { randomBytes } from 'crypto';

export const SESSION_TOKEN_BYTES = 16;

@Injectable()
export class SessionTokenIssuer {
  /** 128 random bits as 32 lower-case hex characters. */
  issue(): string {
    return randomBytes(SESSION_TOKEN_BYTES).toString('hex');
  }
}
