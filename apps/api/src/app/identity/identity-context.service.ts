import { Injectable, UnauthorizedException } from '@nestjs/common';
import { AsyncLocalStorage } from 'async_hooks';
import { ANONYMOUS, ResolvedIdentity } from './identity.types';

@Injectable()
export class IdentityContextService {
  private readonly storage = new AsyncLocalStorage<ResolvedIdentity>();

  run(identity: ResolvedIdentity, callback: () => void) {
    this.storage.run(identity, callback);
  }

  current(): ResolvedIdentity {
    return this.storage.getStore() ?? ANONYMOUS;
  }

  requireEmail(): string {
    const email = this.current().email;
    if (!email) {
      throw new UnauthorizedException('Sign in with your university account.');
    }
    return email;
  }
}
