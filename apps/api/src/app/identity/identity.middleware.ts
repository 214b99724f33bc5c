import { Inject, Injectable, NestMiddleware } from '@nestjs/common';
import { IdentityContextService } from './identity-context.service';
import {
  IDENTITY_RESOLVER,
  IdentityRequest,
  IdentityResolver,
  ResolvedIdentity,
} from './identity.types';

@Injectable()
export class IdentityMiddleware implements NestMiddleware {
  constructor(
    @Inject(IDENTITY_RESOLVER) private readonly resolver: IdentityResolver,
    private readonly identityContext: IdentityContextService
  ) {}

  async use(req: IdentityRequest, _res: unknown, next: (error?: unknown) => void) {
    let identity: ResolvedIdentity;
    try {
      identity = await this.resolver.resolve(req);
    } catch (error) {
      next(error);
      return;
    }
    this.identityContext.run(identity, () => next());
  }
}
