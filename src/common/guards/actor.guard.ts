import { Injectable, CanActivate, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { ACTOR_HEADERS, ActorRequest } from '../types/actor.types';

/**
 * Resolves the calling actor from the identity headers set by the upstream
 * gateway. Authentication itself happens outside this service.
 */
@Injectable()
export class ActorGuard implements CanActivate {
  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<ActorRequest>();
    const actorId = request.header(ACTOR_HEADERS.ID)?.trim();

    if (!actorId) {
      throw new UnauthorizedException('MISSING_ACTOR_ID');
    }

    const role = request.header(ACTOR_HEADERS.ROLE)?.trim().toLowerCase();
    request.actor = { id: actorId, role: role === 'admin' ? 'admin' : 'member' };

    return true;
  }
}
