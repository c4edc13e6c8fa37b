import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { Actor, ActorRequest } from '../types/actor.types';

export const CurrentActor = createParamDecorator((_data: unknown, ctx: ExecutionContext): Actor => {
  const request = ctx.switchToHttp().getRequest<ActorRequest>();
  if (!request.actor) {
    throw new UnauthorizedException('MISSING_ACTOR_ID');
  }
  return request.actor;
});
