import { Injectable, CanActivate, ExecutionContext, ForbiddenException } from '@nestjs/common';
import { ActorRequest } from '../types/actor.types';

/**
 * Admin Guard
 *
 * Protects deadline overrides, result entry and audit reads.
 * Must run after ActorGuard.
 */
@Injectable()
export class AdminGuard implements CanActivate {
  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<ActorRequest>();
    const actor = request.actor;

    if (!actor) {
      throw new ForbiddenException('Authentication required');
    }

    if (actor.role !== 'admin') {
      throw new ForbiddenException('ADMIN_ACCESS_REQUIRED');
    }

    return true;
  }
}
