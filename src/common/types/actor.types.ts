import { Request } from 'express';

export type ActorRole = 'admin' | 'member';

export interface Actor {
  id: string;
  role: ActorRole;
}

export interface ActorRequest extends Request {
  actor?: Actor;
}

export const ACTOR_HEADERS = {
  ID: 'x-actor-id',
  ROLE: 'x-actor-role',
} as const;
