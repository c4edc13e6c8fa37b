/**
 * Source of "now" for every deadline and lifecycle decision.
 * Bound to the CLOCK token so tests can move time deterministically.
 */
export interface Clock {
  now(): Date;
}

export const CLOCK = Symbol('CLOCK');

export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }
}
