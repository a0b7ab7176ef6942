import { randomBytes, randomUUID } from 'node:crypto';

/**
 * Time source. Injected everywhere expiry is computed so tests can move time.
 */
export interface Clock {
  now(): Date;
}

/**
 * Source of cryptographically secure randomness.
 */
export interface RandomSource {
  bytes(size: number): Buffer;
  uuid(): string;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export const cryptoRandomSource: RandomSource = {
  bytes: (size) => randomBytes(size),
  uuid: () => randomUUID(),
};

/** Whole Unix seconds for a date. */
export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}
