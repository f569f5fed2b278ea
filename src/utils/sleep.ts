import { setTimeout as delay } from "node:timers/promises";

export function sleep(ms: number): Promise<void> {
  return delay(ms);
}

/**
 * Uniform random number in [min, max)
 */
export function uniform(
  min: number,
  max: number,
  random: () => number = Math.random,
): number {
  return min + (max - min) * random();
}
