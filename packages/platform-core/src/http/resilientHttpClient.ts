import { withResilience, usePreset, type ResilienceConfig, type ResiliencePreset } from '../resilience';

const configuredBreakers = new Map<string, string>();

/**
 * Runs `fn` behind the circuit breaker `${targetService}:${operation}`,
 * configured from `preset` the first time the pair is seen.
 */
export function withServiceResilience<T>(
  targetService: string,
  operation: string,
  fn: () => Promise<T>,
  preset: Exclude<ResiliencePreset, 'database'> = 'internal-service',
  overrides?: ResilienceConfig
): Promise<T> {
  const breakerName = `${targetService}:${operation}`;
  const signature = `${preset}:${JSON.stringify(overrides ?? {})}`;

  if (configuredBreakers.get(breakerName) !== signature) {
    usePreset(breakerName, preset, overrides);
    configuredBreakers.set(breakerName, signature);
  }

  return withResilience(breakerName, fn);
}
