import type { ScenarioInput } from './types';

/**
 * Resolves a scenario input that may be a direct value or a builder function.
 *
 * Note: Use builders only when the input needs fresh references (aliasing,
 * cycles, or collections a test mutates). Prefer named builders defined near
 * the scenario table.
 */
export function resolveScenarioInput<T>(input: ScenarioInput<T>): T {
  if (typeof input === 'function') {
    return (input as () => T)();
  }
  return input;
}
