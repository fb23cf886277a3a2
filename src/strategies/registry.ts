import { UnsupportedStrategyError } from '../errors';
import {
  arbitrary,
  mapValues,
  recordValues,
  setValues,
  simple
} from './presets';
import type { AnyValueStrategy } from './types';

/**
 * Scope names understood by the built-in registry entries.
 *
 * - `simple`: compare the whole value by leaf equality.
 * - `arbitrary`: recurse into the value when it is itself diffable.
 * - `simply` / `arbitrarily`: for nested maps and records, diff the
 *   container and compare its values by leaf equality (`simply`) or with the
 *   plan's `values` strategy (`arbitrarily`).
 *
 * Custom registrations may use any other scope name.
 */
export type StrategyScope =
  | 'simple'
  | 'arbitrary'
  | 'simply'
  | 'arbitrarily'
  | (string & {});

/**
 * Creates a strategy, given the already-resolved strategy for nested values
 * (when the plan provided one).
 */
export type StrategyFactory = (
  values: AnyValueStrategy | undefined
) => AnyValueStrategy;

/**
 * Declarative description of a (possibly nested) strategy.
 *
 * @example
 * ```ts
 * // map<string, map<number, set<number>>>, recursive at both levels
 * const plan: StrategyPlan = {
 *   kind: 'map',
 *   scope: 'arbitrarily',
 *   values: { kind: 'map', scope: 'arbitrarily', values: { kind: 'set', scope: 'arbitrary' } }
 * };
 * ```
 */
export type StrategyPlan = {
  /**
   * The value kind the strategy compares (e.g. `map`, `set`, `leaf`).
   */
  kind: string;
  /**
   * The scope selecting which comparison applies to that kind.
   */
  scope: StrategyScope;
  /**
   * Plan for nested values, for container kinds.
   */
  values?: StrategyPlan;
};

/**
 * Lookup table of strategy factories keyed by value kind, then scope.
 *
 * Resolution is eager: `resolve` and `build` either return a ready strategy or
 * throw {@link UnsupportedStrategyError} before any comparison runs.
 */
export class StrategyRegistry {
  private readonly factories = new Map<string, Map<string, StrategyFactory>>();

  /**
   * Registers (or replaces) the factory for `kind` under `scope`.
   */
  register(kind: string, scope: StrategyScope, factory: StrategyFactory): this {
    let scopes = this.factories.get(kind);
    if (!scopes) {
      scopes = new Map();
      this.factories.set(kind, scopes);
    }
    scopes.set(scope, factory);
    return this;
  }

  has(kind: string, scope: StrategyScope): boolean {
    return this.factories.get(kind)?.has(scope) ?? false;
  }

  /**
   * Scopes registered for `kind`, in registration order.
   */
  scopesFor(kind: string): string[] {
    return Array.from(this.factories.get(kind)?.keys() ?? []);
  }

  /**
   * Resolves the strategy for `kind` under `scope`.
   *
   * @param values - Already-resolved strategy for nested values, if any.
   * @throws {UnsupportedStrategyError} When nothing is registered for the pair.
   */
  resolve(
    kind: string,
    scope: StrategyScope,
    values?: AnyValueStrategy
  ): AnyValueStrategy {
    const factory = this.factories.get(kind)?.get(scope);
    if (!factory) {
      throw new UnsupportedStrategyError(kind, scope, this.scopesFor(kind));
    }
    return factory(values);
  }

  /**
   * Resolves a whole plan, innermost values first.
   *
   * @throws {UnsupportedStrategyError} For the first unsupported (kind, scope)
   *   pair met while walking the plan from the inside out.
   */
  build(plan: StrategyPlan): AnyValueStrategy {
    const values = plan.values ? this.build(plan.values) : undefined;
    return this.resolve(plan.kind, plan.scope, values);
  }
}

/**
 * Creates a registry pre-populated with the built-in presets.
 *
 * | kind     | simple   | arbitrary               | simply                  | arbitrarily                  |
 * | -------- | -------- | ----------------------- | ----------------------- | ---------------------------- |
 * | `leaf`   | simple() | simple() (bottoms out)  |                         |                              |
 * | `set`    | simple() | setValues()             |                         |                              |
 * | `map`    | simple() | mapValues(arbitrary())  | mapValues(simple())     | mapValues(values ?? arbitrary()) |
 * | `record` | simple() | recordValues(arbitrary()) | recordValues(simple()) | recordValues(values ?? arbitrary()) |
 * | `any`    | simple() | arbitrary()             |                         |                              |
 */
export function createStrategyRegistry(): StrategyRegistry {
  return new StrategyRegistry()
    .register('leaf', 'simple', () => simple())
    .register('leaf', 'arbitrary', () => simple())
    .register('set', 'simple', () => simple())
    .register('set', 'arbitrary', () => setValues())
    .register('map', 'simple', () => simple())
    .register('map', 'arbitrary', () => mapValues(arbitrary()))
    .register('map', 'simply', () => mapValues(simple()))
    .register('map', 'arbitrarily', values =>
      mapValues(values ?? arbitrary())
    )
    .register('record', 'simple', () => simple())
    .register('record', 'arbitrary', () => recordValues(arbitrary()))
    .register('record', 'simply', () => recordValues(simple()))
    .register('record', 'arbitrarily', values =>
      recordValues(values ?? arbitrary())
    )
    .register('any', 'simple', () => simple())
    .register('any', 'arbitrary', () => arbitrary());
}
