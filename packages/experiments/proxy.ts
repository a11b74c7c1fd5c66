/**
 * Typed experiment proxy
 *
 * Presents a dispatcher as an object with `T`'s methods, each returning a
 * promise. Property access is resolved at call time; nothing is generated.
 */

import type { ExperimentDispatcher, InvocationOptions } from './dispatcher';
import type { AsyncService } from './types';

export function createExperimentProxy<T extends object>(
  dispatcher: ExperimentDispatcher<T>,
  options: InvocationOptions = {}
): AsyncService<T> {
  const target: AsyncService<T> = Object.create(null);
  return new Proxy(target, {
    get(_target, property) {
      // Not thenable, so the proxy itself can be awaited or returned from async code
      if (typeof property !== 'string' || property === 'then') {
        return undefined;
      }
      return (...args: unknown[]) => dispatcher.dispatch(property, args, options);
    },
  });
}
