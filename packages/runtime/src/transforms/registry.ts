// Transform registry - maps transform names to implementations

import { UnknownTransformError } from '../errors.js';
import type { Transform } from './types.js';

export type TransformEntries = Iterable<readonly [string, Transform]> | Readonly<Record<string, Transform>>;

/**
 * Immutable registry of named transforms.
 *
 * Populated once from a static table at construction and never changed
 * afterwards. Sensor records refer to transforms by name
 * (`convert_lambda: degrees_to_cardinal`); the name is resolved when a
 * value is converted, not when the sensor table is loaded.
 */
export class TransformRegistry {
  private readonly transforms: ReadonlyMap<string, Transform>;

  /**
   * @throws Error if the same name appears twice in `entries`
   */
  constructor(entries: TransformEntries) {
    const transforms = new Map<string, Transform>();
    const pairs = isIterable(entries) ? entries : Object.entries(entries);

    for (const [name, transform] of pairs) {
      if (transforms.has(name)) {
        throw new Error(`Transform already registered under name: ${name}`);
      }
      transforms.set(name, transform);
    }

    this.transforms = transforms;
    Object.freeze(this);
  }

  /**
   * Get the transform registered under a name.
   *
   * @throws UnknownTransformError if no transform has that name
   */
  resolve(name: string): Transform {
    const transform = this.transforms.get(name);
    if (!transform) {
      throw new UnknownTransformError(name);
    }
    return transform;
  }

  /**
   * Get a transform, or undefined if not registered
   */
  get(name: string): Transform | undefined {
    return this.transforms.get(name);
  }

  has(name: string): boolean {
    return this.transforms.has(name);
  }

  /**
   * All registered names, in registration order
   */
  names(): string[] {
    return Array.from(this.transforms.keys());
  }
}

function isIterable(
  entries: TransformEntries
): entries is Iterable<readonly [string, Transform]> {
  return Symbol.iterator in entries;
}
