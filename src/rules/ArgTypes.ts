/**
 * Argument type constraints used to select rules.
 * Types form a tree rooted at `any`; a child is more specific than its parent.
 */

import { Complex } from '../core/Complex.js';
import { isNumericArray, isScalar } from '../core/Numeric.js';

/**
 * A named constraint on one argument of a rule
 */
export interface ArgType {
  name: string;
  parent?: ArgType;
  test(value: unknown): boolean;
}

/**
 * Ordered argument types of one registered rule
 */
export type Signature = readonly ArgType[];

/**
 * Either a registered type name or the type itself
 */
export type ArgTypeSpec = string | ArgType;

/**
 * Registry of all argument types
 */
export class ArgTypeRegistry {
  private types: Map<string, ArgType> = new Map();

  constructor() {
    this.registerAll();
  }

  /**
   * Register the built-in types
   */
  private registerAll(): void {
    this.define('any', undefined, () => true);

    // Number-like scalars, the default constraint of generated rules
    this.define('number', 'any', isScalar);
    this.define('real', 'number', value => typeof value === 'number');
    this.define('complex', 'number', value => value instanceof Complex);

    this.define('array', 'any', isNumericArray);
    this.define('string', 'any', value => typeof value === 'string');
    this.define('boolean', 'any', value => typeof value === 'boolean');
  }

  /**
   * Define a new type below `parent`. A value belongs to the type when it
   * passes `test` and the tests of every ancestor.
   */
  define(name: string, parent: string | undefined, test: (value: unknown) => boolean): ArgType {
    if (this.types.has(name)) {
      throw new Error(`Argument type '${name}' is already defined`);
    }
    const argType: ArgType = {
      name,
      parent: parent === undefined ? undefined : this.getOrThrow(parent),
      test
    };
    this.types.set(name, argType);
    return argType;
  }

  get(name: string): ArgType | undefined {
    return this.types.get(name);
  }

  has(name: string): boolean {
    return this.types.has(name);
  }

  getOrThrow(name: string): ArgType {
    const argType = this.get(name);
    if (!argType) {
      throw new Error(`Argument type '${name}' is not defined`);
    }
    return argType;
  }

  resolve(spec: ArgTypeSpec): ArgType {
    return typeof spec === 'string' ? this.getOrThrow(spec) : spec;
  }
}

/**
 * Check whether `a` is `b` or one of its descendants
 */
export function isSubtype(a: ArgType, b: ArgType): boolean {
  for (let t: ArgType | undefined = a; t; t = t.parent) {
    if (t === b) return true;
  }
  return false;
}

export function accepts(argType: ArgType, value: unknown): boolean {
  for (let t: ArgType | undefined = argType; t; t = t.parent) {
    if (!t.test(value)) return false;
  }
  return true;
}

export function signatureMatches(signature: Signature, args: readonly unknown[]): boolean {
  return signature.length === args.length && signature.every((t, i) => accepts(t, args[i]));
}

export function signaturesEqual(a: Signature, b: Signature): boolean {
  return a.length === b.length && a.every((t, i) => t === b[i]);
}

/**
 * `a` is at least as specific as `b` in every position, and they differ
 */
export function isMoreSpecific(a: Signature, b: Signature): boolean {
  if (a.length !== b.length || signaturesEqual(a, b)) return false;
  return a.every((t, i) => isSubtype(t, b[i]));
}

export function formatSignature(signature: Signature): string {
  return signature.map(t => t.name).join(', ');
}
