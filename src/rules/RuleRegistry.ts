/**
 * Rule lookup: frule/rrule dispatch on function identity and argument types
 */

import { Differential } from '../core/Differentials.js';
import { AmbiguousRuleError } from '../core/Errors.js';
import {
  ArgTypeRegistry,
  ArgTypeSpec,
  Signature,
  formatSignature,
  isMoreSpecific,
  signatureMatches,
  signaturesEqual
} from './ArgTypes.js';
import { AbstractRule } from './Propagators.js';

export type RuleMode = 'frule' | 'rrule';

/**
 * Any plain function a rule can be attached to
 */
export type PrimalFunction = (...args: never[]) => unknown;

/**
 * Pushforward: (self, Δx₁, Δx₂, ...) -> [ΔΩ₁, ΔΩ₂, ...]
 * Pullback: (ΔΩ₁, ΔΩ₂, ...) -> [NO_FIELDS, ∂x₁, ∂x₂, ...]
 */
export type Propagator = AbstractRule<readonly Differential[]>;

/**
 * The primal result paired with its pushforward (frule) or pullback (rrule)
 */
export type RuleResult = readonly [primal: unknown, propagator: Propagator];

export type RuleImplementation = (args: readonly unknown[], keywords: Keywords) => RuleResult;

/**
 * Keyword-style arguments, passed as the last argument of a lookup.
 * They take no part in rule selection.
 */
export class Keywords {
  constructor(readonly values: Readonly<Record<string, unknown>> = {}) {}

  get size(): number {
    return Object.keys(this.values).length;
  }

  get(name: string): unknown {
    return this.values[name];
  }
}

export function kwargs(values: Record<string, unknown>): Keywords {
  return new Keywords(values);
}

/**
 * A single registered rule
 */
export interface RuleEntry {
  signature: Signature;
  implementation: RuleImplementation;
}

export interface RuleRegistryOptions {
  verbose?: boolean;
  argTypes?: ArgTypeRegistry;
}

function functionName(f: PrimalFunction): string {
  return f.name || '<anonymous>';
}

function splitKeywords(args: readonly unknown[]): { positional: readonly unknown[]; keywords: Keywords } {
  const last = args[args.length - 1];
  if (last instanceof Keywords) {
    return { positional: args.slice(0, -1), keywords: last };
  }
  return { positional: args, keywords: new Keywords() };
}

/**
 * Registry of forward and reverse rules.
 * All definitions happen up front; lookups never mutate the registry.
 */
export class RuleRegistry {
  readonly argTypes: ArgTypeRegistry;
  private readonly verbose: boolean;
  private tables: Record<RuleMode, Map<PrimalFunction, RuleEntry[]>> = {
    frule: new Map(),
    rrule: new Map()
  };

  constructor(options: RuleRegistryOptions = {}) {
    const {
      verbose = false,
      argTypes = new ArgTypeRegistry()
    } = options;

    this.verbose = verbose;
    this.argTypes = argTypes;
  }

  /**
   * Register a rule. Redefining an identical signature replaces the old rule.
   */
  define(
    mode: RuleMode,
    f: PrimalFunction,
    argTypes: readonly ArgTypeSpec[],
    implementation: RuleImplementation
  ): Signature {
    const signature = argTypes.map(spec => this.argTypes.resolve(spec));
    const label = `${functionName(f)}(${formatSignature(signature)})`;

    const entries = this.tables[mode].get(f) ?? [];
    const existing = entries.findIndex(e => signaturesEqual(e.signature, signature));

    if (existing >= 0) {
      entries[existing] = { signature, implementation };
      if (this.verbose) {
        console.log(`[rules] Replaced ${mode} for ${label}`);
      }
    } else {
      entries.push({ signature, implementation });
      if (this.verbose) {
        console.log(`[rules] Defined ${mode} for ${label}`);
      }
    }

    this.tables[mode].set(f, entries);
    return signature;
  }

  defineFrule(f: PrimalFunction, argTypes: readonly ArgTypeSpec[], implementation: RuleImplementation): Signature {
    return this.define('frule', f, argTypes, implementation);
  }

  defineRrule(f: PrimalFunction, argTypes: readonly ArgTypeSpec[], implementation: RuleImplementation): Signature {
    return this.define('rrule', f, argTypes, implementation);
  }

  /**
   * Find the most specific rule accepting `args`.
   * Throws AmbiguousRuleError when several are equally specific.
   */
  lookup(mode: RuleMode, f: PrimalFunction, args: readonly unknown[]): RuleEntry | undefined {
    const entries = this.tables[mode].get(f);
    if (!entries) return undefined;

    const matching = entries.filter(e => signatureMatches(e.signature, args));
    if (matching.length === 0) return undefined;

    const best = matching.filter(
      e => !matching.some(other => isMoreSpecific(other.signature, e.signature))
    );

    if (best.length > 1) {
      const name = functionName(f);
      throw new AmbiguousRuleError(
        mode,
        name,
        best.map(e => `${name}(${formatSignature(e.signature)})`)
      );
    }

    return best[0];
  }

  /**
   * Forward rule: `[f(...args), pushforward]`, or undefined when no rule applies
   */
  frule(f: PrimalFunction, ...args: unknown[]): RuleResult | undefined {
    return this.invoke('frule', f, args);
  }

  /**
   * Reverse rule: `[f(...args), pullback]`, or undefined when no rule applies
   */
  rrule(f: PrimalFunction, ...args: unknown[]): RuleResult | undefined {
    return this.invoke('rrule', f, args);
  }

  /**
   * Signatures registered for `f`, formatted like `cool(number)`
   */
  methods(mode: RuleMode, f: PrimalFunction): string[] {
    const entries = this.tables[mode].get(f) ?? [];
    return entries.map(e => `${functionName(f)}(${formatSignature(e.signature)})`);
  }

  /**
   * Whether a rule is registered for `f`, optionally with exactly `argTypes`
   */
  hasRule(mode: RuleMode, f: PrimalFunction, argTypes?: readonly ArgTypeSpec[]): boolean {
    const entries = this.tables[mode].get(f) ?? [];
    if (argTypes === undefined) return entries.length > 0;

    const signature = argTypes.map(spec => this.argTypes.resolve(spec));
    return entries.some(e => signaturesEqual(e.signature, signature));
  }

  private invoke(mode: RuleMode, f: PrimalFunction, args: readonly unknown[]): RuleResult | undefined {
    const { positional, keywords } = splitKeywords(args);
    const entry = this.lookup(mode, f, positional);

    if (!entry) {
      if (this.verbose) {
        console.log(`[rules] No ${mode} for ${functionName(f)} with ${positional.length} argument(s)`);
      }
      return undefined;
    }

    return entry.implementation(positional, keywords);
  }
}

/**
 * Registry behind the module-level frule/rrule/scalarRule
 */
export const defaultRuleRegistry = new RuleRegistry();

export function frule(f: PrimalFunction, ...args: unknown[]): RuleResult | undefined {
  return defaultRuleRegistry.frule(f, ...args);
}

export function rrule(f: PrimalFunction, ...args: unknown[]): RuleResult | undefined {
  return defaultRuleRegistry.rrule(f, ...args);
}
