/**
 * Domain descriptions for primal values
 * Decide whether a Wirtinger derivative collapses to a single value
 */

import { Complex } from './Complex.js';

export type Field = 'real' | 'complex';

/**
 * Represents the domain of a primal value
 */
export type Domain = ScalarDomain | ArrayDomain | OpaqueDomain;

/**
 * Number-like scalar
 */
export interface ScalarDomain {
  kind: 'scalar';
  field: Field;
}

/**
 * Flat array of number-like scalars
 */
export interface ArrayDomain {
  kind: 'array';
  field: Field;
}

/**
 * Anything that is not numeric (strings, objects, ...)
 */
export interface OpaqueDomain {
  kind: 'opaque';
}

function fieldOfElements(values: readonly unknown[]): Field {
  return values.some(v => v instanceof Complex) ? 'complex' : 'real';
}

/**
 * Domain utilities
 */
export const Domains = {
  realScalar(): ScalarDomain {
    return { kind: 'scalar', field: 'real' };
  },

  complexScalar(): ScalarDomain {
    return { kind: 'scalar', field: 'complex' };
  },

  realArray(): ArrayDomain {
    return { kind: 'array', field: 'real' };
  },

  complexArray(): ArrayDomain {
    return { kind: 'array', field: 'complex' };
  },

  opaque(): OpaqueDomain {
    return { kind: 'opaque' };
  },

  /**
   * Domain of a single primal value
   */
  of(value: unknown): Domain {
    if (typeof value === 'number') return Domains.realScalar();
    if (value instanceof Complex) return Domains.complexScalar();
    if (Array.isArray(value) && value.every(v => typeof v === 'number' || v instanceof Complex)) {
      return { kind: 'array', field: fieldOfElements(value) };
    }
    return Domains.opaque();
  },

  /**
   * Promoted domain of all inputs of a call.
   * The kind follows the first input; the field is complex if any input is complex.
   */
  promote(values: readonly unknown[]): Domain {
    if (values.length === 0) return Domains.opaque();

    const first = Domains.of(values[0]);
    if (first.kind === 'opaque') return first;

    const anyComplex = values.some(v => {
      const d = Domains.of(v);
      return d.kind !== 'opaque' && d.field === 'complex';
    });

    return { kind: first.kind, field: anyComplex ? 'complex' : 'real' };
  },

  isReal(domain: Domain): boolean {
    return domain.kind !== 'opaque' && domain.field === 'real';
  },

  equals(a: Domain, b: Domain): boolean {
    if (a.kind === 'opaque' || b.kind === 'opaque') return a.kind === b.kind;
    return a.kind === b.kind && a.field === b.field;
  },

  toString(domain: Domain): string {
    if (domain.kind === 'opaque') return 'opaque';
    return `${domain.field} ${domain.kind}`;
  }
};
