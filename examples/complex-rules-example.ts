/**
 * Example: a Wirtinger rule for |z|², evaluated over real and complex inputs
 */

import {
  Complex,
  NO_FIELDS,
  Scalar,
  RuleScope,
  frule,
  one,
  scalarRule,
  wirtinger,
  wirtingerPartial
} from '../src/index.js';

function abs2(z: Scalar): number {
  return typeof z === 'number' ? z * z : z.abs2();
}

scalarRule({
  f: abs2,
  partials: [
    wirtingerPartial<RuleScope<[z: Scalar], number, undefined>>(({ args: [z] }) =>
      wirtinger(typeof z === 'number' ? z : z.conj(), z)
    )
  ]
});

for (const z of [3, new Complex(1, 2)]) {
  const result = frule(abs2, z);
  if (!result) continue;

  const [y, pushforward] = result;
  const [dy] = pushforward.propagate(NO_FIELDS, one());
  console.log(`abs2(${z.toString()}) = ${String(y)}, d abs2 = ${String(dy)}`);
}
