/**
 * @file Merger Property Tests
 *
 * Property-based invariant tests for `declarations_convert`.
 *
 * fast-check generates random mixes of anonymous declarations (bare
 * references and collections) and explicitly keyed declarations, and
 * checks the numbering rules on every one.
 *
 * Invariants under test:
 *   1. Every explicit key maps to its declared reference.
 *   2. Anonymous references keep their order and receive the smallest
 *      integers not used as explicit keys.
 *   3. No entry is lost or invented.
 *   4. The result is the same when computed twice.
 */

import { describe, it } from 'vitest';
import * as fc from 'fast-check';
import { declarations_convert } from './merger.js';
import type { NodeKey, NodeTree, Reference } from '../nodes/types.js';

// ─── Arbitraries ──────────────────────────────────────────────────────────────

const referenceArb = fc.constantFrom('a.txt', 'b.txt', 'c.txt', 'd.txt');

type AnonymousDeclaration = string | string[];

/** A bare reference or a non-empty collection of references. */
const anonymousArb: fc.Arbitrary<AnonymousDeclaration> = fc.oneof(
    referenceArb,
    fc.array(referenceArb, { minLength: 1, maxLength: 3 }),
);

/** Unique explicit keys: small integers and short names mixed. */
const explicitKeysArb = fc.uniqueArray(
    fc.oneof(fc.integer({ min: 0, max: 5 }), fc.constantFrom('x', 'y', 'z')),
    { maxLength: 4 },
);

const scenarioArb = fc.record({
    anonymous: fc.array(anonymousArb, { maxLength: 4 }),
    explicitKeys: explicitKeysArb,
    explicitRefs: fc.array(referenceArb, { minLength: 4, maxLength: 4 }),
    explicitFirst: fc.boolean(),
});

type Scenario = {
    anonymous: AnonymousDeclaration[];
    explicitKeys: NodeKey[];
    explicitRefs: string[];
    explicitFirst: boolean;
};

// ─── Helpers ──────────────────────────────────────────────────────────────────

function declarations_build(s: Scenario): unknown[] {
    const explicit: unknown[] = s.explicitKeys.map(
        (key: NodeKey, i: number): Map<NodeKey, string> => new Map([[key, s.explicitRefs[i]]]),
    );
    return s.explicitFirst ? [...explicit, ...s.anonymous] : [...s.anonymous, ...explicit];
}

function anonymousValues_flatten(anonymous: AnonymousDeclaration[]): string[] {
    return anonymous.flatMap((d: AnonymousDeclaration): string[] => (Array.isArray(d) ? d : [d]));
}

function expectedOrdinals_compute(count: number, explicitKeys: NodeKey[]): number[] {
    const out: number[] = [];
    for (let n = 0; out.length < count; n++) {
        if (!explicitKeys.includes(n)) out.push(n);
    }
    return out;
}

/** Scenarios with at least two entries, where no collapse applies. */
function scenario_isGeneral(s: Scenario): boolean {
    return anonymousValues_flatten(s.anonymous).length + s.explicitKeys.length >= 2;
}

function merged_asMap(tree: NodeTree<Reference>): Map<NodeKey, NodeTree<Reference>> {
    if (!(tree instanceof Map)) {
        throw new Error('expected a mapping');
    }
    return tree;
}

// ─── Properties ──────────────────────────────────────────────────────────────

describe('dag/normalize/merger property invariants', (): void => {
    it('every explicit key maps to its declared reference', (): void => {
        fc.assert(fc.property(scenarioArb, (s): boolean => {
            fc.pre(scenario_isGeneral(s));
            const merged = merged_asMap(declarations_convert(declarations_build(s), 'depends_on'));
            return s.explicitKeys.every((key: NodeKey, i: number): boolean => merged.get(key) === s.explicitRefs[i]);
        }));
    });

    it('anonymous references get the smallest free integers, in order', (): void => {
        fc.assert(fc.property(scenarioArb, (s): boolean => {
            fc.pre(scenario_isGeneral(s));
            const merged = merged_asMap(declarations_convert(declarations_build(s), 'depends_on'));
            const values: string[] = anonymousValues_flatten(s.anonymous);
            const ordinals: number[] = expectedOrdinals_compute(values.length, s.explicitKeys);

            const autoEntries = Array.from(merged.entries()).filter(
                ([key]): boolean => !s.explicitKeys.includes(key),
            );
            return JSON.stringify(autoEntries) === JSON.stringify(ordinals.map((n: number, i: number) => [n, values[i]]));
        }));
    });

    it('no entry is lost or invented', (): void => {
        fc.assert(fc.property(scenarioArb, (s): boolean => {
            fc.pre(scenario_isGeneral(s));
            const merged = merged_asMap(declarations_convert(declarations_build(s), 'depends_on'));
            return merged.size === anonymousValues_flatten(s.anonymous).length + s.explicitKeys.length;
        }));
    });

    it('converting twice gives the same result', (): void => {
        fc.assert(fc.property(scenarioArb, (s): boolean => {
            const first = declarations_convert(declarations_build(s), 'produces');
            const second = declarations_convert(declarations_build(s), 'produces');
            const plain = (t: NodeTree<Reference>): string =>
                JSON.stringify(t instanceof Map ? Array.from(t.entries()) : t);
            return plain(first) === plain(second);
        }));
    });
});
