/**
 * @file Declaration Merger
 *
 * Combines the normalized declarations of one kind attached to one task
 * into a single tree, numbering anonymous slots.
 *
 * The merge is shallow: only top-level keys, which are explicit names or
 * placeholders, take part. Placeholders are replaced by the smallest
 * non-negative integer that is neither an explicit key nor already
 * assigned. Reordering declarations renumbers their anonymous entries.
 *
 * Two collapse rules shape the result when the union holds exactly one
 * anonymous entry: a bare reference is returned unwrapped, and a lone
 * collection element becomes `{0: value}`. Task bodies rely on receiving
 * exactly this shape.
 *
 * @module dag/normalize
 */

import type { NodeKey, NodeTree, NodeTreeMap, Reference } from '../nodes/types.js';
import type { KeyedDeclaration, DeclarationKey } from './types.js';
import { Placeholder, PlaceholderFactory } from './placeholder.js';
import { declaration_normalize } from './normalizer.js';
import { declarationInput_from } from './declarations.js';
import { duplicates_find } from '../nodes/naming.js';
import { DuplicateNodeNameError, type NodeKind } from '../errors.js';

/**
 * Shallow union of maps; for equal keys the later map wins.
 *
 * @example
 * dictionaries_union([new Map([['a', 0]]), new Map([['a', 1]])]); // Map { 'a' => 1 }
 */
export function dictionaries_union<K, V>(maps: Iterable<Map<K, V>>): Map<K, V> {
    const out = new Map<K, V>();
    for (const map of maps) {
        for (const [key, value] of map) {
            out.set(key, value);
        }
    }
    return out;
}

/**
 * Reject explicit top-level keys that occur in more than one declaration.
 *
 * @throws DuplicateNodeNameError naming every repeated key
 */
export function nodeNames_check(normalized: KeyedDeclaration[], kind: NodeKind): void {
    const names: NodeKey[] = [];
    for (const declaration of normalized) {
        for (const key of declaration.keys()) {
            if (!(key instanceof Placeholder)) {
                names.push(key);
            }
        }
    }

    const duplicated: Set<NodeKey> = duplicates_find(names);
    if (duplicated.size > 0) {
        throw new DuplicateNodeNameError(kind, duplicated);
    }
}

/**
 * Merge normalized declarations, replacing placeholders by integers.
 *
 * @example
 * // two anonymous declarations
 * dictionaries_merge([new Map([[p1, 'a.txt']]), new Map([[p2, 'b.txt']])]);
 * // Map { 0 => 'a.txt', 1 => 'b.txt' }
 */
export function dictionaries_merge(normalized: KeyedDeclaration[]): NodeTree<Reference> {
    const merged: Map<DeclarationKey, NodeTree<Reference>> = dictionaries_union(normalized);

    if (merged.size === 1) {
        for (const [key, value] of merged) {
            if (key instanceof Placeholder) {
                const wrapped: NodeTreeMap<Reference> = new Map([[0, value]]);
                return key.scalar ? value : wrapped;
            }
        }
    }

    const out: NodeTreeMap<Reference> = new Map();
    let counter: number = 0;
    for (const [key, value] of merged) {
        if (key instanceof Placeholder) {
            while (merged.has(counter) || out.has(counter)) {
                counter++;
            }
            out.set(counter, value);
            counter++;
        } else {
            out.set(key, value);
        }
    }
    return out;
}

/**
 * Convert the raw declarations of one kind into a single tree of
 * references: parse, normalize, check names, merge.
 */
export function declarations_convert(declarations: unknown[], kind: NodeKind): NodeTree<Reference> {
    const factory = new PlaceholderFactory();
    const normalized: KeyedDeclaration[] = declarations.map(
        (declaration: unknown): KeyedDeclaration => declaration_normalize(declarationInput_from(declaration), factory),
    );
    nodeNames_check(normalized, kind);
    return dictionaries_merge(normalized);
}
