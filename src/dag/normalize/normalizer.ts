/**
 * @file Declaration Normalizer
 *
 * Flattens one declaration into a keyed mapping.
 *
 * The top level is special: every top-level reference or collection
 * element gets a fresh placeholder so the merger can number it, while
 * nested collections keep their literal positional indices. Explicit
 * mapping keys pass through at every level.
 *
 * @module dag/normalize
 */

import type { NodeTree, NodeTreeMap, Reference } from '../nodes/types.js';
import type { DeclarationInput, KeyedDeclaration } from './types.js';
import type { PlaceholderFactory } from './placeholder.js';

/**
 * Normalize a declaration at top level.
 *
 * - mapping → each explicit key mapped to its normalized value
 * - sequence → one non-scalar placeholder per element
 * - scalar → a single scalar placeholder mapped to the reference
 */
export function declaration_normalize(input: DeclarationInput, factory: PlaceholderFactory): KeyedDeclaration {
    const out: KeyedDeclaration = new Map();

    switch (input.kind) {
        case 'mapping':
            for (const [key, value] of input.entries) {
                out.set(key, value_normalize(value));
            }
            break;
        case 'sequence':
            for (const item of input.items) {
                out.set(factory.placeholder_create(), value_normalize(item));
            }
            break;
        case 'scalar':
            out.set(factory.placeholder_create(true), input.value);
            break;
    }

    return out;
}

/**
 * Normalize a value below top level. Sequences become mappings keyed by
 * index; references are returned unchanged.
 */
export function value_normalize(input: DeclarationInput): NodeTree<Reference> {
    switch (input.kind) {
        case 'mapping': {
            const out: NodeTreeMap<Reference> = new Map();
            for (const [key, value] of input.entries) {
                out.set(key, value_normalize(value));
            }
            return out;
        }
        case 'sequence': {
            const out: NodeTreeMap<Reference> = new Map();
            input.items.forEach((item: DeclarationInput, index: number): void => {
                out.set(index, value_normalize(item));
            });
            return out;
        }
        case 'scalar':
            return input.value;
    }
}
