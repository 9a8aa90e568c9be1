/**
 * @file Normalization Type Definitions
 *
 * A declaration's payload arrives as a closed tagged union so that the
 * normalizer never inspects runtime types itself. `declarationInput_from`
 * builds it from plain values.
 *
 * @module dag/normalize
 */

import type { NodeKey, NodeTree, Reference } from '../nodes/types.js';
import type { Placeholder } from './placeholder.js';

// ─── Declaration Input ──────────────────────────────────────────

export interface ScalarInput {
    kind: 'scalar';
    value: Reference;
}

export interface SequenceInput {
    kind: 'sequence';
    items: DeclarationInput[];
}

export interface MappingInput {
    kind: 'mapping';
    entries: Array<[NodeKey, DeclarationInput]>;
}

/**
 * One declaration's payload: a reference, an ordered collection of
 * payloads, or explicit keys mapped to payloads, nested arbitrarily.
 */
export type DeclarationInput = ScalarInput | SequenceInput | MappingInput;

// ─── Keyed Declarations ─────────────────────────────────────────

/**
 * A top-level key before merging: explicit, or an anonymous slot.
 */
export type DeclarationKey = NodeKey | Placeholder;

/**
 * The normalized form of one declaration.
 */
export type KeyedDeclaration = Map<DeclarationKey, NodeTree<Reference>>;
