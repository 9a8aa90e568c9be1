/**
 * @file Declaration Parsing
 *
 * Converts the plain values written in a declaration into the
 * `DeclarationInput` union.
 *
 * - string, number, boolean, null → scalar
 * - Array, Set → sequence (iteration order)
 * - Map with string/number keys, plain object → mapping
 *
 * Object property names are always strings, so a plain object's
 * canonical integer keys (`'0'`, `'12'`) are read back as numbers. `'01'`
 * and `'-1'` stay strings. Map keys are taken as given.
 *
 * @module dag/normalize
 */

import type { NodeKey } from '../nodes/types.js';
import type { DeclarationInput } from './types.js';
import { InvalidDeclarationError } from '../errors.js';

/**
 * Build a `DeclarationInput` from a plain value.
 *
 * @throws InvalidDeclarationError for undefined, functions, symbols,
 *         class instances and maps with non-primitive keys
 */
export function declarationInput_from(value: unknown): DeclarationInput {
    if (
        value === null ||
        typeof value === 'string' ||
        typeof value === 'number' ||
        typeof value === 'boolean'
    ) {
        return { kind: 'scalar', value };
    }

    if (Array.isArray(value) || value instanceof Set) {
        const items: DeclarationInput[] = [];
        for (const item of value) {
            items.push(declarationInput_from(item));
        }
        return { kind: 'sequence', items };
    }

    if (value instanceof Map) {
        const entries: Array<[NodeKey, DeclarationInput]> = [];
        for (const [key, item] of value) {
            if (typeof key !== 'string' && typeof key !== 'number') {
                throw new InvalidDeclarationError(
                    key,
                    `Declaration keys must be strings or numbers, got ${typeof key}.`,
                );
            }
            entries.push([key, declarationInput_from(item)]);
        }
        return { kind: 'mapping', entries };
    }

    if (object_isPlain(value)) {
        return {
            kind: 'mapping',
            entries: Object.entries(value).map(
                ([key, item]): [NodeKey, DeclarationInput] => [objectKey_parse(key), declarationInput_from(item)],
            ),
        };
    }

    throw new InvalidDeclarationError(
        value,
        `Cannot use a value of type ${value === undefined ? 'undefined' : typeof value} as a dependency or product.`,
    );
}

const INTEGER_KEY = /^(0|[1-9]\d*)$/;

function objectKey_parse(key: string): NodeKey {
    return INTEGER_KEY.test(key) && Number.isSafeInteger(Number(key)) ? Number(key) : key;
}

function object_isPlain(value: unknown): value is Record<string, unknown> {
    if (typeof value !== 'object' || value === null) return false;
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}
