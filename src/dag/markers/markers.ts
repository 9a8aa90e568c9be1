/**
 * @file Markers
 *
 * Attaches annotations to task bodies, strips them off again, and parses
 * dependency/product declarations.
 *
 * The declaration functions `depends_on` and `produces` do nothing but
 * return their argument. They exist to give every declaration a fixed
 * signature `(objects)`: `declaration_parse` checks a marker's arguments
 * against that signature and reports mismatches under the declaration's
 * own name.
 *
 * @module dag/markers
 */

import type { Marker, TaskFunction, TaskMeta } from './types.js';
import { DeclarationSignatureError } from '../errors.js';

// ─── Declaration Functions ──────────────────────────────────────

export type DeclarationFunction = <T>(objects: T) => T;

/**
 * Specify dependencies for a task. Any reference some collector can
 * turn into a node, or any nesting of sequences and mappings of them.
 */
export function depends_on<T>(objects: T): T {
    return objects;
}

/**
 * Specify products for a task. Same shape as `depends_on`.
 */
export function produces<T>(objects: T): T {
    return objects;
}

const DECLARATION_PARAMETER = 'objects' as const;

/**
 * Check a marker's arguments against the declaration signature and
 * return the single `objects` argument.
 *
 * @throws DeclarationSignatureError naming the declaration on any mismatch
 */
export function declaration_parse(parser: DeclarationFunction, marker: Marker): unknown {
    const name: string = parser.name;

    for (const key of Object.keys(marker.kwargs)) {
        if (key !== DECLARATION_PARAMETER) {
            throw new DeclarationSignatureError(name, `got an unexpected keyword argument '${key}'`);
        }
    }

    const positional: number = marker.args.length;
    const hasKeyword: boolean = Object.hasOwn(marker.kwargs, DECLARATION_PARAMETER);

    if (positional > 1) {
        throw new DeclarationSignatureError(name, `takes 1 positional argument but ${positional} were given`);
    }
    if (positional === 1 && hasKeyword) {
        throw new DeclarationSignatureError(name, `got multiple values for argument '${DECLARATION_PARAMETER}'`);
    }
    if (positional === 0 && !hasKeyword) {
        throw new DeclarationSignatureError(name, `missing 1 required argument: '${DECLARATION_PARAMETER}'`);
    }

    return parser(positional === 1 ? marker.args[0] : marker.kwargs[DECLARATION_PARAMETER]);
}

// ─── Marker Store ───────────────────────────────────────────────

/**
 * Attach a marker to a task body, creating its metadata on first use.
 *
 * @returns The same function, for chaining
 */
export function marker_attach(
    fn: TaskFunction,
    name: string,
    args: unknown[] = [],
    kwargs: Record<string, unknown> = {},
): TaskFunction {
    const meta: TaskMeta = taskMeta_ensure(fn);
    meta.markers.push({ name, args, kwargs });
    return fn;
}

/**
 * Strip all markers with the given name from a task body.
 *
 * The body itself is left untouched. The stripped function is a wrapper
 * around it carrying the remaining markers, so collecting the same
 * definition twice sees the same declarations.
 *
 * @returns The stripped function, and the removed markers in the order
 *          they were attached
 */
export function markers_remove(fn: TaskFunction, name: string): { fn: TaskFunction; markers: Marker[] } {
    const meta: TaskMeta | undefined = fn.taskMeta;
    if (!meta) {
        return { fn, markers: [] };
    }
    const selected: Marker[] = meta.markers.filter((m: Marker): boolean => m.name === name);
    const stripped: TaskFunction = (kwargs: Record<string, unknown>): void | Promise<void> => fn(kwargs);
    stripped.__wrapped__ = fn;
    stripped.taskMeta = {
        markers: meta.markers.filter((m: Marker): boolean => m.name !== name),
        kwargs: { ...meta.kwargs },
    };
    return { fn: stripped, markers: selected };
}

/**
 * Extract the declarations of one kind from a task body.
 *
 * Each removed marker is run through the declaration function as a
 * signature check, so a malformed declaration fails with the error a
 * user would see when writing it.
 *
 * @returns The body stripped of those declarations, and the parsed
 *          declaration payloads
 */
export function nodeDeclarations_extract(
    fn: TaskFunction,
    parser: DeclarationFunction,
): { fn: TaskFunction; declarations: unknown[] } {
    const removed = markers_remove(fn, parser.name);
    return {
        fn: removed.fn,
        declarations: removed.markers.map((marker: Marker): unknown => declaration_parse(parser, marker)),
    };
}

/**
 * Follow the `__wrapped__` chain down to the innermost task body.
 */
export function function_unwrap(fn: TaskFunction): TaskFunction {
    const seen = new Set<TaskFunction>([fn]);
    let current: TaskFunction = fn;
    while (current.__wrapped__) {
        current = current.__wrapped__;
        if (seen.has(current)) {
            throw new Error(`Wrapper loop when unwrapping task function '${fn.name}'`);
        }
        seen.add(current);
    }
    return current;
}

function taskMeta_ensure(fn: TaskFunction): TaskMeta {
    if (!fn.taskMeta) {
        fn.taskMeta = { markers: [], kwargs: {} };
    }
    return fn.taskMeta;
}
