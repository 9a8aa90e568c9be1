/**
 * @file Naming Helpers
 *
 * @module dag/nodes
 */

import path from 'path';

/**
 * Convert a platform path to forward-slash form.
 */
export function path_toPosix(p: string): string {
    return p.split(path.sep).join(path.posix.sep);
}

/**
 * Create the name of a task from the path of its defining file and its
 * base name.
 *
 * @example
 * taskName_create('module.ts', 'task_dummy'); // 'module.ts::task_dummy'
 */
export function taskName_create(definingPath: string, baseName: string): string {
    return `${path_toPosix(definingPath)}::${baseName}`;
}

/**
 * Find entries that occur more than once.
 *
 * @example
 * duplicates_find(['a', 'b', 'a']); // Set { 'a' }
 */
export function duplicates_find<T>(items: Iterable<T>): Set<T> {
    const seen = new Set<T>();
    const duplicates = new Set<T>();

    for (const item of items) {
        if (seen.has(item)) {
            duplicates.add(item);
        }
        seen.add(item);
    }

    return duplicates;
}
