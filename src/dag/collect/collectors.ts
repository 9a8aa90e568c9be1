/**
 * @file Built-in Collectors
 *
 * @module dag/collect
 */

import path from 'path';
import type { MetaNode, Reference } from '../nodes/types.js';
import type { CollectionContext, NodeCollector } from './types.js';

/**
 * Collects string references as files.
 *
 * Relative references are taken relative to the directory of the file
 * that defines the task. The joined path must be absolute, which holds
 * whenever the defining path is.
 */
export class FilePathCollector implements NodeCollector {
    collect_try(context: CollectionContext, definingPath: string, reference: Reference): MetaNode | null {
        if (typeof reference !== 'string') {
            return null;
        }
        const target: string = path.isAbsolute(reference)
            ? reference
            : path.join(path.dirname(definingPath), reference);
        return context.nodeCache.node_getOrCreate(target);
    }
}

/**
 * The collectors a run starts with when none are given.
 */
export function collectors_default(): NodeCollector[] {
    return [new FilePathCollector()];
}
