/**
 * @file Collection Type Definitions
 *
 * @module dag/collect
 */

import type { MetaNode, Reference } from '../nodes/types.js';
import type { NodeCache } from './NodeCache.js';

/**
 * Turns a raw reference into a node, or declines it.
 *
 * Collectors are tried in registration order; the first non-null result
 * wins. A collector that produces file-backed nodes must obtain them
 * from `context.nodeCache`.
 */
export interface NodeCollector {
    /**
     * @param context - The active collection context
     * @param path - Path of the file that defines the task
     * @param reference - The raw reference from the declaration
     * @returns The node, or null if this collector does not recognize the reference
     */
    collect_try(context: CollectionContext, path: string, reference: Reference): MetaNode | null;
}

/**
 * Run-scoped state shared by every task collected in one run.
 */
export interface CollectionContext {
    readonly nodeCache: NodeCache;
    readonly collectors: readonly NodeCollector[];
}
