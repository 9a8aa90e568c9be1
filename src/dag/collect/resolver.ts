/**
 * @file Node Resolver
 *
 * Resolves the references of a merged declaration tree into nodes by
 * asking each registered collector in turn.
 *
 * @module dag/collect
 */

import type { MetaNode, NodeTree, Reference } from '../nodes/types.js';
import type { CollectionContext } from './types.js';
import { tree_map } from '../nodes/tree.js';
import { NodeNotCollectedError } from '../errors.js';

/**
 * Collect one reference.
 *
 * @param context - The active collection context
 * @param path - Path of the file that defines the task
 * @param taskName - Base name of the task, for the error message
 * @param reference - The raw reference
 * @throws NodeNotCollectedError if no collector recognizes the reference
 */
export function node_collect(
    context: CollectionContext,
    path: string,
    taskName: string,
    reference: Reference,
): MetaNode {
    for (const collector of context.collectors) {
        const node: MetaNode | null = collector.collect_try(context, path, reference);
        if (node !== null) {
            return node;
        }
    }
    throw new NodeNotCollectedError(reference, taskName, path);
}

/**
 * Collect every leaf of a merged tree, keeping its shape.
 */
export function nodes_collect(
    context: CollectionContext,
    path: string,
    taskName: string,
    tree: NodeTree<Reference>,
): NodeTree<MetaNode> {
    return tree_map(tree, (reference: Reference): MetaNode => node_collect(context, path, taskName, reference));
}
