/**
 * @file Node Trees
 *
 * Shape-preserving traversal over nested dependency/product mappings.
 *
 * @module dag/nodes
 */

import type { NodeTree, NodeTreeMap } from './types.js';

/** Whether a tree value is an inner mapping rather than a leaf. */
export function tree_isMap<T>(tree: NodeTree<T>): tree is NodeTreeMap<T> {
    return tree instanceof Map;
}

/**
 * Apply `fn` to every leaf, keeping keys, nesting and insertion order.
 */
export function tree_map<T, U>(tree: NodeTree<T>, fn: (leaf: T) => U): NodeTree<U> {
    if (!tree_isMap(tree)) {
        return fn(tree);
    }
    const out: NodeTreeMap<U> = new Map();
    for (const [key, value] of tree) {
        out.set(key, tree_map(value, fn));
    }
    return out;
}

/**
 * List the leaves of a tree in insertion order, depth first.
 */
export function tree_leaves<T>(tree: NodeTree<T>): T[] {
    if (!tree_isMap(tree)) {
        return [tree];
    }
    const leaves: T[] = [];
    for (const value of tree.values()) {
        leaves.push(...tree_leaves(value));
    }
    return leaves;
}
