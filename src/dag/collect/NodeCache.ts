/**
 * @file Node Identity Cache
 *
 * Guarantees that one absolute path maps to exactly one `FilePathNode`
 * for the lifetime of a run, whichever task references it. The graph
 * layer deduplicates edges by node identity, so two tasks depending on
 * the same file must see the same object.
 *
 * The cache is owned by the collection context and reset at the start
 * of every run. Keys are normalized absolute paths without a trailing
 * separator, so `/p/out` and `/p/out/` are one node.
 * `node_getOrCreate` checks and inserts in one synchronous
 * step with no await in between.
 *
 * @module dag/collect
 */

import path from 'path';
import { FilePathNode } from '../nodes/FilePathNode.js';
import { InvalidReferenceError } from '../errors.js';

export class NodeCache {
    private readonly nodes: Map<string, FilePathNode> = new Map();

    /**
     * Return the node for an absolute path, creating it on first request.
     *
     * @throws InvalidReferenceError if the path is relative
     */
    node_getOrCreate(absolutePath: string): FilePathNode {
        const key: string = this.key_normalize(absolutePath);
        const existing: FilePathNode | undefined = this.nodes.get(key);
        if (existing) {
            return existing;
        }
        const node: FilePathNode = FilePathNode.node_fromPath(key);
        this.nodes.set(key, node);
        return node;
    }

    /**
     * Return the node for an absolute path without creating it.
     */
    node_get(absolutePath: string): FilePathNode | undefined {
        return this.nodes.get(this.key_normalize(absolutePath));
    }

    get size(): number {
        return this.nodes.size;
    }

    /** Forget every node. Called at run start. */
    reset(): void {
        this.nodes.clear();
    }

    private key_normalize(p: string): string {
        if (!path.isAbsolute(p)) {
            throw new InvalidReferenceError(p, `Node paths must be absolute, got '${p}'.`);
        }
        let key: string = path.normalize(p);
        const root: string = path.parse(key).root;
        while (key !== root && key.endsWith(path.sep)) {
            key = key.slice(0, -1);
        }
        return key;
    }
}
