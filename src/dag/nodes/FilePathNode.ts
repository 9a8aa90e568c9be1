/**
 * @file File Path Node
 *
 * A resource node backed by a file on disk. Its fingerprint is the
 * file's modification time.
 *
 * Do not construct these directly during collection: go through
 * `NodeCache.node_getOrCreate`, which keeps exactly one instance per
 * absolute path for the lifetime of a run.
 *
 * @module dag/nodes
 */

import fs from 'fs';
import path from 'path';
import type { MetaNode } from './types.js';
import { path_toPosix } from './naming.js';
import { InvalidReferenceError, NodeNotFoundError } from '../errors.js';

export class FilePathNode implements MetaNode {
    /**
     * @param name - Posix form of the path, the node's identifier in the DAG
     * @param value - The path as requested inside the task body
     * @param path - Absolute path to the file
     */
    private constructor(
        readonly name: string,
        readonly value: string,
        readonly path: string,
    ) {}

    /**
     * Instantiate a node from an absolute path.
     *
     * @throws InvalidReferenceError if the path is relative
     */
    static node_fromPath(absolutePath: string): FilePathNode {
        if (!path.isAbsolute(absolutePath)) {
            throw new InvalidReferenceError(
                absolutePath,
                `FilePathNode must be instantiated from an absolute path, got '${absolutePath}'.`,
            );
        }
        return new FilePathNode(path_toPosix(absolutePath), absolutePath, absolutePath);
    }

    /**
     * Return the last modification time of the file.
     *
     * @throws NodeNotFoundError if the file does not exist
     */
    state(): string {
        if (!fs.existsSync(this.path)) {
            throw new NodeNotFoundError(this.path);
        }
        return String(fs.statSync(this.path).mtimeMs);
    }
}
