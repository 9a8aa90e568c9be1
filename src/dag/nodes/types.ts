/**
 * @file Node Type Definitions
 *
 * Core types for the node model: every addressable entity in the task
 * graph is a node, either a task or a resource. Tasks hold their resolved
 * dependencies and products as node trees keyed by reference key.
 *
 * Design principle: nodes are identified by object identity. The graph
 * layer deduplicates edges by identity, never by value equality, so the
 * collection layer guarantees one node object per resource.
 *
 * @module dag/nodes
 */

import type { Marker, TaskFunction } from '../markers/types.js';

// ─── References and Keys ────────────────────────────────────────

/**
 * A raw, not-yet-resolved value naming a dependency or product.
 */
export type Reference = string | number | boolean | null;

/**
 * A key in a finished dependency or product mapping: either an explicit
 * name or an auto-assigned ordinal. `'1'` and `1` are different keys.
 */
export type NodeKey = string | number;

/**
 * Insertion-ordered nested mapping of keys to leaves.
 *
 * A task with a single bare declaration exposes the leaf itself, which
 * is why `dependsOn` and `produces` are trees rather than plain maps.
 */
export type NodeTree<T> = T | NodeTreeMap<T>;

export type NodeTreeMap<T> = Map<NodeKey, NodeTree<T>>;

// ─── Node ───────────────────────────────────────────────────────

/**
 * A node in the task graph.
 *
 * @property name - Globally unique identifier
 * @property path - Absolute location of the node
 */
export interface MetaNode {
    readonly name: string;
    readonly path: string;

    /**
     * Fingerprint of the node's current content. Two equal fingerprints
     * mean no visible change happened between the observations, limited
     * by the filesystem's time resolution.
     *
     * @throws NodeNotFoundError if the underlying resource is absent
     */
    state(): string;
}

// ─── Task ───────────────────────────────────────────────────────

/**
 * Lifecycle of a task. The only transitions are
 * collected → executing → succeeded | failed.
 */
export type TaskLifecycle = 'collected' | 'executing' | 'succeeded' | 'failed';

/**
 * One captured report section: when it was captured (e.g. 'call'),
 * what it holds (e.g. 'stdout') and its content.
 */
export type ReportSection = readonly [when: string, key: string, content: string];

/**
 * A task node.
 *
 * @property baseName - The declared short name
 * @property name - `<posix path>::<baseName>`, unique across the run
 * @property shortName - Display name; equals `name` until a display layer shortens it
 * @property function - The innermost task body
 * @property dependsOn - Resolved dependencies
 * @property produces - Resolved products
 * @property markers - Annotations other than dependency/product declarations
 * @property kwargs - Values bound to the body when it runs
 * @property attributes - Free-form storage for surrounding layers
 */
export interface MetaTask extends MetaNode {
    readonly baseName: string;
    readonly shortName: string;
    readonly function: TaskFunction;
    readonly dependsOn: NodeTree<MetaNode>;
    readonly produces: NodeTree<MetaNode>;
    readonly markers: readonly Marker[];
    readonly kwargs: Readonly<Record<string, unknown>>;
    readonly attributes: Record<string, unknown>;
    readonly lifecycle: TaskLifecycle;
    readonly reportSections: readonly ReportSection[];

    execute(extraKwargs?: Record<string, unknown>): Promise<void>;
    reportSection_add(when: string, key: string, content: string): void;
}
