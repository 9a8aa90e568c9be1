/**
 * @file Function Task
 *
 * A task whose body is a function. Built once from its definition; after
 * that only the lifecycle and the report sections change.
 *
 * @module dag/nodes
 */

import fs from 'fs';
import type {
    MetaNode,
    MetaTask,
    NodeTree,
    ReportSection,
    TaskLifecycle,
} from './types.js';
import type { Marker, TaskFunction } from '../markers/types.js';
import type { CollectionContext } from '../collect/types.js';
import { taskName_create } from './naming.js';
import {
    depends_on,
    produces,
    function_unwrap,
    nodeDeclarations_extract,
} from '../markers/markers.js';
import { declarations_convert } from '../normalize/merger.js';
import { nodes_collect } from '../collect/resolver.js';
import { NodeNotFoundError, TaskStateError } from '../errors.js';

/** Allowed lifecycle transitions. */
const TRANSITIONS: Record<TaskLifecycle, readonly TaskLifecycle[]> = {
    collected: ['executing'],
    executing: ['succeeded', 'failed'],
    succeeded: [],
    failed: [],
};

export interface FunctionTaskInit {
    baseName: string;
    name: string;
    path: string;
    function: TaskFunction;
    dependsOn?: NodeTree<MetaNode>;
    produces?: NodeTree<MetaNode>;
    markers?: Marker[];
    kwargs?: Record<string, unknown>;
    shortName?: string;
}

export class FunctionTask implements MetaTask {
    readonly baseName: string;
    readonly name: string;
    readonly shortName: string;
    readonly path: string;
    readonly function: TaskFunction;
    readonly dependsOn: NodeTree<MetaNode>;
    readonly produces: NodeTree<MetaNode>;
    readonly markers: readonly Marker[];
    readonly kwargs: Readonly<Record<string, unknown>>;
    readonly attributes: Record<string, unknown> = {};

    private currentState: TaskLifecycle = 'collected';
    private readonly sections: ReportSection[] = [];

    constructor(init: FunctionTaskInit) {
        this.baseName = init.baseName;
        this.name = init.name;
        this.shortName = init.shortName ?? init.name;
        this.path = init.path;
        this.function = init.function;
        this.dependsOn = init.dependsOn ?? new Map();
        this.produces = init.produces ?? new Map();
        this.markers = init.markers ?? [];
        this.kwargs = init.kwargs ?? {};
    }

    /**
     * Build a task from its definition.
     *
     * Dependency and product declarations are stripped from the body's
     * markers, normalized, merged and collected into nodes. The stored
     * function is the innermost body, so every layer of wrapping observes
     * the same function.
     *
     * @param path - Path of the defining file
     * @param baseName - Declared name of the task
     * @param fn - The (possibly wrapped) task body
     * @param context - The active collection context
     */
    static task_fromDefinition(
        path: string,
        baseName: string,
        fn: TaskFunction,
        context: CollectionContext,
    ): FunctionTask {
        const dependencyDeclarations = nodeDeclarations_extract(fn, depends_on);
        const dependencies: NodeTree<MetaNode> = nodes_collect(
            context,
            path,
            baseName,
            declarations_convert(dependencyDeclarations.declarations, 'depends_on'),
        );

        const productDeclarations = nodeDeclarations_extract(dependencyDeclarations.fn, produces);
        const products: NodeTree<MetaNode> = nodes_collect(
            context,
            path,
            baseName,
            declarations_convert(productDeclarations.declarations, 'produces'),
        );

        const remaining: TaskFunction = productDeclarations.fn;
        const markers: Marker[] = remaining.taskMeta ? [...remaining.taskMeta.markers] : [];
        const kwargs: Record<string, unknown> = remaining.taskMeta ? { ...remaining.taskMeta.kwargs } : {};

        return new FunctionTask({
            baseName,
            name: taskName_create(path, baseName),
            path,
            function: function_unwrap(fn),
            dependsOn: dependencies,
            produces: products,
            markers,
            kwargs,
        });
    }

    get lifecycle(): TaskLifecycle {
        return this.currentState;
    }

    get reportSections(): readonly ReportSection[] {
        return this.sections;
    }

    /**
     * Run the task body with its kwargs, overridden by `extraKwargs`.
     * A task runs at most once.
     *
     * @throws TaskStateError if the task already ran
     */
    async execute(extraKwargs: Record<string, unknown> = {}): Promise<void> {
        this.lifecycle_transition('executing');
        try {
            await this.function({ ...this.kwargs, ...extraKwargs });
        } catch (error: unknown) {
            this.lifecycle_transition('failed');
            throw error;
        }
        this.lifecycle_transition('succeeded');
    }

    /**
     * Return the last modification time of the defining file.
     *
     * @throws NodeNotFoundError if the file does not exist
     */
    state(): string {
        if (!fs.existsSync(this.path)) {
            throw new NodeNotFoundError(this.path);
        }
        return String(fs.statSync(this.path).mtimeMs);
    }

    /**
     * Add a section shown in the report, like captured stdout or stderr.
     * Empty content is dropped.
     *
     * @throws TaskStateError before the task started executing
     */
    reportSection_add(when: string, key: string, content: string): void {
        if (this.currentState === 'collected') {
            throw new TaskStateError(this.name, this.currentState, 'report');
        }
        if (content) {
            this.sections.push([when, key, content]);
        }
    }

    private lifecycle_transition(next: TaskLifecycle): void {
        if (!TRANSITIONS[this.currentState].includes(next)) {
            throw new TaskStateError(this.name, this.currentState, next);
        }
        this.currentState = next;
    }
}
