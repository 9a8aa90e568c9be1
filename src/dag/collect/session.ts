/**
 * @file Collection Session
 *
 * Drives collection for one run: resets node identity, builds every task
 * definition and reports per-task outcomes on the bus.
 *
 * Each task is all-or-nothing. A failure is recorded against its task,
 * which is left out of the result; the remaining tasks are unaffected.
 *
 * @module dag/collect
 */

import type { MetaNode } from '../nodes/types.js';
import type { TaskFunction } from '../markers/types.js';
import type { CollectionContext, NodeCollector } from './types.js';
import { NodeCache } from './NodeCache.js';
import { collectors_default } from './collectors.js';
import { FunctionTask } from '../nodes/FunctionTask.js';
import { taskName_create } from '../nodes/naming.js';
import { tree_leaves } from '../nodes/tree.js';
import { CollectionBus, type CollectionEvent } from '../../telemetry/CollectionBus.js';
import {
    DuplicateTaskNameError,
    TaskNodeError,
    errorMessage_get,
    type NodeKind,
} from '../errors.js';

/**
 * A task as found in a task file, before collection.
 *
 * @property path - Path of the defining file
 * @property name - Base name of the task
 * @property fn - The task body with its markers
 */
export interface TaskDefinition {
    path: string;
    name: string;
    fn: TaskFunction;
}

export interface CollectionFailure {
    path: string;
    name: string;
    error: Error;
}

/**
 * @property tasks - Tasks collected in full
 * @property failures - One record per task that failed to collect
 * @property observerErrors - Errors thrown by bus observers; they never
 *           affect which tasks are collected
 */
export interface CollectionReport {
    tasks: FunctionTask[];
    failures: CollectionFailure[];
    observerErrors: Error[];
}

export interface CollectionSessionOptions {
    collectors?: NodeCollector[];
    bus?: CollectionBus;
}

export class CollectionSession implements CollectionContext {
    readonly nodeCache: NodeCache = new NodeCache();
    readonly collectors: readonly NodeCollector[];
    readonly bus: CollectionBus;

    constructor(options: CollectionSessionOptions = {}) {
        this.collectors = options.collectors ?? collectors_default();
        this.bus = options.bus ?? new CollectionBus();
    }

    /**
     * Collect a run's task definitions.
     *
     * Node identity is reset first, so nodes never leak between runs.
     * A definition whose task name was already taken fails with
     * `DuplicateTaskNameError`. Announcing happens only after a task
     * is in the report; errors thrown by bus observers are collected in
     * `observerErrors` and never fail a task or end the run.
     */
    tasks_collect(definitions: TaskDefinition[]): CollectionReport {
        this.nodeCache.reset();
        const report: CollectionReport = { tasks: [], failures: [], observerErrors: [] };
        const seenNames = new Set<string>();
        this.event_publish(report, { type: 'run_started', definitions: definitions.length });

        for (const definition of definitions) {
            const task: FunctionTask | null = this.task_build(report, definition, seenNames);
            if (task === null) {
                continue;
            }
            seenNames.add(task.name);
            report.tasks.push(task);
            this.task_announce(report, task);
        }

        this.event_publish(report, {
            type: 'run_finished',
            collected: report.tasks.length,
            failed: report.failures.length,
        });
        return report;
    }

    /**
     * Build one task, or record its failure and return null.
     */
    private task_build(
        report: CollectionReport,
        definition: TaskDefinition,
        seenNames: ReadonlySet<string>,
    ): FunctionTask | null {
        try {
            const taskName: string = taskName_create(definition.path, definition.name);
            if (seenNames.has(taskName)) {
                throw new DuplicateTaskNameError(taskName);
            }
            return FunctionTask.task_fromDefinition(definition.path, definition.name, definition.fn, this);
        } catch (e: unknown) {
            const error: Error = e instanceof Error ? e : new Error(errorMessage_get(e));
            report.failures.push({ path: definition.path, name: definition.name, error });
            this.event_publish(report, {
                type: 'task_failed',
                name: definition.name,
                path: definition.path,
                code: error instanceof TaskNodeError ? error.code : 'UNEXPECTED',
                message: error.message,
            });
            return null;
        }
    }

    private event_publish(report: CollectionReport, event: CollectionEvent): void {
        report.observerErrors.push(...this.bus.emit(event));
    }

    private task_announce(report: CollectionReport, task: FunctionTask): void {
        const dependencies: MetaNode[] = tree_leaves(task.dependsOn);
        const products: MetaNode[] = tree_leaves(task.produces);
        this.nodes_announce(report, task.name, 'depends_on', dependencies);
        this.nodes_announce(report, task.name, 'produces', products);
        this.event_publish(report, {
            type: 'task_collected',
            name: task.name,
            dependencies: dependencies.length,
            products: products.length,
        });
    }

    private nodes_announce(report: CollectionReport, taskName: string, kind: NodeKind, nodes: MetaNode[]): void {
        for (const node of nodes) {
            this.event_publish(report, { type: 'node_collected', task: taskName, kind, node: node.name });
        }
    }
}
