/**
 * @file Collection Bus
 *
 * Event bus for collection progress. The collection session emits on it;
 * sinks such as the console presenter subscribe.
 *
 * Typed facade over Node.js EventEmitter.
 *
 * @module telemetry/CollectionBus
 */

import { EventEmitter } from 'events';
import type { NodeKind } from '../dag/errors.js';

export type CollectionEvent =
    | { type: 'run_started'; definitions: number }
    | { type: 'task_collected'; name: string; dependencies: number; products: number }
    | { type: 'node_collected'; task: string; kind: NodeKind; node: string }
    | { type: 'task_failed'; name: string; path: string; code: string; message: string }
    | { type: 'run_finished'; collected: number; failed: number };

export type CollectionObserver = (event: CollectionEvent) => void;

/** Internal event channel. */
const CHANNEL = 'collection' as const;

export class CollectionBus {
    private readonly emitter: EventEmitter;

    constructor() {
        this.emitter = new EventEmitter();
        this.emitter.setMaxListeners(0);
    }

    /**
     * Subscribe to collection events.
     *
     * @returns Unsubscribe function.
     */
    subscribe(observer: CollectionObserver): () => void {
        const listener = (event: CollectionEvent, errors: Error[]): void => {
            try {
                observer(event);
            } catch (e: unknown) {
                errors.push(e instanceof Error ? e : new Error(String(e)));
            }
        };
        this.emitter.on(CHANNEL, listener);
        return () => this.emitter.off(CHANNEL, listener);
    }

    /**
     * Deliver an event to every observer in subscription order.
     *
     * A throwing observer does not stop delivery to the others; its
     * error is handed back to the emitter.
     *
     * @returns Errors thrown by observers, empty when all succeeded.
     */
    emit(event: CollectionEvent): Error[] {
        const errors: Error[] = [];
        this.emitter.emit(CHANNEL, event, errors);
        return errors;
    }
}
