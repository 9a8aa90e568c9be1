/**
 * @file Collection Presenter
 *
 * Formats collection events for the terminal and wires them to a
 * console sink.
 *
 * @module telemetry/presenter
 */

import chalk from 'chalk';
import type { CollectionBus, CollectionEvent } from './CollectionBus.js';
import type { LogLevel } from '../config/settings.js';

export const MARKERS = {
    AFFIRMATIVE: '●',
    INFO: '○',
    ERROR: '>> ERROR:',
    HINT: '»',
};

const LEVEL_RANK: Record<LogLevel, number> = {
    silent: 0,
    info: 1,
    debug: 2,
};

export class CollectionPresenter {
    /**
     * Format one event, or return null if it is below the given level.
     */
    static event_format(event: CollectionEvent, level: LogLevel): string | null {
        const rank: number = LEVEL_RANK[level];
        if (rank === 0) return null;

        switch (event.type) {
            case 'run_started':
                return chalk.white(`${MARKERS.INFO} Collecting ${event.definitions} task definition(s)`);
            case 'task_collected':
                return chalk.cyan(
                    `${MARKERS.AFFIRMATIVE} ${event.name} ` +
                    `(${event.dependencies} dependencies, ${event.products} products)`,
                );
            case 'node_collected':
                if (rank < LEVEL_RANK.debug) return null;
                return chalk.gray(`  ${MARKERS.HINT} ${event.kind} ${event.node}`);
            case 'task_failed':
                return chalk.red(`${MARKERS.ERROR} [${event.code}] ${event.name}: ${event.message}`);
            case 'run_finished':
                return chalk.white(`${MARKERS.INFO} Collected ${event.collected} task(s), ${event.failed} failed`);
        }
    }
}

/**
 * Print bus events through the presenter.
 *
 * @param bus - The bus to observe
 * @param level - Minimum level to print
 * @param write - Line writer, `console.log` by default
 * @returns Unsubscribe function
 */
export function consoleSink_attach(
    bus: CollectionBus,
    level: LogLevel,
    write: (line: string) => void = console.log,
): () => void {
    return bus.subscribe((event: CollectionEvent): void => {
        const line: string | null = CollectionPresenter.event_format(event, level);
        if (line !== null) {
            write(line);
        }
    });
}
