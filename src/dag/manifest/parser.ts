/**
 * @file Task Manifest Parser
 *
 * Parses a YAML task manifest into task definitions ready for
 * collection. The manifest's own path becomes the defining path of every
 * task in it, so relative references resolve next to the manifest.
 *
 * The YAML is validated against `ManifestSchema` (Zod) at the boundary
 * before any field access.
 *
 * @module dag/manifest
 */

import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import type { Marker, TaskFunction } from '../markers/types.js';
import type { TaskDefinition } from '../collect/session.js';
import { marker_attach } from '../markers/markers.js';
import { ManifestError, errorMessage_get } from '../errors.js';
import { ManifestSchema, FullMarkerSchema, type RawMarker, type RawTask } from './schemas.js';
import { SettingsService } from '../../config/settings.js';

/**
 * Task bodies available to manifests, by handler name.
 */
export type HandlerRegistry = Readonly<Record<string, TaskFunction>>;

/**
 * Parse a manifest YAML string into task definitions.
 *
 * @param yamlStr - Raw YAML string
 * @param manifestPath - Path of the manifest; the defining path of its tasks
 * @param handlers - Task bodies by name
 * @throws ManifestError on YAML syntax errors, schema violations and unknown handlers
 */
export function manifest_parse(yamlStr: string, manifestPath: string, handlers: HandlerRegistry): TaskDefinition[] {
    let raw: unknown;
    try {
        raw = yaml.load(yamlStr);
    } catch (e: unknown) {
        throw new ManifestError([errorMessage_get(e)]);
    }

    // ── Boundary: validate the full document before touching any fields ──────
    const result = ManifestSchema.safeParse(raw ?? {});
    if (!result.success) {
        throw new ManifestError(result.error.issues.map((i) => `[${i.path.join('.')}] ${i.message}`));
    }

    const unknownHandlers: string[] = result.data.tasks
        .map((task: RawTask, index: number): string | null =>
            Object.hasOwn(handlers, task.handler) ? null : `[tasks.${index}.handler] unknown handler '${task.handler}'`,
        )
        .filter((issue: string | null): issue is string => issue !== null);
    if (unknownHandlers.length > 0) {
        throw new ManifestError(unknownHandlers);
    }

    return result.data.tasks.map(
        (task: RawTask): TaskDefinition => ({
            path: manifestPath,
            name: task.name,
            fn: taskFunction_build(task, handlers[task.handler]),
        }),
    );
}

/**
 * Read and parse a manifest file. Relative paths are taken from the
 * configured project root.
 */
export function manifest_load(
    manifestPath: string,
    handlers: HandlerRegistry,
    settings: SettingsService = SettingsService.instance_get(),
): TaskDefinition[] {
    const absolutePath: string = path.resolve(settings.root_resolve(), manifestPath);
    const yamlStr: string = fs.readFileSync(absolutePath, 'utf-8');
    return manifest_parse(yamlStr, absolutePath, handlers);
}

/**
 * Wrap the handler in a fresh function carrying this task's markers.
 * The wrapper points at the handler, which is what the collected task
 * stores as its body.
 */
function taskFunction_build(task: RawTask, handler: TaskFunction): TaskFunction {
    const fn: TaskFunction = (kwargs: Record<string, unknown>): void | Promise<void> => handler(kwargs);
    fn.__wrapped__ = handler;
    fn.taskMeta = { markers: [], kwargs: { ...task.kwargs } };

    for (const rawMarker of task.markers) {
        const marker: Marker = marker_expand(rawMarker);
        marker_attach(fn, marker.name, marker.args, marker.kwargs);
    }
    return fn;
}

function marker_expand(raw: RawMarker): Marker {
    const full = FullMarkerSchema.safeParse(raw);
    if (full.success) {
        return full.data;
    }
    const [name, objects] = Object.entries(raw)[0];
    return { name, args: [objects], kwargs: {} };
}
