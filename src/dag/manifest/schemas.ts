/**
 * @file Task Manifest Schemas
 *
 * Zod runtime schemas for YAML task manifests. Each schema covers one
 * section of the document: the top level, each task, and each marker.
 *
 * A marker is written either in full (`{ name, args, kwargs }`) or as a
 * single-key shorthand (`{ depends_on: <objects> }`), which stands for one
 * positional argument. The full form is tried first, so `{ name: lint }`
 * is the marker `lint` without arguments. `name`, `args` and `kwargs`
 * cannot be shorthand marker names; write such markers in full.
 *
 * @module dag/manifest/schemas
 */

import { z } from 'zod';

// ─── Marker ───────────────────────────────────────────────────────────────────

const MarkerNameSchema = z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'marker name must be an identifier');

const FULL_MARKER_FIELDS: readonly string[] = ['name', 'args', 'kwargs'];

export const FullMarkerSchema = z
    .object({
        name:   MarkerNameSchema,
        args:   z.array(z.unknown()).default([]),
        kwargs: z.record(z.string(), z.unknown()).default({}),
    })
    .strict();

export const ShorthandMarkerSchema = z
    .record(z.string(), z.unknown())
    .refine((obj) => Object.keys(obj).length === 1, 'shorthand marker must have exactly one key')
    .refine(
        (obj) => Object.keys(obj).every((key) => MarkerNameSchema.safeParse(key).success),
        'marker name must be an identifier',
    )
    .refine(
        (obj) => Object.keys(obj).every((key) => !FULL_MARKER_FIELDS.includes(key)),
        'shorthand marker name must not be name, args or kwargs',
    );

export const MarkerSchema = z.union([FullMarkerSchema, ShorthandMarkerSchema]);

// ─── Task ─────────────────────────────────────────────────────────────────────

export const TaskSchema = z.object({
    name:    z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'task name must be an identifier'),
    handler: z.string().min(1, 'handler is required'),
    kwargs:  z.record(z.string(), z.unknown()).default({}),
    markers: z.array(MarkerSchema).default([]),
});

// ─── Manifest (full document) ─────────────────────────────────────────────────

export const ManifestSchema = z.object({
    tasks: z.array(TaskSchema).default([]),
});

export type RawManifest = z.infer<typeof ManifestSchema>;
export type RawTask     = z.infer<typeof TaskSchema>;
export type RawMarker   = z.infer<typeof MarkerSchema>;
