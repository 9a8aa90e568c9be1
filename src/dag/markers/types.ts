/**
 * @file Marker Type Definitions
 *
 * Markers are annotations attached to a task body. Dependency and
 * product declarations are markers named after their declaration
 * function; everything else is opaque to the node model.
 *
 * @module dag/markers
 */

/**
 * One annotation attached to a task body.
 *
 * @property name - Marker name, e.g. 'depends_on', 'produces', 'skip'
 * @property args - Positional arguments as written
 * @property kwargs - Keyword arguments as written
 */
export interface Marker {
    name: string;
    args: unknown[];
    kwargs: Record<string, unknown>;
}

/**
 * Metadata carried by an annotated task body.
 */
export interface TaskMeta {
    markers: Marker[];
    kwargs: Record<string, unknown>;
}

/**
 * A task body. Annotation layers attach `taskMeta`; wrapping layers
 * point at the body they wrap through `__wrapped__`.
 */
export interface TaskFunction {
    (kwargs: Record<string, unknown>): void | Promise<void>;
    taskMeta?: TaskMeta;
    __wrapped__?: TaskFunction;
}
