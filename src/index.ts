/**
 * @file Public Re-exports
 *
 * @module tasknode
 */

export type {
    Reference,
    NodeKey,
    NodeTree,
    NodeTreeMap,
    MetaNode,
    MetaTask,
    TaskLifecycle,
    ReportSection,
} from './dag/nodes/types.js';
export { FilePathNode } from './dag/nodes/FilePathNode.js';
export { FunctionTask } from './dag/nodes/FunctionTask.js';
export type { FunctionTaskInit } from './dag/nodes/FunctionTask.js';
export { taskName_create, duplicates_find, path_toPosix } from './dag/nodes/naming.js';
export { tree_map, tree_leaves, tree_isMap } from './dag/nodes/tree.js';

export type { Marker, TaskMeta, TaskFunction } from './dag/markers/types.js';
export {
    depends_on,
    produces,
    declaration_parse,
    marker_attach,
    markers_remove,
    nodeDeclarations_extract,
    function_unwrap,
} from './dag/markers/markers.js';
export type { DeclarationFunction } from './dag/markers/markers.js';

export type { DeclarationInput, KeyedDeclaration, DeclarationKey } from './dag/normalize/types.js';
export { Placeholder, PlaceholderFactory } from './dag/normalize/placeholder.js';
export { declarationInput_from } from './dag/normalize/declarations.js';
export { declaration_normalize, value_normalize } from './dag/normalize/normalizer.js';
export {
    dictionaries_union,
    dictionaries_merge,
    nodeNames_check,
    declarations_convert,
} from './dag/normalize/merger.js';

export type { NodeCollector, CollectionContext } from './dag/collect/types.js';
export { NodeCache } from './dag/collect/NodeCache.js';
export { FilePathCollector, collectors_default } from './dag/collect/collectors.js';
export { node_collect, nodes_collect } from './dag/collect/resolver.js';
export { CollectionSession } from './dag/collect/session.js';
export type {
    TaskDefinition,
    CollectionFailure,
    CollectionReport,
    CollectionSessionOptions,
} from './dag/collect/session.js';

export { manifest_parse, manifest_load } from './dag/manifest/parser.js';
export type { HandlerRegistry } from './dag/manifest/parser.js';

export * from './dag/errors.js';

export { SettingsService } from './config/settings.js';
export type { LogLevel, RunSettings, ResolvedRunSettings, SettingSource } from './config/settings.js';
export { CollectionBus } from './telemetry/CollectionBus.js';
export type { CollectionEvent, CollectionObserver } from './telemetry/CollectionBus.js';
export { CollectionPresenter, consoleSink_attach } from './telemetry/presenter.js';
