// Graph model and traversals
export {
    Graph,
    makeGraph,
    GraphNode,
    GraphEdge,
    ShortestPathTraversal,
    ShortestPathIterator,
    findShortestPath,
    distancesFrom,
    breadthFirst,
    depthFirst,
    isConnectedFrom,
} from './graph';

export type { NodeId, PathStep, ShortestPath } from './graph';

// Configuration
export { resolveGraphOptions, graphOptionsSchema, weightSchema, validateWeight } from './lib/config';
export type { GraphOptions, ResolvedGraphOptions, KeyComparator } from './lib/config';

// Logging
export { consoleLogger, noopLogger, createFilteredLogger, withContext, LOG_LEVELS } from './lib/logger';
export type { Logger, LogLevel } from './lib/logger';

// Error types
export {
    GraphError,
    DuplicateKeyError,
    UnknownNodeError,
    InvalidWeightError,
    DuplicateEdgeError,
    MissingEdgeError,
    GraphDisposedError,
    StructureError,
    InvalidOptionsError,
} from './lib/errors';
export type { OptionIssue } from './lib/errors';
