/**
 * Graph types.
 */

import type { GraphNode } from './node';

/** Dense integer handle of a node within its graph's arena. */
export type NodeId = number;

/**
 * One settled result of a shortest-path traversal. The predecessor is
 * absent only for the traversal's source.
 */
export interface PathStep<T> {
    readonly node: GraphNode<T>;
    readonly distance: number;
    readonly predecessor?: GraphNode<T>;
}

/** Result of a single-pair shortest path lookup */
export interface ShortestPath<T> {
    /** Node names from source to target, inclusive */
    path: T[];
    distance: number;
}
