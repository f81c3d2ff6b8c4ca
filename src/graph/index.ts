/**
 * Graph public exports.
 */

export { Graph, makeGraph } from './graph';
export { GraphNode } from './node';
export { GraphEdge } from './edge';
export { ShortestPathTraversal, ShortestPathIterator } from './shortest-path';
export { findShortestPath, distancesFrom } from './paths';
export { breadthFirst, depthFirst, isConnectedFrom } from './traversal';
export type { NodeId, PathStep, ShortestPath } from './types';
