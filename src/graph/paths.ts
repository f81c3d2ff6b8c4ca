/**
 * Helpers built on the lazy shortest-path traversal.
 */

import type { Graph } from './graph';
import type { GraphNode } from './node';
import { ShortestPathTraversal } from './shortest-path';
import type { ShortestPath } from './types';

/**
 * Shortest path from `source` to `target`, or null when the target cannot
 * be reached. Only pulls steps until the target is settled.
 *
 * @throws UnknownNodeError if either name is not in the graph
 * @throws GraphDisposedError if the graph has been disposed
 */
export function findShortestPath<T>(graph: Graph<T>, source: T, target: T): ShortestPath<T> | null {
    graph.assertLive();
    const goal = graph.getNode(target);
    const predecessors = new Map<GraphNode<T>, GraphNode<T> | undefined>();

    for (const step of new ShortestPathTraversal(graph, source)) {
        predecessors.set(step.node, step.predecessor);
        if (step.node !== goal) continue;

        const path: T[] = [];
        let cur: GraphNode<T> | undefined = goal;
        while (cur) {
            path.push(cur.name);
            cur = predecessors.get(cur);
        }
        path.reverse();
        return { path, distance: step.distance };
    }

    return null;
}

/**
 * Distance to every node reachable from `source`, in settle order.
 */
export function distancesFrom<T>(graph: Graph<T>, source: T): Map<T, number> {
    const distances = new Map<T, number>();
    for (const step of graph.shortestPaths(source)) {
        distances.set(step.node.name, step.distance);
    }
    return distances;
}
