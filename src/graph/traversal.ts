/**
 * Unweighted lazy traversals. Neighbours are visited in edge creation order.
 */

import type { Graph } from './graph';
import type { GraphNode } from './node';
import type { NodeId } from './types';

function neighbours<T>(graph: Graph<T>, node: GraphNode<T>): GraphNode<T>[] {
    const result: GraphNode<T>[] = [];
    for (const edge of node.outEdges()) {
        const end = graph.resolve(edge.end);
        if (end) result.push(end);
    }
    return result;
}

/**
 * Breadth-first traversal from `source`, yielding each reachable node once
 * as it is dequeued.
 *
 * @throws UnknownNodeError if the source is not in the graph
 */
export function breadthFirst<T>(graph: Graph<T>, source: T): IterableIterator<GraphNode<T>> {
    graph.assertLive();
    const start = graph.getNode(source);

    return (function* () {
        const seen = new Set<NodeId>([start.id]);
        const queue: GraphNode<T>[] = [start];
        let head = 0;

        while (head < queue.length) {
            const node = queue[head++];
            for (const next of neighbours(graph, node)) {
                if (seen.has(next.id)) continue;
                seen.add(next.id);
                queue.push(next);
            }
            yield node;
        }
    })();
}

/**
 * Depth-first traversal from `source` in post-order: a node is yielded once
 * every node reachable through it has been yielded.
 *
 * @throws UnknownNodeError if the source is not in the graph
 */
export function depthFirst<T>(graph: Graph<T>, source: T): IterableIterator<GraphNode<T>> {
    graph.assertLive();
    const start = graph.getNode(source);

    return (function* () {
        const seen = new Set<NodeId>([start.id]);
        const stack: { node: GraphNode<T>; pending: GraphNode<T>[] }[] = [
            { node: start, pending: neighbours(graph, start) },
        ];

        while (stack.length > 0) {
            const top = stack[stack.length - 1];
            const next = top.pending.shift();
            if (!next) {
                stack.pop();
                yield top.node;
                continue;
            }
            if (seen.has(next.id)) continue;
            seen.add(next.id);
            stack.push({ node: next, pending: neighbours(graph, next) });
        }
    })();
}

/**
 * True when every node of the graph is reachable from `source`.
 */
export function isConnectedFrom<T>(graph: Graph<T>, source: T): boolean {
    return [...breadthFirst(graph, source)].length === graph.size;
}
