/**
 * Lazy single-source shortest paths (Dijkstra).
 *
 * Each pull on the iterator runs exactly one increment of the algorithm:
 * select the closest unsettled node, settle it, relax its outgoing edges.
 * A consumer that stops after k steps has paid for k increments; the rest of
 * the working set is dropped with the iterator.
 */

import type { Logger } from '../lib/logger';
import { withContext } from '../lib/logger';
import type { KeyComparator } from '../lib/config';
import { UnknownNodeError } from '../lib/errors';
import type { Graph } from './graph';
import type { GraphNode } from './node';
import type { NodeId, PathStep } from './types';

/** Mutable bookkeeping for a node that is not yet settled */
interface WorkingEntry<T> {
    node: GraphNode<T>;
    distance: number;
    predecessor?: GraphNode<T>;
}

/**
 * Stateful iterator over the settled nodes of one traversal.
 *
 * Ties between equally distant nodes go to the first one met in node
 * creation order, or to the smaller name when the graph was given
 * `compareKeys`.
 */
export class ShortestPathIterator<T> implements IterableIterator<PathStep<T>> {
    private workingSet = new Map<NodeId, WorkingEntry<T>>();
    private steps = 0;
    private terminal = false;
    private readonly logger: Logger;
    private readonly compareKeys?: KeyComparator<T>;

    /**
     * @throws UnknownNodeError if `source` is not a live node of `graph`
     */
    constructor(graph: Graph<T>, source: GraphNode<T>) {
        graph.assertLive();
        if (graph.resolve(source.id) !== source) {
            throw new UnknownNodeError(source.name);
        }

        this.logger = withContext(graph.logger, { source: source.name });
        this.compareKeys = graph.compareKeys;

        for (const node of graph.nodes()) {
            this.workingSet.set(node.id, {
                node,
                distance: node.id === source.id ? 0 : Number.POSITIVE_INFINITY,
            });
        }
    }

    /** Nodes still in the working set */
    get pending(): number {
        return this.workingSet.size;
    }

    /** Steps yielded so far */
    get settled(): number {
        return this.steps;
    }

    get done(): boolean {
        return this.terminal;
    }

    next(): IteratorResult<PathStep<T>> {
        const step = this.advance();
        if (!step) {
            return { done: true, value: undefined };
        }
        return { done: false, value: step };
    }

    /**
     * Stop early. Called by `for...of` on `break`; drops the working set.
     */
    return(): IteratorResult<PathStep<T>> {
        if (!this.terminal) {
            this.finish('stopped');
        }
        return { done: true, value: undefined };
    }

    [Symbol.iterator](): IterableIterator<PathStep<T>> {
        return this;
    }

    private advance(): PathStep<T> | undefined {
        if (this.terminal) return undefined;

        const current = this.selectClosest();
        if (!current) {
            this.finish('exhausted');
            return undefined;
        }

        this.workingSet.delete(current.node.id);

        // Nothing left is reachable from the source
        if (current.distance === Number.POSITIVE_INFINITY) {
            this.finish('unreachable');
            return undefined;
        }

        this.relax(current);
        this.steps++;

        const step: PathStep<T> = current.predecessor
            ? { node: current.node, distance: current.distance, predecessor: current.predecessor }
            : { node: current.node, distance: current.distance };

        this.logger.debug('Shortest path step settled', {
            node: current.node.name,
            distance: current.distance,
            predecessor: current.predecessor?.name,
        });
        return Object.freeze(step);
    }

    /** Linear scan of the working set for the minimum distance */
    private selectClosest(): WorkingEntry<T> | undefined {
        let best: WorkingEntry<T> | undefined;
        for (const entry of this.workingSet.values()) {
            if (!best || entry.distance < best.distance) {
                best = entry;
            } else if (
                this.compareKeys &&
                entry.distance === best.distance &&
                this.compareKeys(entry.node.name, best.node.name) < 0
            ) {
                best = entry;
            }
        }
        return best;
    }

    private relax(settled: WorkingEntry<T>): void {
        for (const edge of settled.node.outEdges()) {
            const target = this.workingSet.get(edge.end);
            if (!target) continue;

            const candidate = settled.distance + edge.weight;
            if (candidate < target.distance) {
                target.distance = candidate;
                target.predecessor = settled.node;
            }
        }
    }

    private finish(reason: 'exhausted' | 'unreachable' | 'stopped'): void {
        this.logger.debug('Shortest path traversal finished', {
            reason,
            settled: this.steps,
            discarded: this.workingSet.size,
        });
        this.workingSet.clear();
        this.terminal = true;
    }
}

/**
 * Iterable shortest-path traversal rooted at one node.
 *
 * The source is checked when the traversal is created. Every call to
 * `[Symbol.iterator]()` starts over from a fresh working set built from the
 * graph's current nodes; an individual iterator cannot be rewound.
 *
 * @example
 * ```typescript
 * for (const step of new ShortestPathTraversal(graph, 'a')) {
 *     if (step.node.name === 'z') break;
 * }
 * ```
 */
export class ShortestPathTraversal<T> implements Iterable<PathStep<T>> {
    /**
     * @throws UnknownNodeError if the source is not in the graph
     * @throws GraphDisposedError if the graph has been disposed
     */
    constructor(
        private readonly graph: Graph<T>,
        public readonly source: T,
    ) {
        graph.assertLive();
        graph.getNode(source);
    }

    [Symbol.iterator](): ShortestPathIterator<T> {
        this.graph.assertLive();
        return new ShortestPathIterator(this.graph, this.graph.getNode(this.source));
    }
}
