/**
 * Graph - directed, weighted adjacency-list graph.
 *
 * Nodes live in an arena indexed by dense integer handles; the graph keeps a
 * name -> handle index on top of it. Edges refer to their endpoints by
 * handle, so the only references between nodes and edges run from a node to
 * the edges in its own collections.
 */

import type { Logger } from '../lib/logger';
import type { GraphOptions, KeyComparator } from '../lib/config';
import { resolveGraphOptions, validateWeight } from '../lib/config';
import {
    DuplicateEdgeError,
    DuplicateKeyError,
    GraphDisposedError,
    MissingEdgeError,
    StructureError,
    UnknownNodeError,
} from '../lib/errors';
import { GraphEdge } from './edge';
import { GraphNode } from './node';
import { ShortestPathTraversal } from './shortest-path';
import type { NodeId } from './types';

/** Arena slot: the node plus the collections only the graph may mutate */
interface NodeRecord<T, D> {
    node: GraphNode<T, D>;
    outgoing: Map<NodeId, GraphEdge>;
    incoming: Map<NodeId, GraphEdge>;
}

export class Graph<T, D = unknown> implements Iterable<GraphNode<T, D>> {
    private slots: (NodeRecord<T, D> | undefined)[] = [];
    private index = new Map<T, NodeId>();
    private edgeCount = 0;
    private isDisposed = false;

    readonly logger: Logger;
    readonly compareKeys?: KeyComparator<T>;

    constructor(options: GraphOptions<T> = {}) {
        const resolved = resolveGraphOptions(options);
        this.logger = resolved.logger;
        this.compareKeys = resolved.compareKeys;
    }

    /** Number of live nodes */
    get size(): number {
        return this.index.size;
    }

    /** Number of live edges */
    get linkCount(): number {
        return this.edgeCount;
    }

    get disposed(): boolean {
        return this.isDisposed;
    }

    /**
     * Insert a node with empty edge collections and an optional payload.
     * @throws DuplicateKeyError if the name is already in use
     */
    createNode(name: T, data?: D): GraphNode<T, D> {
        this.assertLive();
        if (this.index.has(name)) {
            throw new DuplicateKeyError(name);
        }

        const id = this.slots.length;
        const outgoing = new Map<NodeId, GraphEdge>();
        const incoming = new Map<NodeId, GraphEdge>();
        const node = new GraphNode<T, D>(id, name, data, outgoing, incoming);

        this.slots.push({ node, outgoing, incoming });
        this.index.set(name, id);
        this.logger.debug('Node created', { name, id });
        return node;
    }

    /**
     * Create the edge start -> end.
     * @throws UnknownNodeError if either endpoint is missing
     * @throws InvalidWeightError if the weight is not a positive finite number
     * @throws DuplicateEdgeError if start -> end already exists
     */
    createLink(start: T, end: T, weight: number): void {
        this.assertLive();
        const from = this.record(start);
        const to = this.record(end);
        validateWeight(weight);

        if (from.outgoing.has(to.node.id)) {
            throw new DuplicateEdgeError(start, end);
        }

        const edge = new GraphEdge(from.node.id, to.node.id, weight);
        from.outgoing.set(to.node.id, edge);
        to.incoming.set(from.node.id, edge);
        this.edgeCount++;
        this.logger.debug('Link created', { start, end, weight });
    }

    /**
     * Remove the edge start -> end.
     * @throws MissingEdgeError if there is no such edge
     */
    unlink(start: T, end: T): void {
        this.assertLive();
        const from = this.record(start);
        const to = this.record(end);

        if (!from.outgoing.delete(to.node.id)) {
            throw new MissingEdgeError(start, end);
        }
        to.incoming.delete(from.node.id);
        this.edgeCount--;
        this.logger.debug('Link removed', { start, end });
    }

    hasLink(start: T, end: T): boolean {
        const from = this.record(start);
        const to = this.record(end);
        return from.outgoing.has(to.node.id);
    }

    /**
     * Remove a node together with every edge touching it. Its handle is
     * never reused.
     */
    removeNode(name: T): void {
        this.assertLive();
        const target = this.record(name);
        this.sever(target);
        this.slots[target.node.id] = undefined;
        this.index.delete(name);
        this.logger.debug('Node removed', { name, id: target.node.id });
    }

    /**
     * Replace the payload of an existing node.
     * @throws UnknownNodeError if the name is not in the graph
     */
    setData(name: T, data: D): void {
        this.assertLive();
        this.record(name).node.data = data;
    }

    has(name: T): boolean {
        return this.index.has(name);
    }

    /**
     * @throws UnknownNodeError if the name is not in the graph
     */
    getNode(name: T): GraphNode<T, D> {
        return this.record(name).node;
    }

    /** Node for an arena handle, or undefined once the node is removed */
    resolve(id: NodeId): GraphNode<T, D> | undefined {
        return this.slots[id]?.node;
    }

    /** Live nodes in creation order */
    *nodes(): IterableIterator<GraphNode<T, D>> {
        for (const slot of this.slots) {
            if (slot) yield slot.node;
        }
    }

    [Symbol.iterator](): Iterator<GraphNode<T, D>> {
        return this.nodes();
    }

    /** Every live edge, grouped by start node */
    *edges(): IterableIterator<GraphEdge> {
        for (const slot of this.slots) {
            if (slot) yield* slot.outgoing.values();
        }
    }

    /**
     * Lazy Dijkstra traversal rooted at `source`.
     * @throws UnknownNodeError if the source is not in the graph
     */
    shortestPaths(source: T): ShortestPathTraversal<T> {
        return new ShortestPathTraversal(this, source);
    }

    /**
     * Verify that every edge is recorded on both of its endpoints.
     * @throws StructureError on the first inconsistency found
     */
    checkStructure(): true {
        for (const slot of this.slots) {
            if (!slot) continue;
            const { node } = slot;
            for (const [endId, edge] of slot.outgoing) {
                const end = this.slots[endId];
                if (edge.start !== node.id || edge.end !== endId) {
                    throw new StructureError(node.name, `edge ${edge} is filed under ${node.id}->${endId}`);
                }
                if (!end || end.incoming.get(node.id) !== edge) {
                    throw new StructureError(node.name, `edge ${edge} missing from its end node`);
                }
            }
            for (const [startId, edge] of slot.incoming) {
                const start = this.slots[startId];
                if (edge.end !== node.id || edge.start !== startId) {
                    throw new StructureError(node.name, `edge ${edge} is filed under ${startId}->${node.id}`);
                }
                if (!start || start.outgoing.get(node.id) !== edge) {
                    throw new StructureError(node.name, `edge ${edge} missing from its start node`);
                }
            }
        }
        return true;
    }

    /**
     * Tear the graph down. Each node first drops the back-references its
     * neighbours hold, then its own collections, so no node is left pointing
     * into another. Calling it again is a no-op.
     */
    dispose(): void {
        if (this.isDisposed) return;

        const nodeCount = this.index.size;
        const linkCount = this.edgeCount;
        for (const slot of this.slots) {
            if (slot) this.sever(slot);
        }
        this.slots = [];
        this.index.clear();
        this.isDisposed = true;
        this.logger.info('Graph disposed', { nodes: nodeCount, links: linkCount });
    }

    /** @throws GraphDisposedError once the graph is disposed */
    assertLive(): void {
        if (this.isDisposed) {
            throw new GraphDisposedError();
        }
    }

    private record(name: T): NodeRecord<T, D> {
        this.assertLive();
        const id = this.index.get(name);
        const slot = id === undefined ? undefined : this.slots[id];
        if (!slot) {
            throw new UnknownNodeError(name);
        }
        return slot;
    }

    private sever(slot: NodeRecord<T, D>): void {
        const id = slot.node.id;
        // self-loops sit in both collections but count once
        this.edgeCount -= slot.outgoing.size + slot.incoming.size - (slot.outgoing.has(id) ? 1 : 0);
        for (const endId of slot.outgoing.keys()) {
            this.slots[endId]?.incoming.delete(id);
        }
        for (const startId of slot.incoming.keys()) {
            this.slots[startId]?.outgoing.delete(id);
        }
        slot.outgoing.clear();
        slot.incoming.clear();
    }
}

/**
 * Build a graph holding the given nodes and no edges.
 */
export function makeGraph<T, D = unknown>(names: Iterable<T>, options?: GraphOptions<T>): Graph<T, D> {
    const graph = new Graph<T, D>(options);
    for (const name of names) {
        graph.createNode(name);
    }
    return graph;
}
