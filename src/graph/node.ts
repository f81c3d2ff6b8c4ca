import type { GraphEdge } from './edge';
import type { NodeId } from './types';

/**
 * Named graph vertex, optionally carrying a data payload.
 *
 * The outgoing collection owns the node's edges; the incoming collection
 * only mirrors edges owned by other nodes. Both are keyed by the handle of
 * the node at the other end and are filled in by the owning `Graph`.
 */
export class GraphNode<T, D = unknown> {
    constructor(
        public readonly id: NodeId,
        public readonly name: T,
        public data: D | undefined,
        private readonly outgoing: ReadonlyMap<NodeId, GraphEdge>,
        private readonly incoming: ReadonlyMap<NodeId, GraphEdge>,
    ) { }

    /** Edges leaving this node, in creation order. */
    outEdges(): GraphEdge[] {
        return [...this.outgoing.values()];
    }

    /** Edges arriving at this node, in creation order. */
    inEdges(): GraphEdge[] {
        return [...this.incoming.values()];
    }

    get outDegree(): number {
        return this.outgoing.size;
    }

    get inDegree(): number {
        return this.incoming.size;
    }

    edgeTo(end: NodeId): GraphEdge | undefined {
        return this.outgoing.get(end);
    }

    edgeFrom(start: NodeId): GraphEdge | undefined {
        return this.incoming.get(start);
    }

    toString(): string {
        return `{Node ${String(this.name)}}`;
    }
}
