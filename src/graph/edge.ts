import type { NodeId } from './types';

/**
 * Directed, positively weighted connection. Endpoints are arena handles,
 * so an edge never holds a reference to a node.
 */
export class GraphEdge {
    constructor(
        public readonly start: NodeId,
        public readonly end: NodeId,
        public readonly weight: number,
    ) { }

    toString(): string {
        return `${this.start}->${this.end}`;
    }
}
