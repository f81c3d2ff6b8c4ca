import { describe, it, expect, beforeEach } from 'vitest';
import { Graph, makeGraph } from '../../../src/graph';
import {
    DuplicateEdgeError,
    DuplicateKeyError,
    GraphDisposedError,
    InvalidWeightError,
    MissingEdgeError,
    UnknownNodeError,
} from '../../../src/lib/errors';

describe('Graph', () => {
    let graph: Graph<string>;

    beforeEach(() => {
        graph = makeGraph(['a', 'b', 'c']);
    });

    describe('Node creation', () => {
        it('should create nodes with empty edge collections', () => {
            const node = graph.createNode('d');

            expect(node.name).toBe('d');
            expect(node.id).toBe(3);
            expect(node.outDegree).toBe(0);
            expect(node.inDegree).toBe(0);
            expect(graph.size).toBe(4);
            expect(graph.getNode('d')).toBe(node);
        });

        it('should reject duplicate names', () => {
            expect(() => graph.createNode('a')).toThrow(DuplicateKeyError);
            expect(graph.size).toBe(3);
        });

        it('should enumerate nodes in creation order', () => {
            expect([...graph].map(n => n.name)).toEqual(['a', 'b', 'c']);
            expect([...graph.nodes()].map(n => n.id)).toEqual([0, 1, 2]);
        });

        it('should throw UnknownNodeError for missing names', () => {
            expect(graph.has('z')).toBe(false);
            expect(() => graph.getNode('z')).toThrow(UnknownNodeError);
        });
    });

    describe('Node data', () => {
        it('should store an optional payload and let it be replaced', () => {
            const cities = new Graph<string, { population: number }>();
            const bare = cities.createNode('hamlet');
            const town = cities.createNode('town', { population: 900 });

            cities.setData('town', { population: 1200 });

            expect(bare.data).toBeUndefined();
            expect(town.data).toEqual({ population: 1200 });
            expect(cities.getNode('town').data?.population).toBe(1200);
        });

        it('should keep the payload visible on traversal steps', () => {
            const cities = new Graph<string, string>();
            cities.createNode('a', 'start');
            cities.createNode('b', 'end');
            cities.createLink('a', 'b', 2);

            expect([...cities.shortestPaths('a')].map(s => s.node.data)).toEqual(['start', 'end']);
        });

        it('should fail with UnknownNodeError when setting data on a missing node', () => {
            expect(() => graph.setData('z', 1)).toThrow(UnknownNodeError);
        });
    });

    describe('Link creation', () => {
        it('should add the edge to both endpoints', () => {
            graph.createLink('a', 'b', 2.5);

            const a = graph.getNode('a');
            const b = graph.getNode('b');
            const [edge] = a.outEdges();

            expect(edge.start).toBe(a.id);
            expect(edge.end).toBe(b.id);
            expect(edge.weight).toBe(2.5);
            expect(b.inEdges()).toEqual([edge]);
            expect(b.edgeFrom(a.id)).toBe(edge);
            expect(a.edgeTo(b.id)).toBe(edge);
            expect(graph.hasLink('a', 'b')).toBe(true);
            expect(graph.hasLink('b', 'a')).toBe(false);
            expect(graph.linkCount).toBe(1);
        });

        it('should fail with UnknownNodeError when either endpoint is missing', () => {
            expect(() => graph.createLink('a', 'z', 1)).toThrow(UnknownNodeError);
            expect(() => graph.createLink('z', 'a', 1)).toThrow(UnknownNodeError);
        });

        it('should check endpoints before the weight', () => {
            expect(() => graph.createLink('z', 'a', -1)).toThrow(UnknownNodeError);
        });

        it.each([0, -1, Number.NaN, Number.POSITIVE_INFINITY])(
            'should fail with InvalidWeightError for weight %s',
            (weight) => {
                expect(() => graph.createLink('a', 'b', weight)).toThrow(InvalidWeightError);
                expect(graph.linkCount).toBe(0);
            },
        );

        it('should fail with DuplicateEdgeError on a repeated start/end pair', () => {
            graph.createLink('a', 'b', 1);

            expect(() => graph.createLink('a', 'b', 3)).toThrow(DuplicateEdgeError);
            expect(graph.getNode('a').edgeTo(graph.getNode('b').id)?.weight).toBe(1);
        });

        it('should allow the reverse direction as a separate edge', () => {
            graph.createLink('a', 'b', 1);
            graph.createLink('b', 'a', 1);

            expect(graph.linkCount).toBe(2);
            expect(graph.checkStructure()).toBe(true);
        });

        it('should list edges grouped by start node', () => {
            graph.createLink('b', 'c', 1);
            graph.createLink('a', 'c', 2);
            graph.createLink('a', 'b', 3);

            expect([...graph.edges()].map(e => e.toString())).toEqual(['0->2', '0->1', '1->2']);
        });
    });

    describe('Unlinking', () => {
        it('should remove the edge from both endpoints', () => {
            expect(graph.hasLink('a', 'b')).toBe(false);
            graph.createLink('a', 'b', 1);
            expect(graph.hasLink('a', 'b')).toBe(true);

            graph.unlink('a', 'b');

            expect(graph.hasLink('a', 'b')).toBe(false);
            expect(graph.getNode('b').inDegree).toBe(0);
            expect(graph.linkCount).toBe(0);
        });

        it('should fail with MissingEdgeError when there is no edge', () => {
            expect(() => graph.unlink('a', 'b')).toThrow(MissingEdgeError);
        });

        it('should allow the link to be recreated', () => {
            graph.createLink('a', 'b', 1);
            graph.unlink('a', 'b');
            graph.createLink('a', 'b', 7);

            expect(graph.getNode('a').outEdges()[0].weight).toBe(7);
        });
    });

    describe('Node removal', () => {
        it('should sever every incident edge including self-loops', () => {
            graph.createLink('a', 'b', 1);
            graph.createLink('b', 'c', 1);
            graph.createLink('c', 'a', 1);
            graph.createLink('b', 'b', 1);
            expect(graph.linkCount).toBe(4);

            const a = graph.getNode('a');
            const c = graph.getNode('c');
            graph.removeNode('b');

            expect(graph.linkCount).toBe(1);
            expect(graph.has('b')).toBe(false);
            expect(a.outDegree).toBe(0);
            expect(c.inDegree).toBe(0);
            expect(graph.hasLink('c', 'a')).toBe(true);
            expect(graph.checkStructure()).toBe(true);
        });

        it('should not reuse the removed handle', () => {
            const b = graph.getNode('b');
            graph.removeNode('b');
            const again = graph.createNode('b');

            expect(graph.resolve(b.id)).toBeUndefined();
            expect(again.id).toBe(3);
            expect([...graph].map(n => n.name)).toEqual(['a', 'c', 'b']);
        });

        it('should fail with UnknownNodeError for missing names', () => {
            expect(() => graph.removeNode('z')).toThrow(UnknownNodeError);
        });

        it('should keep a dense bipartite graph consistent while deleting', () => {
            const g = new Graph<string>();
            const left = Array.from({ length: 12 }, (_, i) => `a${i}`);
            const right = Array.from({ length: 12 }, (_, i) => `b${i}`);
            for (const name of [...left, ...right]) g.createNode(name);
            for (const l of left) {
                for (const r of right) g.createLink(l, r, 1);
            }
            for (const r of right) {
                for (const r2 of right) g.createLink(r, r2, 1);
            }
            expect(g.linkCount).toBe(12 * 12 + 12 * 12);

            let remaining = right.length;
            for (const r of right.slice(0, 6)) {
                g.removeNode(r);
                remaining--;
                expect(g.checkStructure()).toBe(true);
                expect(g.linkCount).toBe(12 * remaining + remaining * remaining);
            }
            for (const r of right.slice(6)) {
                for (const r2 of right.slice(6)) {
                    expect(g.hasLink(r, r2)).toBe(true);
                }
                expect(g.hasLink(r, left[0])).toBe(false);
            }
        });
    });

    describe('Teardown', () => {
        it('should clear every node collection and empty the graph', () => {
            graph.createLink('a', 'b', 1);
            graph.createLink('b', 'c', 1);
            graph.createLink('c', 'a', 1);
            const nodes = [...graph];

            graph.dispose();

            expect(graph.disposed).toBe(true);
            expect(graph.size).toBe(0);
            expect(graph.linkCount).toBe(0);
            expect([...graph]).toEqual([]);
            for (const node of nodes) {
                expect(node.outDegree).toBe(0);
                expect(node.inDegree).toBe(0);
            }
        });

        it('should be a no-op when called twice', () => {
            graph.createLink('a', 'b', 1);
            graph.dispose();

            expect(() => graph.dispose()).not.toThrow();
            expect(graph.linkCount).toBe(0);
        });

        it('should reject mutations and traversals after disposal', () => {
            graph.dispose();

            expect(() => graph.createNode('d')).toThrow(GraphDisposedError);
            expect(() => graph.createLink('a', 'b', 1)).toThrow(GraphDisposedError);
            expect(() => graph.shortestPaths('a')).toThrow(GraphDisposedError);
        });

        it('should report disposal rather than a missing node on lookups', () => {
            graph.dispose();

            expect(() => graph.getNode('a')).toThrow(GraphDisposedError);
            expect(() => graph.hasLink('a', 'b')).toThrow(GraphDisposedError);
            expect(() => graph.unlink('a', 'b')).toThrow(GraphDisposedError);
            expect(() => graph.removeNode('a')).toThrow(GraphDisposedError);
            expect(() => graph.setData('a', 1)).toThrow(GraphDisposedError);
        });

        it('should tear down a graph with self-loops and two-way edges', () => {
            graph.createLink('a', 'a', 1);
            graph.createLink('a', 'b', 1);
            graph.createLink('b', 'a', 1);
            const a = graph.getNode('a');

            graph.dispose();

            expect(a.outEdges()).toEqual([]);
            expect(a.inEdges()).toEqual([]);
            expect(graph.linkCount).toBe(0);
        });
    });
});
