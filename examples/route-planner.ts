import { Graph, consoleLogger, findShortestPath } from '../src';

// Route Planner Example
// Run with: npm run example

const graph = new Graph<string>({ logger: consoleLogger, logLevel: 'info' });

const stops = ['depot', 'market', 'harbor', 'mill', 'school', 'tower'];
for (const stop of stops) {
    graph.createNode(stop);
}

const roads: [string, string, number][] = [
    ['depot', 'market', 4],
    ['depot', 'mill', 9],
    ['market', 'harbor', 3],
    ['market', 'mill', 2],
    ['mill', 'school', 1],
    ['harbor', 'school', 6],
    ['school', 'depot', 7],
];
for (const [from, to, minutes] of roads) {
    graph.createLink(from, to, minutes);
}

console.log('--- Closest stops from depot ---');
for (const step of graph.shortestPaths('depot')) {
    const via = step.predecessor ? ` via ${step.predecessor.name}` : '';
    console.log(`${step.node.name}: ${step.distance} min${via}`);
    // Stop once we are further than a quarter hour out
    if (step.distance > 15) break;
}

console.log('\n--- depot -> school ---');
const route = findShortestPath(graph, 'depot', 'school');
console.log(route ? `${route.path.join(' -> ')} (${route.distance} min)` : 'unreachable');

console.log('\n--- tower (no roads) ---');
console.log(findShortestPath(graph, 'depot', 'tower') ?? 'unreachable');

graph.dispose();
