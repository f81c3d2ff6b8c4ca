export class GraphError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'GraphError';
    }
}

/**
 * Thrown when a node is created under a name the graph already holds.
 */
export class DuplicateKeyError extends GraphError {
    constructor(public readonly key: unknown) {
        super(`Node already exists: ${String(key)}`);
        this.name = 'DuplicateKeyError';
    }
}

/**
 * Thrown when a name does not refer to any node of the graph.
 */
export class UnknownNodeError extends GraphError {
    constructor(public readonly key: unknown) {
        super(`Node does not exist: ${String(key)}`);
        this.name = 'UnknownNodeError';
    }
}

export class InvalidWeightError extends GraphError {
    constructor(public readonly weight: number) {
        super(`Edge weights must be positive finite numbers, got ${weight}`);
        this.name = 'InvalidWeightError';
    }
}

export class DuplicateEdgeError extends GraphError {
    constructor(
        public readonly start: unknown,
        public readonly end: unknown,
    ) {
        super(`Edge already exists: ${String(start)} -> ${String(end)}`);
        this.name = 'DuplicateEdgeError';
    }
}

export class MissingEdgeError extends GraphError {
    constructor(
        public readonly start: unknown,
        public readonly end: unknown,
    ) {
        super(`No edge exists between ${String(start)} and ${String(end)}`);
        this.name = 'MissingEdgeError';
    }
}

/**
 * Thrown by every mutation or traversal on a graph after `dispose()`.
 */
export class GraphDisposedError extends GraphError {
    constructor() {
        super('Graph has been disposed');
        this.name = 'GraphDisposedError';
    }
}

/**
 * Raised by `checkStructure()` when an edge is not mirrored on both endpoints.
 */
export class StructureError extends GraphError {
    constructor(
        public readonly key: unknown,
        detail: string,
    ) {
        super(`Malformed node ${String(key)}: ${detail}`);
        this.name = 'StructureError';
    }
}

/** Validation error details */
export interface OptionIssue {
    path: (string | number)[];
    message: string;
}

export class InvalidOptionsError extends GraphError {
    constructor(public readonly issues: OptionIssue[]) {
        super(`Invalid graph options: ${issues.map(i => `${i.path.join('.') || '(root)'} ${i.message}`).join('; ')}`);
        this.name = 'InvalidOptionsError';
    }
}
