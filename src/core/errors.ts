// src/core/errors.ts
// Error taxonomy surfaced to the orchestration layer; each one carries enough
// context to render the exact index, limit or document path that failed.

export class EditorError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** Illegal index, or an attempt to move the fixed last boundary. */
export class BoundaryError extends EditorError {
    readonly index: number;

    constructor(index: number, reason: string) {
        super(`Range ${index}: ${reason}`);
        this.index = index;
    }
}

/** Table already at its minimum or maximum editable size. */
export class CapacityError extends EditorError {
    readonly count: number;
    readonly limit: number;

    constructor(count: number, limit: number, reason: string) {
        super(`${reason} (have ${count}, limit ${limit})`);
        this.count = count;
        this.limit = limit;
    }
}

/** A decoded or about-to-be-written Document violates a required shape. */
export class StructureError extends EditorError {
    readonly path: string;
    readonly expected: string;
    readonly actual: string;

    constructor(path: string, expected: string, actual: string) {
        super(`${path}: expected ${expected}, found ${actual}`);
        this.path = path;
        this.expected = expected;
        this.actual = actual;
    }
}

/** Named object absent from a container; raised on behalf of the container layer. */
export class NotFoundError extends EditorError {
    readonly objectName: string;

    constructor(objectName: string, container?: string) {
        super(
            container
                ? `${objectName} not found in ${container}`
                : `${objectName} not found`
        );
        this.objectName = objectName;
    }
}
