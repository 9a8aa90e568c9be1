/**
 * @file Node Model Errors
 *
 * Typed failures raised while naming, normalizing and collecting nodes.
 * Every failure is raised to the immediate caller; nothing in the core
 * retries or recovers. The collection session is the only place that
 * turns an error into a per-task failure record.
 *
 * @module dag/errors
 */

// ─── Error JSON ─────────────────────────────────────────────────

export interface ErrorJSON {
    code: string;
    message: string;
    details?: Record<string, unknown>;
}

// ─── Base ───────────────────────────────────────────────────────

export abstract class TaskNodeError extends Error {
    abstract readonly code: string;

    toJSON(): ErrorJSON {
        return {
            code: this.code,
            message: this.message,
        };
    }

    toString(): string {
        return `[${this.code}] ${this.message}`;
    }
}

// ─── Reference Errors ───────────────────────────────────────────

/**
 * A reference could not be put into canonical (absolute) form.
 */
export class InvalidReferenceError extends TaskNodeError {
    readonly code = 'INVALID_REFERENCE';

    constructor(readonly reference: string, message?: string) {
        super(message ?? `'${reference}' is not an absolute path.`);
        this.name = 'InvalidReferenceError';
    }

    toJSON(): ErrorJSON {
        return { ...super.toJSON(), details: { reference: this.reference } };
    }
}

export type NodeKind = 'depends_on' | 'produces';

/**
 * A task declares the same explicit dependency or product name twice.
 */
export class DuplicateNodeNameError extends TaskNodeError {
    readonly code = 'DUPLICATE_NODE_NAME';

    constructor(readonly kind: NodeKind, readonly names: ReadonlySet<string | number>) {
        const listed: string = Array.from(names).map((n) => JSON.stringify(n)).join(', ');
        super(`'${kind}' has nodes with the same name: ${listed}`);
        this.name = 'DuplicateNodeNameError';
    }

    toJSON(): ErrorJSON {
        return { ...super.toJSON(), details: { kind: this.kind, names: Array.from(this.names) } };
    }
}

/**
 * No registered collector recognized a reference.
 */
export class NodeNotCollectedError extends TaskNodeError {
    readonly code = 'NODE_NOT_COLLECTED';

    constructor(readonly reference: unknown, readonly taskName: string, readonly path: string) {
        super(
            `${JSON.stringify(reference)} cannot be parsed as a dependency or product ` +
            `for task '${taskName}' in '${path}'.`,
        );
        this.name = 'NodeNotCollectedError';
    }

    toJSON(): ErrorJSON {
        return {
            ...super.toJSON(),
            details: { reference: this.reference, taskName: this.taskName, path: this.path },
        };
    }
}

/**
 * The resource behind a node is absent when its fingerprint is requested.
 */
export class NodeNotFoundError extends TaskNodeError {
    readonly code = 'NODE_NOT_FOUND';

    constructor(readonly path: string) {
        super(`No node exists at '${path}'.`);
        this.name = 'NodeNotFoundError';
    }
}

// ─── Declaration Errors ─────────────────────────────────────────

/**
 * A declaration payload holds a value that is neither a reference nor a
 * collection of references.
 */
export class InvalidDeclarationError extends TaskNodeError {
    readonly code = 'INVALID_DECLARATION';

    constructor(readonly value: unknown, message: string) {
        super(message);
        this.name = 'InvalidDeclarationError';
    }
}

/**
 * A declaration was written with the wrong arguments.
 */
export class DeclarationSignatureError extends TaskNodeError {
    readonly code = 'DECLARATION_SIGNATURE';

    constructor(readonly declaration: string, detail: string) {
        super(`${declaration}() ${detail}`);
        this.name = 'DeclarationSignatureError';
    }
}

// ─── Task Errors ────────────────────────────────────────────────

export class TaskStateError extends TaskNodeError {
    readonly code = 'TASK_STATE';

    constructor(readonly taskName: string, readonly from: string, readonly to: string) {
        super(`Task '${taskName}' cannot move from '${from}' to '${to}'.`);
        this.name = 'TaskStateError';
    }
}

export class DuplicateTaskNameError extends TaskNodeError {
    readonly code = 'DUPLICATE_TASK_NAME';

    constructor(readonly taskName: string) {
        super(`Task '${taskName}' is defined more than once.`);
        this.name = 'DuplicateTaskNameError';
    }
}

export class ManifestError extends TaskNodeError {
    readonly code = 'MANIFEST_INVALID';

    constructor(readonly issues: string[]) {
        super(`Invalid task manifest: ${issues.join('; ')}`);
        this.name = 'ManifestError';
    }

    toJSON(): ErrorJSON {
        return { ...super.toJSON(), details: { issues: this.issues } };
    }
}

// ─── Helpers ────────────────────────────────────────────────────

/**
 * Extract a message from any thrown value.
 */
export function errorMessage_get(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === 'string') return error;
    return String(error);
}
