/**
 * Diagram Errors — typed, recoverable failures raised by the graph and views.
 */

export type DiagramErrorCode =
    | 'NOT_FOUND'
    | 'INVALID_CONNECTION'
    | 'INVALID_BLOCK'
    | 'INVALID_PROJECT'
    | 'VIEW_NOT_READY';

export class DiagramError extends Error {
    code: DiagramErrorCode;

    constructor(code: DiagramErrorCode, message: string) {
        super(message);
        this.name = 'DiagramError';
        this.code = code;
    }
}

/** An id did not resolve to a block, terminal or connection */
export class NotFoundError extends DiagramError {
    id: number;

    constructor(what: string, id: number) {
        super('NOT_FOUND', `${what} ${id} not found`);
        this.name = 'NotFoundError';
        this.id = id;
    }
}

export class InvalidConnectionError extends DiagramError {
    constructor(reason: string) {
        super('INVALID_CONNECTION', reason);
        this.name = 'InvalidConnectionError';
    }
}

export class InvalidBlockError extends DiagramError {
    constructor(reason: string) {
        super('INVALID_BLOCK', reason);
        this.name = 'InvalidBlockError';
    }
}

/** A project property (name, version, sign-off fields) was rejected */
export class InvalidProjectError extends DiagramError {
    constructor(reason: string) {
        super('INVALID_PROJECT', reason);
        this.name = 'InvalidProjectError';
    }
}

/** Raised when a view is asked to lay out before its viewport has been measured */
export class ViewNotReadyError extends DiagramError {
    constructor(viewKey: string) {
        super('VIEW_NOT_READY', `View ${viewKey} has no measured viewport yet`);
        this.name = 'ViewNotReadyError';
    }
}

export function isDiagramError(err: unknown): err is DiagramError {
    return err instanceof DiagramError;
}
