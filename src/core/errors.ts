/**
 * Error kinds raised by the scheduler and its primitives
 */

import type { Descriptor } from './suspension.js';

/**
 * Direction of a descriptor wait
 */
export type WaitDirection = 'read' | 'write';

/**
 * Base class for every error this library throws
 */
export class CoopLoopError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CoopLoopError';
    }
}

/**
 * The queue is closed and drained; no further items will arrive
 */
export class QueueClosedError extends CoopLoopError {
    constructor(message: string = 'Queue is closed') {
        super(message);
        this.name = 'QueueClosedError';
    }
}

/**
 * A second party tried to wait on a descriptor direction that already has a waiter
 */
export class DuplicateWaiterError extends CoopLoopError {
    constructor(
        public readonly fd: Descriptor,
        public readonly direction: WaitDirection
    ) {
        super(`Descriptor ${fd} already has a ${direction} waiter`);
        this.name = 'DuplicateWaiterError';
    }
}

/**
 * A primitive was used outside the context it requires
 */
export class MisuseError extends CoopLoopError {
    constructor(message: string) {
        super(message);
        this.name = 'MisuseError';
    }
}

/**
 * A timed wait expired before its primary event fired
 */
export class WaitTimeoutError extends CoopLoopError {
    constructor(public readonly timeoutMs: number) {
        super(`Wait timed out after ${timeoutMs}ms`);
        this.name = 'WaitTimeoutError';
    }
}

/**
 * A task body threw and nobody joined it to receive the error
 */
export class TaskFailedError extends CoopLoopError {
    constructor(
        public readonly taskId: string,
        public readonly taskName: string,
        public override readonly cause: unknown
    ) {
        super(`Task ${taskName} (${taskId}) failed: ${describeError(cause)}`);
        this.name = 'TaskFailedError';
    }
}

/**
 * The virtual multiplexer was asked to block forever with nothing scheduled to become ready
 */
export class DeadlockError extends CoopLoopError {
    constructor(message: string = 'Poll would block forever: no timers and no scheduled readiness') {
        super(message);
        this.name = 'DeadlockError';
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
