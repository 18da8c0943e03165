/**
 * Suspension Protocol
 *
 * A task body is a generator. Each `yield` hands the scheduler exactly one
 * request describing what must happen before the body may continue; the
 * scheduler resumes it with at most one wake payload.
 */

/**
 * Readiness key understood by a multiplexer
 */
export type Descriptor = number;

/**
 * Wake payload delivered when the timeout half of a timed wait fires first
 */
export const TIMED_OUT: unique symbol = Symbol('cooploop.timedOut');
export type TimedOut = typeof TIMED_OUT;

export interface ReadyRequest {
    kind: 'ready';
}

export interface SleepRequest {
    kind: 'sleep';
    /** Absolute clock time */
    deadline: number;
}

export interface WaitReadRequest {
    kind: 'wait-read';
    fd: Descriptor;
    timeoutAt?: number;
}

export interface WaitWriteRequest {
    kind: 'wait-write';
    fd: Descriptor;
    timeoutAt?: number;
}

/**
 * The task already registered itself with a primitive (queue, join) through
 * `Scheduler.park()` and will be woken by that primitive.
 */
export interface ParkRequest {
    kind: 'park';
    timeoutAt?: number;
}

export type SuspendRequest =
    | ReadyRequest
    | SleepRequest
    | WaitReadRequest
    | WaitWriteRequest
    | ParkRequest;

export type Outcome<T = unknown> =
    | { kind: 'done'; value: T }
    | { kind: 'failed'; error: unknown };

/**
 * Last-known state of a task's computation
 */
export type Suspension<T = unknown> =
    | { kind: 'unstarted' }
    | SuspendRequest
    | Outcome<T>;

/**
 * How a suspended body is re-entered
 */
export type Resume =
    | { mode: 'next'; payload: unknown }
    | { mode: 'throw'; error: unknown };

export type TaskBody<T = unknown> = Generator<SuspendRequest, T, unknown>;

/**
 * Primitive operation usable with `yield*` inside a task body
 */
export type Op<T> = Generator<SuspendRequest, T, unknown>;

export function resumeWith(payload?: unknown): Resume {
    return { mode: 'next', payload };
}

export function resumeThrowing(error: unknown): Resume {
    return { mode: 'throw', error };
}

export function isTerminal<T>(suspension: Suspension<T>): suspension is Outcome<T> {
    return suspension.kind === 'done' || suspension.kind === 'failed';
}

export function isTimedOut(payload: unknown): payload is TimedOut {
    return payload === TIMED_OUT;
}
