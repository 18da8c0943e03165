/**
 * Task - one suspendable computation driven step by step by a Scheduler
 */

import { v7 as uuidv7 } from 'uuid';
import { isTerminal, type Outcome, type Resume, type SuspendRequest, type Suspension, type TaskBody } from './suspension.js';

/**
 * Where a task currently lives from the scheduler's point of view
 */
export type TaskStatus =
    /** Created, not yet handed to a scheduler */
    | 'pending'
    /** On the ready queue */
    | 'scheduled'
    /** Currently being stepped */
    | 'running'
    /** Sleeping, waiting on a descriptor, or parked on a primitive */
    | 'waiting'
    | 'done'
    | 'failed';

export interface TaskOptions {
    name?: string;
}

/**
 * Registration that wakes a parked task; stale once the task's epoch moves on
 */
export interface ParkToken {
    readonly task: Task;
    readonly epoch: number;
}

export class Task<T = unknown> {
    readonly id: string;
    readonly name: string;
    status: TaskStatus = 'pending';

    /**
     * Generation counter. Every wait registration captures it; a wake-up is
     * honoured only while it still matches, and honouring one bumps it.
     */
    epoch = 0;

    /** True while registered through Scheduler.park() */
    parked = false;

    /** Undo functions for the registrations of the current wait */
    cancels: Array<() => void> = [];

    /** Tasks parked in join() on this one */
    joiners: ParkToken[] = [];

    private last: Suspension<T> = { kind: 'unstarted' };

    constructor(private readonly body: TaskBody<T>, options: TaskOptions = {}) {
        this.id = uuidv7();
        this.name = options.name ?? `task-${this.id.slice(-8)}`;
    }

    /**
     * Wrap a plain callback; it runs to completion in a single step
     */
    static fromCallback<R>(fn: () => R, options: TaskOptions = {}): Task<R> {
        function* callback(): TaskBody<R> {
            return fn();
        }
        return new Task(callback(), { name: options.name ?? (fn.name || 'callback') });
    }

    get suspension(): Suspension<T> {
        return this.last;
    }

    get outcome(): Outcome<T> | undefined {
        return isTerminal(this.last) ? this.last : undefined;
    }

    get settled(): boolean {
        return this.status === 'done' || this.status === 'failed';
    }

    /**
     * Advance the computation by one step
     */
    step(resume: Resume): Suspension<T> {
        this.status = 'running';
        let result: IteratorResult<SuspendRequest, T>;
        try {
            result = resume.mode === 'throw'
                ? this.body.throw(resume.error)
                : this.body.next(resume.payload);
        } catch (error) {
            this.status = 'failed';
            this.last = { kind: 'failed', error };
            return this.last;
        }

        if (result.done === true) {
            this.status = 'done';
            this.last = { kind: 'done', value: result.value };
        } else {
            this.last = result.value;
        }
        return this.last;
    }
}
