/**
 * AsyncQueue - FIFO channel between tasks, built only on park/unpark
 *
 * Features:
 * - Direct handoff to the earliest parked getter, no buffering in between
 * - get() returns in the same step whenever an item is buffered
 * - close(): buffered items still drain, then get() fails with QueueClosedError
 * - Optional get() timeout composed from a park and a timer
 * - taskDone()/join() to wait until every put item has been processed
 */

import { MisuseError, QueueClosedError, WaitTimeoutError } from '../core/errors.js';
import type { Scheduler } from '../core/scheduler.js';
import { isTimedOut, type Op, type ParkRequest } from '../core/suspension.js';
import type { ParkToken } from '../core/task.js';

/**
 * Wake payloads a parked getter can receive besides TIMED_OUT
 */
type GetterWake<T> =
    | { kind: 'item'; item: T }
    | { kind: 'closed' };

export class AsyncQueue<T> {
    private items: Array<{ value: T }> = [];
    private getters: ParkToken[] = [];
    private joiners: ParkToken[] = [];
    private closed = false;
    private unfinished = 0;

    constructor(private readonly scheduler: Scheduler) {}

    get size(): number {
        return this.items.length;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    get waitingGetters(): number {
        return this.getters.length;
    }

    /**
     * Items put but not yet acknowledged with taskDone()
     */
    get pending(): number {
        return this.unfinished;
    }

    /**
     * Never blocks; safe to call from outside a task
     */
    put(item: T): void {
        if (this.closed) {
            throw new QueueClosedError('put() on a closed queue');
        }
        this.unfinished++;

        while (this.getters.length > 0) {
            const getter = this.getters.shift();
            if (getter === undefined) break;
            const wake: GetterWake<T> = { kind: 'item', item };
            if (this.scheduler.unpark(getter, wake)) {
                return;
            }
        }
        this.items.push({ value: item });
    }

    *get(timeoutMs?: number): Op<T> {
        if (this.items.length > 0) {
            return this.shiftItem();
        }
        if (this.closed) {
            throw new QueueClosedError();
        }

        const token = this.scheduler.park(() => {
            this.getters = this.getters.filter(g => g !== token);
        });
        this.getters.push(token);

        const request: ParkRequest = { kind: 'park' };
        if (timeoutMs !== undefined) {
            request.timeoutAt = this.scheduler.clock.now() + timeoutMs;
        }
        const woke = yield request;

        if (isTimedOut(woke)) {
            throw new WaitTimeoutError(timeoutMs ?? 0);
        }
        if (isGetterWake<T>(woke) && woke.kind === 'item') {
            return woke.item;
        }
        // Woken by close() with nothing buffered
        throw new QueueClosedError();
    }

    /**
     * Stop accepting items. Parked getters are woken to fail only when nothing is buffered.
     */
    close(): void {
        this.closed = true;
        if (this.items.length > 0) {
            return;
        }
        const getters = this.getters;
        this.getters = [];
        for (const getter of getters) {
            const wake: GetterWake<T> = { kind: 'closed' };
            this.scheduler.unpark(getter, wake);
        }
    }

    /**
     * Acknowledge that one previously taken item has been processed
     */
    taskDone(): void {
        if (this.unfinished <= 0) {
            throw new MisuseError('taskDone() called more times than items were put');
        }
        this.unfinished--;
        if (this.unfinished === 0) {
            const joiners = this.joiners;
            this.joiners = [];
            for (const joiner of joiners) {
                this.scheduler.unpark(joiner);
            }
        }
    }

    /**
     * Wait until every item put so far has been acknowledged
     */
    *join(): Op<void> {
        if (this.unfinished === 0) {
            return;
        }
        const token = this.scheduler.park(() => {
            this.joiners = this.joiners.filter(j => j !== token);
        });
        this.joiners.push(token);
        yield { kind: 'park' };
    }

    private shiftItem(): T {
        const box = this.items.shift();
        if (box === undefined) {
            throw new MisuseError('shiftItem() on an empty queue');
        }
        return box.value;
    }
}

function isGetterWake<T>(payload: unknown): payload is GetterWake<T> {
    return typeof payload === 'object'
        && payload !== null
        && 'kind' in payload
        && (payload.kind === 'item' || payload.kind === 'closed');
}
