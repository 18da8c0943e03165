/**
 * Cooperative Scheduler - single-threaded executor for generator tasks
 *
 * Features:
 * - Ready FIFO drained breadth-first, one step per task per drain
 * - Deadline heap ordered by (deadline, sequence) for stable tie-breaks
 * - Read/write waiter maps, one waiter per descriptor direction
 * - One multiplexer poll per idle iteration, never blocking past the earliest deadline
 * - Timed waits with epoch-checked cancellation of the losing half
 * - Explicit policy for task failures nobody joined on
 */

import { monotonicClock, type Clock } from './clock.js';
import {
    DuplicateWaiterError,
    MisuseError,
    TaskFailedError,
    WaitTimeoutError,
    describeError,
    type WaitDirection,
} from './errors.js';
import {
    TIMED_OUT,
    isTimedOut,
    resumeThrowing,
    resumeWith,
    type Descriptor,
    type Op,
    type Outcome,
    type ParkRequest,
    type Resume,
    type Suspension,
    type TaskBody,
    type WaitReadRequest,
    type WaitWriteRequest,
} from './suspension.js';
import { Task, type ParkToken, type TaskOptions } from './task.js';
import { TimerHeap, type HeapEntry } from './timer-heap.js';
import { SchedulerConfigSchema, type ErrorPolicy, type SchedulerConfig } from '../config/index.js';
import { SchedulerEventBus } from '../events/bus.js';
import { createLogger, type Logger } from '../logging/logger.js';
import { StreamMultiplexer } from '../multiplexer/stream-multiplexer.js';
import type { Multiplexer } from '../multiplexer/types.js';

/**
 * Scheduler options
 */
export interface SchedulerOptions {
    /** Monotonic time source (default: performance.now) */
    clock?: Clock;
    /** Readiness source (default: a fresh StreamMultiplexer) */
    multiplexer?: Multiplexer;
    logger?: Logger;
    /** What to do with failures no joiner received (default: 'throw') */
    errorPolicy?: ErrorPolicy;
    /** Consecutive drains before a forced zero-timeout poll (default: 16) */
    maxDrainsWithoutPoll?: number;
    /** Used when no logger is given (default: 'warn') */
    logLevel?: SchedulerConfig['logLevel'];
}

/**
 * Scheduler statistics
 */
export interface SchedulerStats {
    ready: number;
    timers: number;
    readWaiters: number;
    writeWaiters: number;
    parked: number;
    holds: number;
    spawned: number;
    completed: number;
    failed: number;
    steps: number;
    drains: number;
    polls: number;
}

interface ReadyEntry {
    task: Task;
    resume: Resume;
}

interface TimerEntry extends HeapEntry {
    task: Task;
    epoch: number;
    /** sleep wakes with the clock time, timeout with TIMED_OUT */
    kind: 'sleep' | 'timeout';
}

interface WaiterEntry {
    task: Task;
    epoch: number;
}

export class Scheduler {
    readonly clock: Clock;
    readonly multiplexer: Multiplexer;
    readonly events: SchedulerEventBus;
    private readonly logger: Logger;
    private readonly config: SchedulerConfig;

    private ready: ReadyEntry[] = [];
    private timers = new TimerHeap<TimerEntry>();
    private readWaiters: Map<Descriptor, WaiterEntry> = new Map();
    private writeWaiters: Map<Descriptor, WaiterEntry> = new Map();
    private sequence = 0;
    private parkedCount = 0;
    private holds = 0;

    private active: Task | undefined;
    private running = false;
    private polling = false;
    private drainsSincePoll = 0;

    private stats = {
        spawned: 0,
        completed: 0,
        failed: 0,
        steps: 0,
        drains: 0,
        polls: 0,
    };

    constructor(options: SchedulerOptions = {}) {
        this.config = SchedulerConfigSchema.parse({
            errorPolicy: options.errorPolicy,
            maxDrainsWithoutPoll: options.maxDrainsWithoutPoll,
            logLevel: options.logLevel,
        });
        this.clock = options.clock ?? monotonicClock;
        this.multiplexer = options.multiplexer ?? new StreamMultiplexer();
        this.logger = options.logger ?? createLogger('cooploop', this.config.logLevel);
        this.events = new SchedulerEventBus(this.logger);
    }

    /**
     * Build a scheduler from a resolved config (see loadConfig)
     */
    static fromConfig(
        config: SchedulerConfig,
        deps: Pick<SchedulerOptions, 'clock' | 'multiplexer' | 'logger'> = {}
    ): Scheduler {
        return new Scheduler({ ...deps, ...config });
    }

    // ========================================================================
    // Handing work to the scheduler
    // ========================================================================

    /**
     * Wrap a generator in a task and make it ready
     */
    spawn<T>(body: TaskBody<T>, options: TaskOptions = {}): Task<T> {
        const task = new Task(body, options);
        this.scheduleNow(task);
        return task;
    }

    /**
     * Run a plain callback on the next drain
     */
    callSoon<R>(fn: () => R, options: TaskOptions = {}): Task<R> {
        const task = Task.fromCallback(fn, options);
        this.scheduleNow(task);
        return task;
    }

    /**
     * Run a plain callback once `delayMs` has elapsed
     */
    callLater<R>(delayMs: number, fn: () => R, options: TaskOptions = {}): Task<R> {
        const task = Task.fromCallback(fn, options);
        this.scheduleAfter(delayMs, task);
        return task;
    }

    scheduleNow(task: Task): void {
        this.adopt(task);
        this.enqueue(task, resumeWith());
    }

    scheduleAfter(delayMs: number, task: Task): void {
        this.adopt(task);
        task.status = 'waiting';
        this.addTimer(task, this.clock.now() + Math.max(0, delayMs), 'sleep');
        this.notify();
    }

    waitForReadable(fd: Descriptor, task: Task): void {
        this.adoptWaiter('read', fd, task);
    }

    waitForWritable(fd: Descriptor, task: Task): void {
        this.adoptWaiter('write', fd, task);
    }

    /**
     * Keep run() alive while something outside the scheduler may still add
     * work (a listening server, an event source). Returns an idempotent release.
     */
    hold(): () => void {
        this.holds++;
        let released = false;
        return () => {
            if (released) return;
            released = true;
            this.holds--;
            this.notify();
        };
    }

    // ========================================================================
    // Primitives (use with yield* inside a task body)
    // ========================================================================

    /**
     * The task being stepped right now; throws outside a step
     */
    currentTask(): Task {
        if (this.active === undefined) {
            throw new MisuseError('Blocking primitive used outside a task driven by this scheduler');
        }
        return this.active;
    }

    get current(): Task | undefined {
        return this.active;
    }

    *yieldNow(): Op<void> {
        this.currentTask();
        yield { kind: 'ready' };
    }

    /**
     * Suspend for at least `delayMs`; returns the time actually slept
     */
    *sleep(delayMs: number): Op<number> {
        return yield* this.sleepUntil(this.clock.now() + Math.max(0, delayMs));
    }

    *sleepUntil(deadline: number): Op<number> {
        this.currentTask();
        const start = this.clock.now();
        const woke = yield { kind: 'sleep', deadline };
        return (typeof woke === 'number' ? woke : this.clock.now()) - start;
    }

    /**
     * Suspend until the multiplexer reports `fd` readable
     */
    *readable(fd: Descriptor, timeoutMs?: number): Op<void> {
        this.currentTask();
        const request: WaitReadRequest = { kind: 'wait-read', fd };
        if (timeoutMs !== undefined) {
            request.timeoutAt = this.clock.now() + timeoutMs;
        }
        const woke = yield request;
        if (isTimedOut(woke)) {
            throw new WaitTimeoutError(timeoutMs ?? 0);
        }
    }

    /**
     * Suspend until the multiplexer reports `fd` writable
     */
    *writable(fd: Descriptor, timeoutMs?: number): Op<void> {
        this.currentTask();
        const request: WaitWriteRequest = { kind: 'wait-write', fd };
        if (timeoutMs !== undefined) {
            request.timeoutAt = this.clock.now() + timeoutMs;
        }
        const woke = yield request;
        if (isTimedOut(woke)) {
            throw new WaitTimeoutError(timeoutMs ?? 0);
        }
    }

    /**
     * Wait for another task to finish; returns its value or rethrows its error
     */
    *join<R>(task: Task<R>): Op<R> {
        const self = this.currentTask();
        if (task === self) {
            throw new MisuseError(`Task ${task.name} cannot join itself`);
        }

        if (task.outcome === undefined) {
            const token = this.park(() => {
                task.joiners = task.joiners.filter(j => j !== token);
            });
            task.joiners.push(token);
            yield { kind: 'park' };
        }

        const outcome = task.outcome;
        if (outcome === undefined) {
            throw new MisuseError(`Task ${self.name} resumed before ${task.name} settled`);
        }
        if (outcome.kind === 'failed') {
            throw outcome.error;
        }
        return outcome.value;
    }

    /**
     * Register the current task as parked on a primitive. The primitive must
     * then yield a `park` request and later call unpark() with the token.
     * `cancel` undoes the primitive's own registration if another wake wins.
     */
    park(cancel?: () => void): ParkToken {
        const task = this.currentTask();
        if (cancel !== undefined) {
            task.cancels.push(cancel);
        }
        if (!task.parked) {
            task.parked = true;
            this.parkedCount++;
        }
        return { task, epoch: task.epoch };
    }

    /**
     * Wake a parked task with a payload; false if the token went stale
     */
    unpark(token: ParkToken, payload?: unknown): boolean {
        return this.wake(token.task, token.epoch, resumeWith(payload));
    }

    // ========================================================================
    // Run loop
    // ========================================================================

    /**
     * Drive tasks until no ready work, timers, descriptor waiters or holds remain
     */
    async run(): Promise<void> {
        if (this.running) {
            throw new MisuseError('Scheduler.run() is already in progress');
        }
        this.running = true;
        this.drainsSincePoll = 0;

        try {
            while (this.hasWork()) {
                if (this.ready.length > 0) {
                    this.drainReady();
                    this.fireExpiredTimers();
                    if (
                        this.ready.length > 0
                        && this.drainsSincePoll >= this.config.maxDrainsWithoutPoll
                        && this.hasIoInterest()
                    ) {
                        await this.pollOnce(0);
                    }
                    continue;
                }

                await this.pollOnce(this.nextTimeout());
            }
        } finally {
            this.running = false;
        }

        if (this.parkedCount > 0) {
            this.logger.warn(`run() finished with ${this.parkedCount} task(s) still parked; nothing left can wake them`);
        }
        this.events.emit({ type: 'loop.idle', at: this.clock.now(), parked: this.parkedCount });
    }

    getStats(): SchedulerStats {
        return {
            ready: this.ready.length,
            timers: this.timers.size,
            readWaiters: this.readWaiters.size,
            writeWaiters: this.writeWaiters.size,
            parked: this.parkedCount,
            holds: this.holds,
            ...this.stats,
        };
    }

    // ========================================================================
    // Private methods
    // ========================================================================

    private hasWork(): boolean {
        return this.ready.length > 0
            || this.timers.size > 0
            || this.readWaiters.size > 0
            || this.writeWaiters.size > 0
            || this.holds > 0;
    }

    private hasIoInterest(): boolean {
        return this.readWaiters.size > 0 || this.writeWaiters.size > 0 || this.holds > 0;
    }

    private nextTimeout(): number | null {
        const earliest = this.timers.peek();
        if (earliest === undefined) {
            return null;
        }
        return Math.max(0, earliest.deadline - this.clock.now());
    }

    /**
     * Step every task that is ready right now; tasks made ready meanwhile wait for the next drain
     */
    private drainReady(): void {
        this.stats.drains++;
        this.drainsSincePoll++;

        let remaining = this.ready.length;
        while (remaining > 0) {
            remaining--;
            const entry = this.ready.shift();
            if (entry === undefined) break;

            this.active = entry.task;
            this.stats.steps++;
            let suspension: Suspension;
            try {
                suspension = entry.task.step(entry.resume);
            } finally {
                this.active = undefined;
            }
            this.route(entry.task, suspension);
        }
    }

    private async pollOnce(timeoutMs: number | null): Promise<void> {
        this.stats.polls++;
        this.drainsSincePoll = 0;

        this.polling = true;
        const result = await this.multiplexer.poll(
            new Set(this.readWaiters.keys()),
            new Set(this.writeWaiters.keys()),
            timeoutMs
        ).finally(() => {
            this.polling = false;
        });

        for (const fd of result.readable) {
            this.fireWaiter(this.readWaiters, fd);
        }
        for (const fd of result.writable) {
            this.fireWaiter(this.writeWaiters, fd);
        }
        this.fireExpiredTimers();
    }

    private fireWaiter(waiters: Map<Descriptor, WaiterEntry>, fd: Descriptor): void {
        const entry = waiters.get(fd);
        if (entry === undefined) return;
        waiters.delete(fd);
        this.wake(entry.task, entry.epoch, resumeWith(fd));
    }

    /**
     * Move every timer whose deadline has passed to ready, in heap order
     */
    private fireExpiredTimers(): void {
        const now = this.clock.now();
        let earliest = this.timers.peek();
        while (earliest !== undefined && earliest.deadline <= now) {
            this.timers.pop();
            this.wake(
                earliest.task,
                earliest.epoch,
                resumeWith(earliest.kind === 'sleep' ? now : TIMED_OUT)
            );
            earliest = this.timers.peek();
        }
    }

    /**
     * Honour a wake-up if it belongs to the task's current wait, cancelling
     * the wait's other registrations
     */
    private wake(task: Task, epoch: number, resume: Resume): boolean {
        if (task.epoch !== epoch || task.status !== 'waiting') {
            return false;
        }
        this.clearWait(task);
        this.enqueue(task, resume);
        return true;
    }

    private clearWait(task: Task): void {
        task.epoch++;
        const cancels = task.cancels;
        task.cancels = [];
        for (const cancel of cancels) {
            cancel();
        }
        if (task.parked) {
            task.parked = false;
            this.parkedCount--;
        }
    }

    private enqueue(task: Task, resume: Resume): void {
        task.status = 'scheduled';
        this.ready.push({ task, resume });
        this.notify();
    }

    /**
     * Interrupt a blocking poll so work added from outside a step is seen
     */
    private notify(): void {
        if (this.polling) {
            this.multiplexer.wakeup();
        }
    }

    private adopt(task: Task): void {
        if (task.status !== 'pending') {
            throw new MisuseError(`Task ${task.name} is already ${task.status}`);
        }
        this.stats.spawned++;
        this.events.emit({ type: 'task.spawned', taskId: task.id, taskName: task.name, at: this.clock.now() });
        this.logger.debug(`spawned ${task.name}`);
    }

    private adoptWaiter(direction: WaitDirection, fd: Descriptor, task: Task): void {
        const waiters = direction === 'read' ? this.readWaiters : this.writeWaiters;
        if (waiters.has(fd)) {
            throw new DuplicateWaiterError(fd, direction);
        }
        this.adopt(task);
        task.status = 'waiting';
        this.registerWaiter(direction, fd, task);
        this.notify();
    }

    private addTimer(task: Task, deadline: number, kind: TimerEntry['kind']): void {
        const entry: TimerEntry = {
            deadline,
            sequence: ++this.sequence,
            index: -1,
            task,
            epoch: task.epoch,
            kind,
        };
        this.timers.push(entry);
        task.cancels.push(() => {
            this.timers.remove(entry);
        });
    }

    private registerWaiter(direction: WaitDirection, fd: Descriptor, task: Task): void {
        const waiters = direction === 'read' ? this.readWaiters : this.writeWaiters;
        if (waiters.has(fd)) {
            throw new DuplicateWaiterError(fd, direction);
        }
        const entry: WaiterEntry = { task, epoch: task.epoch };
        waiters.set(fd, entry);
        task.cancels.push(() => {
            if (waiters.get(fd) === entry) {
                waiters.delete(fd);
            }
        });
    }

    /**
     * Put a task where its latest suspension says it belongs
     */
    private route(task: Task, suspension: Suspension): void {
        switch (suspension.kind) {
            case 'ready':
                this.enqueue(task, resumeWith());
                return;

            case 'sleep':
                task.status = 'waiting';
                this.addTimer(task, suspension.deadline, 'sleep');
                return;

            case 'wait-read':
            case 'wait-write': {
                const direction: WaitDirection = suspension.kind === 'wait-read' ? 'read' : 'write';
                try {
                    this.registerWaiter(direction, suspension.fd, task);
                } catch (error) {
                    this.clearWait(task);
                    this.enqueue(task, resumeThrowing(error));
                    return;
                }
                task.status = 'waiting';
                if (suspension.timeoutAt !== undefined) {
                    this.addTimer(task, suspension.timeoutAt, 'timeout');
                }
                return;
            }

            case 'park':
                this.routePark(task, suspension);
                return;

            case 'done':
            case 'failed':
                this.settle(task, suspension);
                return;

            case 'unstarted':
                throw new MisuseError(`Task ${task.name} reported itself unstarted after a step`);
        }
    }

    private routePark(task: Task, request: ParkRequest): void {
        if (!task.parked) {
            this.clearWait(task);
            this.enqueue(task, resumeThrowing(
                new MisuseError('park requested without a registration; call Scheduler.park() first')
            ));
            return;
        }
        task.status = 'waiting';
        if (request.timeoutAt !== undefined) {
            this.addTimer(task, request.timeoutAt, 'timeout');
        }
    }

    private settle(task: Task, outcome: Outcome): void {
        this.clearWait(task);

        let delivered = 0;
        const joiners = task.joiners;
        task.joiners = [];
        for (const joiner of joiners) {
            if (this.unpark(joiner, outcome)) {
                delivered++;
            }
        }

        const at = this.clock.now();
        if (outcome.kind === 'done') {
            this.stats.completed++;
            this.events.emit({ type: 'task.completed', taskId: task.id, taskName: task.name, at, value: outcome.value });
            this.logger.debug(`completed ${task.name}`);
            return;
        }

        this.stats.failed++;
        const claimed = delivered > 0;
        this.events.emit({
            type: 'task.failed',
            taskId: task.id,
            taskName: task.name,
            at,
            error: outcome.error,
            claimed,
        });
        if (claimed) {
            this.logger.debug(`failed ${task.name}, delivered to ${delivered} joiner(s)`);
            return;
        }

        if (this.config.errorPolicy === 'throw') {
            throw new TaskFailedError(task.id, task.name, outcome.error);
        }
        this.logger.error(`Task ${task.name} failed: ${describeError(outcome.error)}`, outcome.error);
    }
}
