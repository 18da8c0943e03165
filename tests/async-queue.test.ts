import { describe, it, expect, beforeEach } from 'vitest';
import { Scheduler } from '../src/core/scheduler.js';
import { VirtualClock } from '../src/core/clock.js';
import { MisuseError, QueueClosedError, WaitTimeoutError } from '../src/core/errors.js';
import type { TaskBody } from '../src/core/suspension.js';
import { VirtualMultiplexer } from '../src/multiplexer/virtual-multiplexer.js';
import { AsyncQueue } from '../src/sync/async-queue.js';
import { silentLogger } from '../src/logging/logger.js';

describe('AsyncQueue', () => {
    let clock: VirtualClock;
    let scheduler: Scheduler;

    beforeEach(() => {
        clock = new VirtualClock();
        scheduler = new Scheduler({
            clock,
            multiplexer: new VirtualMultiplexer(clock),
            logger: silentLogger,
        });
    });

    function* collectUntilClosed<T>(queue: AsyncQueue<T>, out: T[]): TaskBody<unknown> {
        while (true) {
            try {
                out.push(yield* queue.get());
            } catch (error) {
                return error;
            }
        }
    }

    describe('ordering', () => {
        it('returns buffered items in FIFO order', async () => {
            const queue = new AsyncQueue<number>(scheduler);
            const got: number[] = [];

            queue.put(1);
            queue.put(2);
            queue.put(3);
            expect(queue.size).toBe(3);

            function* consumer(): TaskBody<void> {
                for (let i = 0; i < 3; i++) {
                    got.push(yield* queue.get());
                }
            }
            scheduler.spawn(consumer());
            await scheduler.run();

            expect(got).toEqual([1, 2, 3]);
            expect(scheduler.getStats().steps).toBe(1);
        });

        it('hands items to parked getters in the order they parked', async () => {
            const queue = new AsyncQueue<string>(scheduler);
            const got: string[] = [];

            function* consumer(name: string): TaskBody<void> {
                const item = yield* queue.get();
                got.push(`${name}:${item}`);
            }
            function* producer(): TaskBody<void> {
                queue.put('a');
                queue.put('b');
            }

            scheduler.spawn(consumer('first'));
            scheduler.spawn(consumer('second'));
            scheduler.spawn(producer());
            await scheduler.run();

            expect(got).toEqual(['first:a', 'second:b']);
            expect(queue.size).toBe(0);
            expect(queue.waitingGetters).toBe(0);
        });
    });

    describe('close', () => {
        it('drains buffered items before failing', async () => {
            const queue = new AsyncQueue<string>(scheduler);
            const got: string[] = [];

            queue.put('x');
            queue.put('y');
            queue.close();

            const task = scheduler.spawn(collectUntilClosed(queue, got));
            await scheduler.run();

            expect(got).toEqual(['x', 'y']);
            expect(task.outcome).toEqual({ kind: 'done', value: new QueueClosedError() });
            expect(queue.isClosed).toBe(true);
        });

        it('wakes parked getters when closed empty', async () => {
            const queue = new AsyncQueue<string>(scheduler);
            const got: string[] = [];

            const task = scheduler.spawn(collectUntilClosed(queue, got));
            scheduler.callLater(10, () => queue.close());
            await scheduler.run();

            expect(got).toEqual([]);
            const outcome = task.outcome;
            expect(outcome?.kind).toBe('done');
            if (outcome?.kind === 'done') {
                expect(outcome.value).toBeInstanceOf(QueueClosedError);
            }
            expect(queue.waitingGetters).toBe(0);
            expect(clock.now()).toBe(10);
        });

        it('fails each parked getter exactly once when closed', async () => {
            const queue = new AsyncQueue<string>(scheduler);
            const failures: Array<{ name: string; error: unknown }> = [];

            function* getter(name: string): TaskBody<void> {
                try {
                    yield* queue.get();
                } catch (error) {
                    failures.push({ name, error });
                }
            }

            scheduler.spawn(getter('g1'));
            scheduler.spawn(getter('g2'));
            scheduler.callLater(10, () => queue.close());
            await scheduler.run();

            expect(failures.map(f => f.name)).toEqual(['g1', 'g2']);
            expect(failures.every(f => f.error instanceof QueueClosedError)).toBe(true);
            expect(queue.waitingGetters).toBe(0);
        });

        it('fails get() immediately on a closed empty queue', async () => {
            const queue = new AsyncQueue<string>(scheduler);
            let caught: unknown;
            queue.close();

            function* consumer(): TaskBody<void> {
                try {
                    yield* queue.get();
                } catch (error) {
                    caught = error;
                }
            }
            scheduler.spawn(consumer());
            await scheduler.run();

            expect(caught).toBeInstanceOf(QueueClosedError);
            expect(scheduler.getStats().steps).toBe(1);
        });

        it('rejects put() after close', () => {
            const queue = new AsyncQueue<string>(scheduler);
            queue.close();

            expect(() => queue.put('late')).toThrow('put() on a closed queue');
            expect(queue.pending).toBe(0);
        });
    });

    it('moves items from a sleeping producer to a consumer until close', async () => {
        const queue = new AsyncQueue<number>(scheduler);
        const got: number[] = [];

        function* producer(): TaskBody<void> {
            for (let i = 0; i < 3; i++) {
                queue.put(i);
                yield* scheduler.sleep(10);
            }
            queue.close();
        }

        const consumer = scheduler.spawn(collectUntilClosed(queue, got));
        scheduler.spawn(producer());
        await scheduler.run();

        expect(got).toEqual([0, 1, 2]);
        expect(consumer.status).toBe('done');
        expect(clock.now()).toBe(30);
    });

    describe('timeouts', () => {
        it('times out a get() and ignores the late item', async () => {
            const queue = new AsyncQueue<string>(scheduler);
            let caught: unknown;
            let gettersAfter = -1;

            function* consumer(): TaskBody<void> {
                try {
                    yield* queue.get(50);
                } catch (error) {
                    caught = error;
                    gettersAfter = queue.waitingGetters;
                }
            }

            scheduler.spawn(consumer());
            scheduler.callLater(80, () => queue.put('late'));
            await scheduler.run();

            expect(caught).toBeInstanceOf(WaitTimeoutError);
            expect(caught).toMatchObject({ message: 'Wait timed out after 50ms' });
            expect(gettersAfter).toBe(0);
            expect(queue.size).toBe(1);
            expect(clock.now()).toBe(80);
        });

        it('returns an item that arrives before the timeout', async () => {
            const queue = new AsyncQueue<string>(scheduler);
            let got: string | undefined;

            function* consumer(): TaskBody<void> {
                got = yield* queue.get(50);
            }

            scheduler.spawn(consumer());
            scheduler.callLater(20, () => queue.put('early'));
            await scheduler.run();

            expect(got).toBe('early');
            expect(scheduler.getStats().timers).toBe(0);
            expect(clock.now()).toBe(20);
        });
    });

    describe('taskDone/join', () => {
        it('wakes join() once every item is acknowledged', async () => {
            const queue = new AsyncQueue<string>(scheduler);
            let joinedAt = -1;

            for (const item of ['a', 'b', 'c']) {
                queue.put(item);
            }

            function* joiner(): TaskBody<void> {
                yield* queue.join();
                joinedAt = clock.now();
            }
            function* worker(): TaskBody<void> {
                for (let i = 0; i < 3; i++) {
                    yield* queue.get();
                    yield* scheduler.sleep(10);
                    queue.taskDone();
                }
            }

            scheduler.spawn(joiner());
            scheduler.spawn(worker());
            await scheduler.run();

            expect(joinedAt).toBe(30);
            expect(queue.pending).toBe(0);
        });

        it('join() returns at once when nothing is pending', async () => {
            const queue = new AsyncQueue<string>(scheduler);
            let joined = false;

            function* joiner(): TaskBody<void> {
                yield* queue.join();
                joined = true;
            }
            scheduler.spawn(joiner());
            await scheduler.run();

            expect(joined).toBe(true);
            expect(scheduler.getStats().parked).toBe(0);
        });

        it('rejects taskDone() without a matching put()', () => {
            const queue = new AsyncQueue<string>(scheduler);

            expect(() => queue.taskDone()).toThrow(MisuseError);
        });
    });
});
