import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SchedulerEventBus, matchPattern, type SchedulerEvent } from '../src/events/bus.js';
import { createLogger, type Logger } from '../src/logging/logger.js';

function spawned(taskName: string): SchedulerEvent {
    return { type: 'task.spawned', taskId: `id-${taskName}`, taskName, at: 0 };
}

describe('matchPattern', () => {
    it('matches exact names, globs and regular expressions', () => {
        expect(matchPattern('loop.idle', 'loop.idle')).toBe(true);
        expect(matchPattern('task.*', 'task.failed')).toBe(true);
        expect(matchPattern('task.*', 'loop.idle')).toBe(false);
        expect(matchPattern(/completed|failed/, 'task.failed')).toBe(true);
    });

    it('treats dots in globs literally', () => {
        expect(matchPattern('task.*', 'taskXfailed')).toBe(false);
    });
});

describe('SchedulerEventBus', () => {
    let logger: Logger;
    let bus: SchedulerEventBus;

    beforeEach(() => {
        logger = { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
        bus = new SchedulerEventBus(logger);
    });

    afterEach(() => {
        bus.dispose();
    });

    it('delivers matching events to subscribers', () => {
        const names: string[] = [];
        const id = bus.subscribe('task.spawned', (event) => {
            if (event.type === 'task.spawned') names.push(event.taskName);
        });

        bus.emit(spawned('a'));
        bus.emit({ type: 'loop.idle', at: 1, parked: 0 });
        bus.emit(spawned('b'));

        expect(id).toBe('sub_1');
        expect(names).toEqual(['a', 'b']);
    });

    it('stops a take() subscription after the count', () => {
        const names: string[] = [];
        bus.take('task.*', 1, (event) => {
            if (event.type === 'task.spawned') names.push(event.taskName);
        });
        expect(bus.getSubscriptionCount()).toBe(1);

        bus.emit(spawned('a'));
        bus.emit(spawned('b'));

        expect(names).toEqual(['a']);
        expect(bus.getSubscriptionCount()).toBe(0);
    });

    it('unsubscribes by id', () => {
        const handler = vi.fn();
        const id = bus.subscribe('*', handler);

        expect(bus.unsubscribe(id)).toBe(true);
        expect(bus.unsubscribe(id)).toBe(false);
        bus.emit(spawned('a'));

        expect(handler).not.toHaveBeenCalled();
    });

    it('logs handler errors and keeps delivering', () => {
        const failure = new Error('handler broke');
        const seen: string[] = [];
        bus.subscribe('*', () => {
            throw failure;
        });
        bus.subscribe('*', (event) => seen.push(event.type));

        bus.emit({ type: 'loop.idle', at: 0, parked: 0 });
        bus.emit({ type: 'loop.idle', at: 1, parked: 0 });

        expect(seen).toEqual(['loop.idle', 'loop.idle']);
        expect(logger.error).toHaveBeenCalledTimes(2);
        expect(logger.error).toHaveBeenCalledWith('Event handler error for loop.idle:', failure);
    });

    it('exposes the raw stream', () => {
        const types: string[] = [];
        const subscription = bus.asObservable().subscribe((event) => types.push(event.type));

        bus.emit(spawned('a'));
        subscription.unsubscribe();
        bus.emit(spawned('b'));

        expect(types).toEqual(['task.spawned']);
    });
});

describe('createLogger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('writes scoped lines at or above the level', () => {
        const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const logger = createLogger('loop', 'warn');

        logger.info('hidden');
        logger.debug('hidden');
        logger.warn('careful');
        logger.error('broken', 42);

        expect(spy).toHaveBeenCalledTimes(2);
        expect(spy).toHaveBeenNthCalledWith(1, '[loop] WARN careful');
        expect(spy).toHaveBeenNthCalledWith(2, '[loop] ERROR broken', 42);
    });

    it('writes nothing when silent', () => {
        const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

        createLogger('quiet', 'silent').error('nope');

        expect(spy).not.toHaveBeenCalled();
    });
});
