/**
 * Scheduler Event Bus - observable lifecycle stream
 *
 * Features:
 * - Typed task lifecycle events on an RxJS Subject
 * - Glob or RegExp subscriptions (`task.*`)
 * - Bounded `take` subscriptions that clean themselves up
 */

import { Subject, Observable, Subscription as RxSubscription } from 'rxjs';
import { filter, take } from 'rxjs/operators';
import { silentLogger, type Logger } from '../logging/logger.js';

interface TaskEventBase {
    taskId: string;
    taskName: string;
    /** Scheduler clock time */
    at: number;
}

export type SchedulerEvent =
    | (TaskEventBase & { type: 'task.spawned' })
    | (TaskEventBase & { type: 'task.completed'; value: unknown })
    | (TaskEventBase & { type: 'task.failed'; error: unknown; claimed: boolean })
    | { type: 'loop.idle'; at: number; parked: number };

export type SchedulerEventType = SchedulerEvent['type'];

export type SchedulerEventHandler = (event: SchedulerEvent) => void;

export class SchedulerEventBus {
    private subject: Subject<SchedulerEvent> = new Subject();
    private subscriptions: Map<string, RxSubscription> = new Map();
    private subIdCounter = 0;

    constructor(private readonly logger: Logger = silentLogger) {}

    /**
     * Raw event stream
     */
    asObservable(): Observable<SchedulerEvent> {
        return this.subject.asObservable();
    }

    emit(event: SchedulerEvent): void {
        this.subject.next(event);
    }

    /**
     * Subscribe to events whose type matches a pattern
     */
    subscribe(pattern: string | RegExp, handler: SchedulerEventHandler): string {
        const id = `sub_${++this.subIdCounter}`;
        const subscription = this.subject.pipe(
            filter(e => matchPattern(pattern, e.type))
        ).subscribe({
            next: (event) => this.deliver(handler, event),
        });

        this.subscriptions.set(id, subscription);
        return id;
    }

    /**
     * Subscribe to a fixed number of matching events
     */
    take(pattern: string | RegExp, count: number, handler: SchedulerEventHandler): string {
        const id = `sub_${++this.subIdCounter}`;

        const subscription = this.subject.pipe(
            filter(e => matchPattern(pattern, e.type)),
            take(count)
        ).subscribe({
            next: (event) => this.deliver(handler, event),
            complete: () => {
                this.subscriptions.delete(id);
            },
        });

        if (!subscription.closed) {
            this.subscriptions.set(id, subscription);
        }
        return id;
    }

    unsubscribe(subscriptionId: string): boolean {
        const sub = this.subscriptions.get(subscriptionId);
        if (sub) {
            sub.unsubscribe();
            this.subscriptions.delete(subscriptionId);
            return true;
        }
        return false;
    }

    getSubscriptionCount(): number {
        return this.subscriptions.size;
    }

    /**
     * Dispose all subscriptions and complete the stream
     */
    dispose(): void {
        for (const sub of this.subscriptions.values()) {
            sub.unsubscribe();
        }
        this.subscriptions.clear();
        this.subject.complete();
    }

    private deliver(handler: SchedulerEventHandler, event: SchedulerEvent): void {
        try {
            handler(event);
        } catch (error) {
            this.logger.error(`Event handler error for ${event.type}:`, error);
        }
    }
}

export function matchPattern(pattern: string | RegExp, eventType: string): boolean {
    if (pattern instanceof RegExp) {
        return pattern.test(eventType);
    }

    // Glob-like: `*` matches any run of characters
    if (pattern.includes('*')) {
        const escaped = pattern.replace(/[.+?^${}()|[\]\\]/g, '\\$&');
        const regex = new RegExp('^' + escaped.replace(/\*/g, '.*') + '$');
        return regex.test(eventType);
    }

    return pattern === eventType;
}
