/**
 * Core Module - tasks, suspension protocol and the scheduler loop
 */

export {
    Scheduler,
    type SchedulerOptions,
    type SchedulerStats,
} from './scheduler.js';

export {
    Task,
    type TaskStatus,
    type TaskOptions,
    type ParkToken,
} from './task.js';

export {
    TIMED_OUT,
    isTerminal,
    isTimedOut,
    resumeThrowing,
    resumeWith,
    type Descriptor,
    type Op,
    type Outcome,
    type ParkRequest,
    type ReadyRequest,
    type Resume,
    type SleepRequest,
    type Suspension,
    type SuspendRequest,
    type TaskBody,
    type TimedOut,
    type WaitReadRequest,
    type WaitWriteRequest,
} from './suspension.js';

export {
    CoopLoopError,
    DeadlockError,
    DuplicateWaiterError,
    MisuseError,
    QueueClosedError,
    TaskFailedError,
    WaitTimeoutError,
    type WaitDirection,
} from './errors.js';

export { monotonicClock, VirtualClock, type Clock } from './clock.js';
export { TimerHeap, type HeapEntry } from './timer-heap.js';
