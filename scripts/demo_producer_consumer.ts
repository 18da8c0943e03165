import { AsyncQueue, QueueClosedError, Scheduler, loadConfig, type TaskBody } from '../src/index.js';

async function main() {
    const scheduler = Scheduler.fromConfig(loadConfig());
    const queue = new AsyncQueue<number>(scheduler);

    function* producer(count: number): TaskBody<void> {
        for (let i = 0; i < count; i++) {
            console.log(`produced ${i}`);
            queue.put(i);
            yield* scheduler.sleep(100);
        }
        queue.close();
        console.log('producer closed the queue');
    }

    function* consumer(name: string): TaskBody<number> {
        let handled = 0;
        while (true) {
            let item: number;
            try {
                item = yield* queue.get();
            } catch (error) {
                if (error instanceof QueueClosedError) break;
                throw error;
            }
            console.log(`${name} consumed ${item}`);
            handled++;
            queue.taskDone();
        }
        return handled;
    }

    function* supervisor(): TaskBody<void> {
        const workers = [
            scheduler.spawn(consumer('c1'), { name: 'consumer-1' }),
            scheduler.spawn(consumer('c2'), { name: 'consumer-2' }),
        ];
        scheduler.spawn(producer(6), { name: 'producer' });

        for (const worker of workers) {
            const handled = yield* scheduler.join(worker);
            console.log(`${worker.name} handled ${handled} item(s)`);
        }
    }

    scheduler.spawn(supervisor(), { name: 'supervisor' });
    await scheduler.run();
}

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
