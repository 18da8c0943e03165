import { Scheduler, loadConfig, type TaskBody } from '../src/index.js';

async function main() {
    const scheduler = Scheduler.fromConfig(loadConfig());

    function* countdown(label: string, from: number, intervalMs: number): TaskBody<void> {
        for (let n = from; n > 0; n--) {
            console.log(`${label}: T-minus ${n}`);
            yield* scheduler.sleep(intervalMs);
        }
        console.log(`${label}: liftoff`);
    }

    scheduler.spawn(countdown('A', 5, 200), { name: 'countdown-a' });
    scheduler.spawn(countdown('B', 3, 100), { name: 'countdown-b' });

    const started = performance.now();
    await scheduler.run();

    const stats = scheduler.getStats();
    console.log(`\nDone in ${(performance.now() - started).toFixed(0)}ms`);
    console.log(`steps=${stats.steps} drains=${stats.drains} polls=${stats.polls}`);
}

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
