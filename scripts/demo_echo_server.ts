import { createConnection, createServer, type Socket } from 'net';
import {
    Scheduler,
    StreamConnection,
    StreamMultiplexer,
    loadConfig,
    type TaskBody,
} from '../src/index.js';

const PORT = Number(process.env['ECHO_PORT'] ?? 25000);
const LINES = ['hello', 'cooperative', 'world'];

async function main() {
    const multiplexer = new StreamMultiplexer();
    const scheduler = Scheduler.fromConfig(loadConfig(), { multiplexer });

    function* echo(socket: Socket): TaskBody<number> {
        const conn = new StreamConnection(scheduler, multiplexer, socket);
        let total = 0;
        try {
            while (true) {
                const data = yield* conn.recv(1024);
                if (data.length === 0) break;
                total += yield* conn.sendAll(data);
            }
        } finally {
            conn.close();
        }
        return total;
    }

    function* client(done: () => void): TaskBody<void> {
        const socket = createConnection({ port: PORT, host: '127.0.0.1' });
        const conn = new StreamConnection(scheduler, multiplexer, socket);
        try {
            for (const line of LINES) {
                yield* conn.sendAll(`${line}\n`);
                const reply = yield* conn.recv(1024, 5000);
                console.log(`client received: ${reply.toString().trim()}`);
            }
        } finally {
            conn.close();
            done();
        }
    }

    const release = scheduler.hold();
    const server = createServer((socket) => {
        console.log(`connection from ${socket.remoteAddress ?? 'unknown'}`);
        scheduler.spawn(echo(socket), { name: `echo-${socket.remotePort ?? 0}` });
    });

    server.listen(PORT, '127.0.0.1', () => {
        console.log(`echo server listening on 127.0.0.1:${PORT}`);
        scheduler.spawn(client(() => {
            server.close();
            release();
        }), { name: 'client' });
    });

    await scheduler.run();
    console.log('echo server stopped');
}

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
