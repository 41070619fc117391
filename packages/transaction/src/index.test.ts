import {setTimeout} from 'node:timers/promises';
import {Rollback, transaction, transactionSync} from './index.js';
import {FakeServer, FakeSession, FakeSyncSession} from './test-tooling.js';

describe('transaction', () => {
    let server: FakeServer;
    let session: FakeSession;

    beforeEach(() => {
        server = new FakeServer();
        session = new FakeSession(server);
    });

    test('a completed block commits and returns its value', async () => {
        const result = await transaction(session, async () => {
            return transaction(session, async scope => {
                expect(scope.savepointName).toEqual('x');

                return 42;
            }, {savepointName: 'x'});
        });

        expect(result).toEqual(42);
        expect(server.batches).toEqual(['BEGIN', 'SAVEPOINT "x"', 'RELEASE SAVEPOINT "x"', 'COMMIT']);
    });

    test('a failing block rolls back every level and rethrows', async () => {
        await expect(transaction(session, async () => {
            await transaction(session, async () => {
                throw new Error('boom');
            }, {savepointName: 'x'});
        })).rejects.toThrow('boom');

        expect(server.batches).toEqual([
            'BEGIN',
            'SAVEPOINT "x"',
            'ROLLBACK TO "x"; RELEASE SAVEPOINT "x"',
            'ROLLBACK',
        ]);
        expect(session.savepoints.isEmpty).toEqual(true);
    });

    test('the stack returns to its previous depth after every block', async () => {
        const depths: number[] = [];

        await transaction(session, async () => {
            depths.push(session.savepoints.depth);

            await transaction(session, async () => {
                depths.push(session.savepoints.depth);
                await transaction(session, async () => {
                    depths.push(session.savepoints.depth);
                });
                depths.push(session.savepoints.depth);
            });

            depths.push(session.savepoints.depth);
        });

        depths.push(session.savepoints.depth);

        expect(depths).toEqual([1, 2, 3, 2, 1, 0]);
    });

    test('an untargeted rollback only ends the innermost block', async () => {
        let continued = false;

        const result = await transaction(session, async () => {
            const inner = await transaction(session, async () => {
                throw new Rollback();
            });
            continued = true;

            return inner;
        });

        expect(result).toBeUndefined();
        expect(continued).toEqual(true);
        expect(server.batches).toEqual([
            'BEGIN',
            'SAVEPOINT "_tx_2"',
            'ROLLBACK TO "_tx_2"; RELEASE SAVEPOINT "_tx_2"',
            'COMMIT',
        ]);
    });

    test('a rollback aimed at an outer block unwinds up to that block', async () => {
        let continued = false;

        const result = await transaction(session, async outer => {
            await transaction(session, async () => {
                throw new Rollback(outer);
            });
            continued = true;
        });

        expect(result).toBeUndefined();
        expect(continued).toEqual(false);
        expect(server.batches).toEqual([
            'BEGIN',
            'SAVEPOINT "_tx_2"',
            'ROLLBACK TO "_tx_2"; RELEASE SAVEPOINT "_tx_2"',
            'ROLLBACK',
        ]);
    });

    test('force rollback discards a completed block but keeps its value', async () => {
        const result = await transaction(session, async () => 'value', {forceRollback: true});

        expect(result).toEqual('value');
        expect(server.batches).toEqual(['BEGIN', 'ROLLBACK']);
    });

    test('a rollback failure does not mask the error of the block', async () => {
        server.failWhen('ROLLBACK', new Error('connection lost'));

        await expect(transaction(session, async () => {
            throw new Error('constraint violated');
        })).rejects.toThrow('constraint violated');

        expect(session.logger.warnings()).toHaveLength(1);
        expect(session.logger.warnings()[0].args[1]).toEqual('connection lost');
    });

    test('an aborted block is rolled back before the abort propagates', async () => {
        const controller = new AbortController();
        const reason = new Error('request cancelled');

        const running = transaction(session, async () => {
            await setTimeout(50);
        }, {abortSignal: controller.signal});

        await setTimeout(5);
        controller.abort(reason);

        await expect(running).rejects.toBe(reason);
        expect(server.batches).toEqual(['BEGIN', 'ROLLBACK']);
        expect(session.savepoints.isEmpty).toEqual(true);
        expect(session.lock.isLocked()).toEqual(false);
    });

    test('a timed out block is rolled back', async () => {
        await expect(transaction(session, async () => {
            await setTimeout(50);
        }, {timeout: 5})).rejects.toMatchObject({name: 'TimeoutError'});

        expect(server.batches).toEqual(['BEGIN', 'ROLLBACK']);
    });

    test('an already aborted signal never begins', async () => {
        await expect(transaction(session, async () => 1, {abortSignal: AbortSignal.abort('too late')}))
            .rejects.toEqual('too late');

        expect(server.batches).toEqual([]);
    });

    test('cancelling an outer transaction rolls back the open inner one first', async () => {
        await expect(transaction(session, async () => {
            await transaction(session, async () => {
                await setTimeout(50);
            });
        }, {timeout: 5})).rejects.toMatchObject({name: 'TimeoutError'});

        expect(server.batches).toEqual([
            'BEGIN',
            'SAVEPOINT "_tx_2"',
            'ROLLBACK TO "_tx_2"; RELEASE SAVEPOINT "_tx_2"',
            'ROLLBACK',
        ]);
        expect(session.savepoints.isEmpty).toEqual(true);
        expect(server.status).toEqual('idle');
    });

    test('work the block does after the abort still lands before the rollback', async () => {
        await expect(transaction(session, async () => {
            await setTimeout(20);
            await session.execute('INSERT INTO t VALUES (1)');
        }, {timeout: 5})).rejects.toMatchObject({name: 'TimeoutError'});

        expect(server.batches).toEqual(['BEGIN', 'INSERT INTO t VALUES (1)', 'ROLLBACK']);
        expect(server.status).toEqual('idle');
    });

    test('the block receives the signal to stop early', async () => {
        const controller = new AbortController();
        let seen: AbortSignal | undefined;

        const running = transaction(session, async (_scope, signal) => {
            seen = signal;
            await setTimeout(1_000, undefined, {signal});
        }, {abortSignal: controller.signal});

        await setTimeout(5);
        controller.abort('stop now');

        await expect(running).rejects.toEqual('stop now');
        expect(seen?.aborted).toEqual(true);
        expect(server.batches).toEqual(['BEGIN', 'ROLLBACK']);
    });

    test('a block without a signal to inherit gets one that never fires', async () => {
        const aborted = await transaction(session, async (_scope, signal) => signal.aborted);

        expect(aborted).toEqual(false);
        expect(server.batches).toEqual(['BEGIN', 'COMMIT']);
    });
});

describe('transactionSync', () => {
    test('nested blocks commit', () => {
        const server = new FakeServer();
        const session = new FakeSyncSession(server);

        const result = transactionSync(session, () => transactionSync(session, () => 'done'));

        expect(result).toEqual('done');
        expect(server.batches).toEqual(['BEGIN', 'SAVEPOINT "_tx_2"', 'RELEASE SAVEPOINT "_tx_2"', 'COMMIT']);
    });

    test('errors roll back and propagate', () => {
        const server = new FakeServer();
        const session = new FakeSyncSession(server);

        expect(() => transactionSync(session, () => {
            throw new Error('boom');
        })).toThrow('boom');
        expect(server.batches).toEqual(['BEGIN', 'ROLLBACK']);
    });

    test('an explicit rollback is swallowed', () => {
        const session = new FakeSyncSession();

        expect(transactionSync(session, scope => {
            throw new Rollback(scope);
        })).toBeUndefined();
        expect(session.savepoints.isEmpty).toEqual(true);
    });
});
