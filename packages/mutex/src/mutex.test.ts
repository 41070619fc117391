import {setTimeout} from 'node:timers/promises';
import {StaticMutexUsingMemory} from './static-memory.js';
import {SyncMutexUsingFlag} from './sync.js';
import {UnableToAcquireLock, UnableToReleaseLock, withLock, withSyncLock} from './index.js';

describe('StaticMutexUsingMemory', () => {
    let mutex: StaticMutexUsingMemory;

    beforeEach(() => {
        mutex = new StaticMutexUsingMemory('session');
    });

    test('a lock can be acquired and released', async () => {
        await mutex.lock(50);

        expect(mutex.isLocked()).toEqual(true);

        await mutex.unlock();

        expect(mutex.isLocked()).toEqual(false);
    });

    test('a lock guarantees exclusive access when asked concurrently', async () => {
        const result: number[] = [];
        const promises: Promise<void>[] = [];

        for (let i = 0; i < 5; i++) {
            promises.push((async (index: number) => {
                await mutex.lock(500);
                result.push(index);
                await setTimeout(10 - index);
                result.push(index);
                await mutex.unlock();
            })(i));
        }

        await Promise.all(promises);

        expect(result).toEqual([
            0, 0,
            1, 1,
            2, 2,
            3, 3,
            4, 4,
        ]);
    });

    test('acquiring a lock after a timeout', async () => {
        await mutex.lock(50);

        await expect(mutex.lock(20)).rejects.toThrow(UnableToAcquireLock);

        await mutex.unlock();

        await expect(mutex.lock(50)).resolves.toEqual(undefined);

        await mutex.unlock();
    });

    test('a timed out waiter does not receive the lock later', async () => {
        await mutex.lock();
        await expect(mutex.lock(10)).rejects.toThrow(UnableToAcquireLock);

        await mutex.unlock();

        expect(mutex.isLocked()).toEqual(false);
    });

    test('waiting can be cancelled with an abort signal', async () => {
        const controller = new AbortController();
        await mutex.lock();

        const waiting = mutex.lock({abortSignal: controller.signal});
        controller.abort(new Error('cancelled by caller'));

        await expect(waiting).rejects.toThrow('Unable to acquire lock "session" because of error: cancelled by caller');

        await mutex.unlock();
    });

    test('an already aborted signal never acquires the lock', async () => {
        const controller = new AbortController();
        controller.abort(new Error('too late'));

        await expect(mutex.lock({abortSignal: controller.signal})).rejects.toThrow(UnableToAcquireLock);
        expect(mutex.isLocked()).toEqual(false);
    });

    test('a locked mutex can try but will not acquire a lock', async () => {
        await mutex.lock(50);

        const locked = await mutex.tryLock();

        expect(locked).toBe(false);

        await mutex.unlock();
    });

    test('locks that are not acquired cannot be released', async () => {
        await expect(mutex.unlock()).rejects.toThrow(UnableToReleaseLock);
    });

    test('withLock releases the lock when the callback fails', async () => {
        await expect(withLock(mutex, async () => {
            throw new Error('oops');
        })).rejects.toThrow('oops');

        expect(mutex.isLocked()).toEqual(false);
    });
});

describe('SyncMutexUsingFlag', () => {
    test('a held lock cannot be acquired again', () => {
        const mutex = new SyncMutexUsingFlag('session');
        mutex.lock();

        expect(() => mutex.lock()).toThrow('Unable to acquire lock "session", it is already held');

        mutex.unlock();
        expect(mutex.isLocked()).toEqual(false);
    });

    test('locks that are not acquired cannot be released', () => {
        expect(() => new SyncMutexUsingFlag().unlock()).toThrow(UnableToReleaseLock);
    });

    test('withSyncLock returns the callback value and releases the lock', () => {
        const mutex = new SyncMutexUsingFlag();

        expect(withSyncLock(mutex, () => 42)).toEqual(42);
        expect(mutex.isLocked()).toEqual(false);
    });
});
