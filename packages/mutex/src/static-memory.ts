import {resolveOptions} from '@nestwise/abort-signal-options';
import {type LockOptions, type StaticMutex, UnableToAcquireLock, UnableToReleaseLock} from './index.js';

interface LockWaiter {
    done: boolean;
    resolve: () => void;
    reject: (reason: unknown) => void;
}

export class StaticMutexUsingMemory implements StaticMutex {
    private locked = false;
    private waiters: LockWaiter[] = [];

    constructor(private readonly id: string = 'static') {
    }

    lock(options: LockOptions | number = {}): Promise<void> {
        let abortSignal: AbortSignal | undefined;

        try {
            abortSignal = resolveOptions(typeof options === 'number' ? {timeout: options} : options).abortSignal;
        } catch (reason) {
            return Promise.reject(UnableToAcquireLock.becauseOfError(this.id, reason));
        }

        if (this.tryLockSync()) {
            return Promise.resolve();
        }

        return new Promise<void>((resolve, reject) => {
            const waiter: LockWaiter = {done: false, resolve, reject};
            this.waiters.push(waiter);

            const onAbort = () => {
                if (!waiter.done) {
                    waiter.done = true;
                    reject(UnableToAcquireLock.becauseOfError(this.id, abortSignal?.reason));
                }
            };

            abortSignal?.addEventListener('abort', onAbort, {once: true});
            waiter.resolve = () => {
                abortSignal?.removeEventListener('abort', onAbort);
                waiter.done = true;
                resolve();
            };
        });
    }

    private tryLockSync(): boolean {
        if (this.locked) {
            return false;
        }

        this.locked = true;

        return true;
    }

    async tryLock(): Promise<boolean> {
        return this.tryLockSync();
    }

    isLocked(): boolean {
        return this.locked;
    }

    async unlock(): Promise<void> {
        if (!this.locked) {
            throw UnableToReleaseLock.becauseItIsNotHeld(this.id);
        }

        let waiter = this.waiters.shift();

        while (waiter && waiter.done) {
            waiter = this.waiters.shift();
        }

        if (waiter) {
            // ownership passes straight to the next waiter, the lock stays held
            waiter.resolve();
        } else {
            this.locked = false;
        }
    }
}
