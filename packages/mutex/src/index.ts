import {StandardError, errorToMessage} from '@nestwise/error-standard';
import type {AbortSignalOptions} from '@nestwise/abort-signal-options';

export type LockOptions = AbortSignalOptions;

/**
 * Serializes work against a single resource, such as the command stream of one database
 * session. Waiters are served in the order they asked for the lock.
 */
export interface StaticMutex {
    tryLock(): Promise<boolean>;
    lock(options?: LockOptions | number): Promise<void>;
    unlock(): Promise<void>;
    isLocked(): boolean;
}

/**
 * Synchronous counterpart of StaticMutex. A single thread can't wait for itself, so a lock
 * that is already held is a failure instead of a wait.
 */
export interface SyncMutex {
    lock(): void;
    unlock(): void;
    isLocked(): boolean;
}

export async function withLock<R>(mutex: StaticMutex, fn: () => Promise<R>, options?: LockOptions | number): Promise<R> {
    await mutex.lock(options);

    try {
        return await fn();
    } finally {
        await mutex.unlock();
    }
}

export function withSyncLock<R>(mutex: SyncMutex, fn: () => R): R {
    mutex.lock();

    try {
        return fn();
    } finally {
        mutex.unlock();
    }
}

export class UnableToAcquireLock extends StandardError {
    static becauseOfError = (id: string, error: unknown) => new UnableToAcquireLock(
        `Unable to acquire lock "${id}" because of error: ${errorToMessage(error)}`,
        'mutex.unable_to_acquire_lock',
        {id},
        error,
    );

    static becauseItIsHeld = (id: string) => new UnableToAcquireLock(
        `Unable to acquire lock "${id}", it is already held`,
        'mutex.lock_already_held',
        {id},
    );
}

export class UnableToReleaseLock extends StandardError {
    static becauseItIsNotHeld = (id: string) => new UnableToReleaseLock(
        `Unable to release lock "${id}", it is not held`,
        'mutex.lock_not_held',
        {id},
    );
}
