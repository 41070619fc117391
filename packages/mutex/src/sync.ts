import {type SyncMutex, UnableToAcquireLock, UnableToReleaseLock} from './index.js';

export class SyncMutexUsingFlag implements SyncMutex {
    private locked = false;

    constructor(private readonly id: string = 'static') {
    }

    lock(): void {
        if (this.locked) {
            throw UnableToAcquireLock.becauseItIsHeld(this.id);
        }

        this.locked = true;
    }

    unlock(): void {
        if (!this.locked) {
            throw UnableToReleaseLock.becauseItIsNotHeld(this.id);
        }

        this.locked = false;
    }

    isLocked(): boolean {
        return this.locked;
    }
}
