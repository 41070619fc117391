import {SavepointStackInvariantViolated} from './errors.js';

/**
 * The savepoints a session has open, innermost last. An empty name marks the unnamed outer
 * transaction. Only transaction scopes mutate the stack, while holding the session lock.
 */
export class SavepointStack {
    private readonly stack: string[] = [];

    push(name: string): void {
        this.stack.push(name);
    }

    /**
     * Removes the top unconditionally. Comparing it to the expected name is up to the caller.
     */
    pop(): string {
        const name = this.stack.pop();

        if (name === undefined) {
            throw SavepointStackInvariantViolated.poppedEmptyStack();
        }

        return name;
    }

    get depth(): number {
        return this.stack.length;
    }

    get isEmpty(): boolean {
        return this.stack.length === 0;
    }

    get top(): string | undefined {
        return this.stack[this.stack.length - 1];
    }

    get names(): readonly string[] {
        return [...this.stack];
    }

    includes(name: string): boolean {
        return this.stack.includes(name);
    }

    assertEmpty(): void {
        if (this.stack.length > 0) {
            throw SavepointStackInvariantViolated.outerTransactionWithOpenSavepoints(this.stack);
        }
    }
}
