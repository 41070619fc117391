/**
 * Thrown out of a transaction block to roll it back without failing. When a target scope is
 * given, every scope up to and including the target rolls back; the target swallows it.
 */
export class Rollback extends Error {
    constructor(public readonly target?: object) {
        super(target === undefined ? 'Rollback()' : `Rollback(${String(target)})`);
        this.name = 'Rollback';
    }
}

export type Completed = {kind: 'completed'};
export type Signaled = {kind: 'signaled', signal: unknown};
export type Outcome = Completed | Signaled;

export const COMPLETED: Completed = {kind: 'completed'};

export function signaled(signal: unknown): Signaled {
    return {kind: 'signaled', signal};
}

/**
 * Whether the given scope is where the signal of a rolled back block stops propagating.
 */
export function isHandledBy(outcome: Outcome, scope: object): boolean {
    if (outcome.kind === 'completed' || !(outcome.signal instanceof Rollback)) {
        return false;
    }

    const target = outcome.signal.target;

    return target === undefined || target === scope;
}
