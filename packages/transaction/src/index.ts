import {AsyncLocalStorage} from 'node:async_hooks';
import {resolveOptions, type AbortSignalOptions} from '@nestwise/abort-signal-options';
import {COMPLETED, type Outcome, signaled} from './outcome.js';
import {SyncTransactionScope, TransactionScope, type TransactionScopeOptions} from './scope.js';
import type {AsyncSession, SyncSession} from './session.js';

export * from './characteristics.js';
export * from './errors.js';
export * from './outcome.js';
export * from './prepared-statements.js';
export * from './savepoint-stack.js';
export * from './scope.js';
export * from './session.js';

export type TransactionOptions = TransactionScopeOptions & AbortSignalOptions;

const enclosingSignal = new AsyncLocalStorage<AbortSignal>();
const neverAborted = new AbortController().signal;

/**
 * Runs the callback inside a new transaction scope. The scope commits when the callback
 * resolves and rolls back when it rejects or when the abort signal fired while it ran.
 * Resolves undefined when a Rollback aimed at this scope ended the block.
 *
 * The callback receives the abort signal and is always awaited: an abort never leaves
 * the block running after the exit. Once the signal fired, its reason is what rolls the
 * scope back and what propagates, whatever the block returned or threw. Transactions
 * started inside the callback inherit the signal, so the innermost scope sees the abort
 * first and every scope rolls back in stack order.
 */
export async function transaction<R>(
    session: AsyncSession,
    fn: (scope: TransactionScope, signal: AbortSignal) => Promise<R>,
    options: TransactionOptions = {},
): Promise<R | undefined> {
    const {abortSignal, savepointName, forceRollback} = resolveOptions(options, enclosingSignal.getStore());
    const signal = abortSignal ?? neverAborted;
    const scope = await new TransactionScope(session, {savepointName, forceRollback}).enter();
    let outcome: Outcome = COMPLETED;
    let result: R | undefined = undefined;

    try {
        result = abortSignal === undefined
            ? await fn(scope, signal)
            : await enclosingSignal.run(abortSignal, () => fn(scope, abortSignal));
    } catch (error) {
        outcome = signaled(error);
    }

    if (signal.aborted) {
        outcome = signaled(signal.reason);
    }

    const handled = await scope.exit(outcome);

    if (outcome.kind === 'signaled') {
        if (handled) {
            return undefined;
        }

        throw outcome.signal;
    }

    return result;
}

export function transactionSync<R>(
    session: SyncSession,
    fn: (scope: SyncTransactionScope) => R,
    options: TransactionScopeOptions = {},
): R | undefined {
    const scope = new SyncTransactionScope(session, options).enter();
    let outcome: Outcome = COMPLETED;
    let result: R | undefined = undefined;

    try {
        result = fn(scope);
    } catch (signal) {
        outcome = signaled(signal);
    }

    const handled = scope.exit(outcome);

    if (outcome.kind === 'signaled') {
        if (handled) {
            return undefined;
        }

        throw outcome.signal;
    }

    return result;
}
