import {StandardError} from '@nestwise/error-standard';

export class InvalidTransactionScopeUsage extends StandardError {
    static alreadyEntered = (scope: string) => new InvalidTransactionScopeUsage(
        `Transaction scopes can be entered only once, ${scope} was already entered`,
        'transaction.scope_already_entered',
        {scope},
    );

    static alreadyExited = (scope: string) => new InvalidTransactionScopeUsage(
        `Transaction scopes can be exited only once, ${scope} was already exited`,
        'transaction.scope_already_exited',
        {scope},
    );

    static notEntered = (scope: string) => new InvalidTransactionScopeUsage(
        `Unable to exit ${scope}, it was never entered`,
        'transaction.scope_not_entered',
        {scope},
    );
}

/**
 * Raised when a scope is closed while it is not the innermost open scope of its session. The
 * savepoint stack is already popped at that point, so the session can't be trusted anymore.
 */
export class OutOfOrderTransactionNesting extends StandardError {
    static detected = (scope: string, action: 'commit' | 'roll back', expected: string, actual: string) => {
        const other = actual === '' ? 'the top-level transaction' : `the savepoint "${actual}"`;

        return new OutOfOrderTransactionNesting(
            `Transactions not correctly nested: ${scope} would ${action} in the wrong order compared to ${other}`,
            'transaction.out_of_order_nesting',
            {expected, actual, action},
        );
    };
}

export class SavepointStackInvariantViolated extends StandardError {
    static outerTransactionWithOpenSavepoints = (names: readonly string[]) => new SavepointStackInvariantViolated(
        `Expected no open savepoints for an outer transaction, found ${names.length}: ${names.map(n => JSON.stringify(n)).join(', ')}`,
        'transaction.stack_invariant_violated',
        {names: [...names]},
    );

    static poppedEmptyStack = () => new SavepointStackInvariantViolated(
        'Unable to pop a savepoint, the stack is empty',
        'transaction.stack_invariant_violated',
        {names: []},
    );
}
