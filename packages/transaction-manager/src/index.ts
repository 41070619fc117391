import {StandardError} from '@nestwise/error-standard';
import {type AsyncSession, COMPLETED, Rollback, TransactionScope, signaled} from '@nestwise/transaction';

export interface TransactionManager {
    begin(): Promise<void>,
    inTransaction(): boolean,
    commit(): Promise<void>,
    abort(): Promise<void>,
}

export class NoTransactionToFinish extends StandardError {
    static for = (action: 'commit' | 'abort') => new NoTransactionToFinish(
        `Unable to ${action}, no transaction was begun`,
        'transaction-manager.no_transaction',
        {action},
    );
}

/**
 * For code that can't wrap its work in a block. Every begin opens a scope nested in the previous
 * one; commit and abort close the most recent scope.
 */
export class NestedTransactionManager implements TransactionManager {
    private readonly scopes: TransactionScope[] = [];

    constructor(private readonly session: AsyncSession) {
    }

    async begin(): Promise<void> {
        this.scopes.push(await new TransactionScope(this.session).enter());
    }

    inTransaction(): boolean {
        return this.scopes.length > 0;
    }

    async commit(): Promise<void> {
        await this.innermost('commit').exit(COMPLETED);
    }

    async abort(): Promise<void> {
        const scope = this.innermost('abort');
        await scope.exit(signaled(new Rollback(scope)));
    }

    private innermost(action: 'commit' | 'abort'): TransactionScope {
        const scope = this.scopes.pop();

        if (scope === undefined) {
            throw NoTransactionToFinish.for(action);
        }

        return scope;
    }
}
