import {errorToMessage} from '@nestwise/error-standard';
import {withLock, withSyncLock} from '@nestwise/mutex';
import {InvalidTransactionScopeUsage, OutOfOrderTransactionNesting, SavepointStackInvariantViolated} from './errors.js';
import {type Outcome, Rollback, isHandledBy} from './outcome.js';
import type {AsyncSession, SessionBase, SyncSession} from './session.js';

export type TransactionScopeOptions = {
    savepointName?: string,
    forceRollback?: boolean,
};

export type TransactionScopeStatus = 'inactive' | 'active' | 'terminated';

/**
 * One level of transaction nesting: the outer transaction when the session was idle on entry,
 * a savepoint otherwise. The command text and bookkeeping live here; subclasses decide how the
 * commands reach the session.
 */
export abstract class BaseTransactionScope<Session extends SessionBase> {
    public readonly forceRollback: boolean;
    private name: string;
    private entered = false;
    private exited = false;
    private outerTransaction = false;

    constructor(
        public readonly session: Session,
        options: TransactionScopeOptions = {},
    ) {
        this.name = options.savepointName ?? '';
        this.forceRollback = options.forceRollback ?? false;
    }

    /**
     * Empty for an unnamed outer transaction. Inner scopes without an explicit name get one
     * when they are entered.
     */
    get savepointName(): string {
        return this.name;
    }

    get isOuterTransaction(): boolean {
        return this.outerTransaction;
    }

    get status(): TransactionScopeStatus {
        if (!this.entered) {
            return 'inactive';
        }

        return this.exited ? 'terminated' : 'active';
    }

    toString(): string {
        const name = this.name ? `"${this.name}" ` : '';

        return `<${this.constructor.name} ${name}(${this.status}) ${this.session.describe()}>`;
    }

    protected prepareEntry(): string {
        if (this.entered) {
            throw InvalidTransactionScopeUsage.alreadyEntered(this.toString());
        }

        this.entered = true;
        this.pushSavepoint();

        const commands: string[] = [];

        if (this.outerTransaction) {
            commands.push(this.session.transactionStartCommand());
        }

        if (this.name) {
            commands.push(`SAVEPOINT ${this.session.quoteIdentifier(this.name)}`);
        }

        return commands.join('; ');
    }

    /**
     * The entry batch never reached the server, so the scope never opened.
     */
    protected abandonEntry(): void {
        if (this.session.savepoints.top === this.name) {
            this.session.savepoints.pop();
        }

        this.exited = true;
    }

    protected shouldCommit(outcome: Outcome): boolean {
        if (!this.entered) {
            throw InvalidTransactionScopeUsage.notEntered(this.toString());
        }

        if (this.exited) {
            throw InvalidTransactionScopeUsage.alreadyExited(this.toString());
        }

        return outcome.kind === 'completed' && !this.forceRollback;
    }

    protected prepareCommit(): string {
        this.popSavepoint('commit');

        const commands: string[] = [];

        if (this.name && !this.outerTransaction) {
            commands.push(`RELEASE SAVEPOINT ${this.session.quoteIdentifier(this.name)}`);
        }

        if (this.outerTransaction) {
            this.session.savepoints.assertEmpty();
            commands.push('COMMIT');
        }

        return commands.join('; ');
    }

    protected prepareRollback(outcome: Outcome): string {
        if (outcome.kind === 'signaled' && outcome.signal instanceof Rollback) {
            this.session.logger.debug('%s: explicit rollback from %O', this.session.describe(), outcome.signal);
        }

        this.popSavepoint('roll back');

        const commands: string[] = [];

        if (this.name && !this.outerTransaction) {
            const name = this.session.quoteIdentifier(this.name);
            commands.push(`ROLLBACK TO ${name}; RELEASE SAVEPOINT ${name}`);
        }

        if (this.outerTransaction) {
            this.session.savepoints.assertEmpty();
            commands.push('ROLLBACK');
        }

        const {cleared, maintenanceCommands} = this.session.preparedStatements.invalidate();

        if (cleared) {
            commands.push(...maintenanceCommands);
        }

        return commands.join('; ');
    }

    protected isHandled(outcome: Outcome): boolean {
        return isHandledBy(outcome, this);
    }

    /**
     * Nesting corruption always surfaces. Anything else that breaks during a rollback must not
     * clobber the signal that caused the rollback, so it is only logged.
     */
    protected recoverFromRollbackFailure(error: unknown): false {
        if (error instanceof OutOfOrderTransactionNesting || error instanceof SavepointStackInvariantViolated) {
            throw error;
        }

        this.session.logger.warn('error ignored in rollback of %s: %s', this.toString(), errorToMessage(error));

        return false;
    }

    private pushSavepoint(): void {
        const savepoints = this.session.savepoints;
        this.outerTransaction = this.session.transactionStatus() === 'idle';

        if (this.outerTransaction) {
            // an outer transaction may still carry a name, it then also opens a savepoint
            savepoints.assertEmpty();
        } else if (!this.name) {
            this.name = this.synthesizeName();
        }

        savepoints.push(this.name);
    }

    private synthesizeName(): string {
        const savepoints = this.session.savepoints;
        let sequence = savepoints.depth + 1;
        let name = `${this.session.savepointPrefix}${sequence}`;

        // explicit names may already use the synthesized pattern
        while (savepoints.includes(name)) {
            sequence += 1;
            name = `${this.session.savepointPrefix}${sequence}`;
        }

        return name;
    }

    private popSavepoint(action: 'commit' | 'roll back'): void {
        const popped = this.session.savepoints.pop();
        this.exited = true;

        if (popped !== this.name) {
            throw OutOfOrderTransactionNesting.detected(this.toString(), action, this.name, popped);
        }
    }
}

export class TransactionScope extends BaseTransactionScope<AsyncSession> {
    async enter(): Promise<this> {
        await withLock(this.session.lock, async () => {
            const batch = this.prepareEntry();

            try {
                await this.session.execute(batch);
            } catch (error) {
                this.abandonEntry();
                throw error;
            }
        });

        return this;
    }

    /**
     * Resolves true when the outcome's signal was handled by this scope and should not
     * propagate any further.
     */
    exit(outcome: Outcome): Promise<boolean> {
        return withLock(this.session.lock, async () => {
            if (this.shouldCommit(outcome)) {
                await this.session.execute(this.prepareCommit());

                return false;
            }

            try {
                await this.session.execute(this.prepareRollback(outcome));

                return this.isHandled(outcome);
            } catch (error) {
                return this.recoverFromRollbackFailure(error);
            }
        });
    }
}

export class SyncTransactionScope extends BaseTransactionScope<SyncSession> {
    enter(): this {
        withSyncLock(this.session.lock, () => {
            const batch = this.prepareEntry();

            try {
                this.session.execute(batch);
            } catch (error) {
                this.abandonEntry();
                throw error;
            }
        });

        return this;
    }

    exit(outcome: Outcome): boolean {
        return withSyncLock(this.session.lock, () => {
            if (this.shouldCommit(outcome)) {
                this.session.execute(this.prepareCommit());

                return false;
            }

            try {
                this.session.execute(this.prepareRollback(outcome));

                return this.isHandled(outcome);
            } catch (error) {
                return this.recoverFromRollbackFailure(error);
            }
        });
    }
}
