import {setTimeout} from 'node:timers/promises';
import {CollectingLogger} from '@nestwise/logger';
import {StaticMutexUsingMemory} from '@nestwise/mutex/static-memory';
import {SyncMutexUsingFlag} from '@nestwise/mutex/sync';
import {transactionStartCommand, type TransactionCharacteristics} from './characteristics.js';
import {PreparedStatementsUsingMemory} from './prepared-statements.js';
import {SavepointStack} from './savepoint-stack.js';
import {DEFAULT_SAVEPOINT_PREFIX, type AsyncSession, type SessionBase, type SyncSession, type TransactionStatus} from './session.js';

type StagedFailure = {
    pattern: string | RegExp,
    error: Error,
};

/**
 * Stands in for the server side of a session: records every batch and follows the transaction
 * status the way the server reports it after each round trip.
 */
export class FakeServer {
    public status: TransactionStatus = 'idle';
    public readonly batches: string[] = [];
    private failures: StagedFailure[] = [];

    /**
     * The next batch matching the pattern fails with the error, once.
     */
    failWhen(pattern: string | RegExp, error: Error = new Error('server closed the connection unexpectedly')): void {
        this.failures.push({pattern, error});
    }

    run(batch: string): string[] {
        this.batches.push(batch);
        const index = this.failures.findIndex(({pattern}) => typeof pattern === 'string'
            ? batch.includes(pattern)
            : pattern.test(batch));

        if (index >= 0) {
            const [failure] = this.failures.splice(index, 1);

            if (this.status === 'in-transaction') {
                this.status = 'in-error';
            }

            throw failure.error;
        }

        const statements = batch.split('; ');

        for (const statement of statements) {
            this.apply(statement);
        }

        return statements;
    }

    private apply(statement: string): void {
        if (statement.startsWith('BEGIN')) {
            this.status = 'in-transaction';
        } else if (statement === 'COMMIT' || statement === 'ROLLBACK') {
            this.status = 'idle';
        } else if (statement.startsWith('ROLLBACK TO ')) {
            this.status = 'in-transaction';
        }
    }
}

export type FakeSessionOptions = {
    savepointPrefix?: string,
    characteristics?: TransactionCharacteristics,
    latency?: number,
};

abstract class FakeSessionBase implements SessionBase {
    public readonly savepoints = new SavepointStack();
    public readonly preparedStatements = new PreparedStatementsUsingMemory();
    public readonly logger = new CollectingLogger();
    public readonly savepointPrefix: string;
    private readonly startCommand: string;

    constructor(
        public readonly server: FakeServer = new FakeServer(),
        options: FakeSessionOptions = {},
    ) {
        this.savepointPrefix = options.savepointPrefix ?? DEFAULT_SAVEPOINT_PREFIX;
        this.startCommand = transactionStartCommand(options.characteristics);
    }

    quoteIdentifier(name: string): string {
        return `"${name.replaceAll('"', '""')}"`;
    }

    transactionStatus(): TransactionStatus {
        return this.server.status;
    }

    transactionStartCommand(): string {
        return this.startCommand;
    }

    describe(): string {
        return `[${this.server.status}] fake`;
    }
}

export class FakeSession extends FakeSessionBase implements AsyncSession {
    public readonly lock = new StaticMutexUsingMemory('fake-session');
    private readonly latency: number;

    constructor(server?: FakeServer, options: FakeSessionOptions = {}) {
        super(server, options);
        this.latency = options.latency ?? 0;
    }

    async execute(batch: string): Promise<string[]> {
        if (this.latency > 0) {
            await setTimeout(this.latency);
        }

        return this.server.run(batch);
    }
}

export class FakeSyncSession extends FakeSessionBase implements SyncSession {
    public readonly lock = new SyncMutexUsingFlag('fake-session');

    execute(batch: string): string[] {
        return this.server.run(batch);
    }
}
