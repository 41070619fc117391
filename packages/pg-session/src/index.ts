import type {QueryConfig, QueryResult, QueryResultRow} from 'pg';
import {createLogger, type Logger} from '@nestwise/logger';
import {withLock, type StaticMutex} from '@nestwise/mutex';
import {StaticMutexUsingMemory} from '@nestwise/mutex/static-memory';
import {
    type AsyncSession,
    DEFAULT_SAVEPOINT_PREFIX,
    PreparedStatementsUsingMemory,
    SavepointStack,
    type TransactionCharacteristics,
    type TransactionOptions,
    type TransactionScope,
    type TransactionStatus,
    transaction,
    transactionStartCommand,
} from '@nestwise/transaction';
import {TransactionStatusTracker} from './status-tracker.js';

export {TransactionStatusTracker, UnableToTrackTransactionStatus} from './status-tracker.js';

/**
 * The part of a pg Client (or PoolClient) a session talks to. Besides these methods the client
 * must expose its protocol connection, which every pg client does.
 */
export interface PgClient {
    query<R extends QueryResultRow = QueryResultRow>(queryConfig: QueryConfig<unknown[]>): Promise<QueryResult<R>>;

    escapeIdentifier(identifier: string): string;
}

export interface PgSessionOptions {
    name?: string,
    savepointPrefix?: string,
    characteristics?: TransactionCharacteristics,
    logger?: Logger,
    lockTimeout?: number,
    initialStatus?: TransactionStatus,
}

export class PgSession implements AsyncSession {
    public readonly savepoints = new SavepointStack();
    public readonly lock: StaticMutex;
    public readonly preparedStatements: PreparedStatementsUsingMemory;
    public readonly logger: Logger;
    public readonly savepointPrefix: string;
    private readonly name: string;
    private readonly startCommand: string;
    private readonly lockTimeout: number | undefined;
    private readonly status: TransactionStatusTracker;

    constructor(
        private readonly client: PgClient,
        options: PgSessionOptions = {},
    ) {
        this.name = options.name ?? 'pg';
        this.logger = options.logger ?? createLogger('pg-session');
        this.savepointPrefix = options.savepointPrefix ?? DEFAULT_SAVEPOINT_PREFIX;
        this.startCommand = transactionStartCommand(options.characteristics);
        this.lockTimeout = options.lockTimeout;
        this.lock = new StaticMutexUsingMemory(this.name);
        this.preparedStatements = new PreparedStatementsUsingMemory(names => this.forgetParsedStatements(names));
        this.status = TransactionStatusTracker.forClient(client, options.initialStatus, () => this.checkStackOnIdle());
    }

    quoteIdentifier(name: string): string {
        return this.client.escapeIdentifier(name);
    }

    transactionStatus(): TransactionStatus {
        return this.status.current();
    }

    transactionStartCommand(): string {
        return this.startCommand;
    }

    describe(): string {
        return `[${this.status.current()}] ${this.name}`;
    }

    /**
     * Sends a batch of statements in a single round trip through the simple query protocol.
     * Callers hold the session lock.
     */
    execute(batch: string): Promise<unknown> {
        this.logger.debug('%s: %s', this.describe(), batch);

        return this.status.track(() => this.client.query({text: batch}));
    }

    async query<R extends QueryResultRow = QueryResultRow>(
        textOrConfig: string | QueryConfig<unknown[]>,
        values?: unknown[],
    ): Promise<QueryResult<R>> {
        const config: QueryConfig<unknown[]> = typeof textOrConfig === 'string'
            ? {text: textOrConfig, values}
            : {...textOrConfig, values: values ?? textOrConfig.values};

        return withLock(this.lock, async () => {
            const result = await this.status.track(() => this.client.query<R>(config));

            if (config.name !== undefined) {
                this.preparedStatements.register(config.name);
            }

            return result;
        }, this.lockTimeout);
    }

    transaction<R>(
        fn: (scope: TransactionScope, signal: AbortSignal) => Promise<R>,
        options: TransactionOptions = {},
    ): Promise<R | undefined> {
        return transaction(this, fn, options);
    }

    /**
     * Stops listening to the protocol connection. The client itself is left alone.
     */
    detach(): void {
        this.status.detach();
    }

    private forgetParsedStatements(names: string[]): void {
        const connection: unknown = Reflect.get(this.client, 'connection');
        const parsed: unknown = typeof connection === 'object' && connection !== null
            ? Reflect.get(connection, 'parsedStatements')
            : undefined;

        if (typeof parsed !== 'object' || parsed === null) {
            return;
        }

        for (const name of names) {
            Reflect.deleteProperty(parsed, name);
        }
    }

    private checkStackOnIdle(): void {
        if (!this.savepoints.isEmpty) {
            this.logger.warn(
                '%s: transaction ended while scopes are still open: %O',
                this.describe(),
                this.savepoints.names,
            );
        }
    }
}
