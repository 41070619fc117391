import type {Logger} from '@nestwise/logger';
import type {StaticMutex, SyncMutex} from '@nestwise/mutex';
import type {SavepointStack} from './savepoint-stack.js';
import type {PreparedStatementCache} from './prepared-statements.js';

export type TransactionStatus = 'idle' | 'active' | 'in-transaction' | 'in-error' | 'unknown';

/**
 * What a transaction scope needs from the session it runs on. Sessions own their savepoint
 * stack; scopes only borrow the session for as long as they are open.
 */
export interface SessionBase {
    readonly savepoints: SavepointStack;
    readonly preparedStatements: PreparedStatementCache;
    readonly logger: Logger;
    readonly savepointPrefix: string;

    quoteIdentifier(name: string): string;

    transactionStatus(): TransactionStatus;

    transactionStartCommand(): string;

    describe(): string;
}

export interface AsyncSession extends SessionBase {
    readonly lock: StaticMutex;

    execute(batch: string): Promise<unknown>;
}

export interface SyncSession extends SessionBase {
    readonly lock: SyncMutex;

    execute(batch: string): unknown;
}

export const DEFAULT_SAVEPOINT_PREFIX = '_tx_';
