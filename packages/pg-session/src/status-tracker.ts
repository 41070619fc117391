import {EventEmitter} from 'node:events';
import type {TransactionStatus} from '@nestwise/transaction';
import {StandardError} from '@nestwise/error-standard';

const statusByIndicator: Partial<Record<string, TransactionStatus>> = {
    I: 'idle',
    T: 'in-transaction',
    E: 'in-error',
};

export class UnableToTrackTransactionStatus extends StandardError {
    static becauseTheProtocolIsHidden = () => new UnableToTrackTransactionStatus(
        'Unable to track the transaction status, the client does not expose its protocol connection',
        'pg-session.unable_to_track_transaction_status',
    );
}

/**
 * Follows the transaction status the server reports in every ReadyForQuery message. The pg
 * client keeps its protocol connection on `client.connection`, which emits those messages.
 */
export class TransactionStatusTracker {
    private status: TransactionStatus;
    private inFlight = 0;
    private readonly listener = (message: unknown) => this.onReadyForQuery(message);

    constructor(
        private readonly connection: EventEmitter,
        initial: TransactionStatus = 'idle',
        private readonly onIdle: () => void = () => {},
    ) {
        this.status = initial;
        connection.on('readyForQuery', this.listener);
    }

    static forClient(client: object, initial?: TransactionStatus, onIdle?: () => void): TransactionStatusTracker {
        const connection: unknown = Reflect.get(client, 'connection');

        if (!(connection instanceof EventEmitter)) {
            throw UnableToTrackTransactionStatus.becauseTheProtocolIsHidden();
        }

        return new TransactionStatusTracker(connection, initial, onIdle);
    }

    current(): TransactionStatus {
        return this.inFlight > 0 ? 'active' : this.status;
    }

    async track<R>(fn: () => Promise<R>): Promise<R> {
        this.inFlight += 1;

        try {
            return await fn();
        } finally {
            this.inFlight -= 1;
        }
    }

    detach(): void {
        this.connection.off('readyForQuery', this.listener);
    }

    private onReadyForQuery(message: unknown): void {
        if (typeof message !== 'object' || message === null || !('status' in message)) {
            return;
        }

        const status = typeof message.status === 'string' ? statusByIndicator[message.status] : undefined;

        if (status === undefined) {
            this.status = 'unknown';

            return;
        }

        const previous = this.status;
        this.status = status;

        if (status === 'idle' && previous !== 'idle') {
            this.onIdle();
        }
    }
}
