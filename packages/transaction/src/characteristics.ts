export type IsolationLevel = 'read uncommitted' | 'read committed' | 'repeatable read' | 'serializable';

export type TransactionCharacteristics = {
    isolationLevel?: IsolationLevel,
    readOnly?: boolean,
    deferrable?: boolean,
};

export function transactionStartCommand(characteristics: TransactionCharacteristics = {}): string {
    const parts = ['BEGIN'];

    if (characteristics.isolationLevel !== undefined) {
        parts.push(`ISOLATION LEVEL ${characteristics.isolationLevel.toUpperCase()}`);
    }

    if (characteristics.readOnly !== undefined) {
        parts.push(characteristics.readOnly ? 'READ ONLY' : 'READ WRITE');
    }

    if (characteristics.deferrable !== undefined) {
        parts.push(characteristics.deferrable ? 'DEFERRABLE' : 'NOT DEFERRABLE');
    }

    return parts.join(' ');
}
