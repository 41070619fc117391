export type CacheInvalidation = {
    cleared: boolean,
    maintenanceCommands: string[],
};

export interface PreparedStatementCache {
    invalidate(): CacheInvalidation;
}

export type ForgetStatements = (names: string[]) => void;

/**
 * Keeps track of the statements prepared on a session. A rolled back savepoint may take
 * server-side statements with it, so after a rollback everything is deallocated and the
 * statements are prepared again on next use.
 */
export class PreparedStatementsUsingMemory implements PreparedStatementCache {
    private readonly names = new Set<string>();

    constructor(private readonly forget: ForgetStatements = () => {}) {
    }

    register(name: string): void {
        this.names.add(name);
    }

    has(name: string): boolean {
        return this.names.has(name);
    }

    get size(): number {
        return this.names.size;
    }

    invalidate(): CacheInvalidation {
        if (this.names.size === 0) {
            return {cleared: false, maintenanceCommands: []};
        }

        const names = [...this.names];
        this.names.clear();
        this.forget(names);

        return {cleared: true, maintenanceCommands: ['DEALLOCATE ALL']};
    }
}
