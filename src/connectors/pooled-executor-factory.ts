import type { DbExecutor, QueryResult, StatementResult } from '../core/execution/db-executor.js';
import type { DbExecutorFactory } from '../repository/executor-factory.js';

export interface ConnectionLease<TConn> {
    readonly resource: TConn;
    /** Returns the connection to its source. Idempotent. */
    release(): Promise<void>;
}

/**
 * Where connections come from: a driver pool, or a source that opens a
 * fresh handle per lease.
 */
export interface ConnectionSource<TConn> {
    acquire(): Promise<ConnectionLease<TConn>>;
    destroy(): Promise<void>;
}

type PooledExecutorFactoryOptions<TConn> = {
    source: ConnectionSource<TConn>;
    /** Builds an executor bound to one leased connection. */
    bind: (conn: TConn) => DbExecutor;
};

/**
 * Creates a DbExecutorFactory over a connection source.
 *
 * - Leases are always released, on success and failure alike.
 * - Session executors lease per statement unless a transaction is open.
 * - Transactional executors keep one lease from first use until dispose.
 */
export function createPooledExecutorFactory<TConn>(
    opts: PooledExecutorFactoryOptions<TConn>
): DbExecutorFactory {
    const { source, bind } = opts;

    const makeExecutor = (mode: 'session' | 'sticky'): DbExecutor => {
        let lease: { lease: ConnectionLease<TConn>; executor: DbExecutor } | null = null;

        const getLease = async () => {
            if (lease) return lease;
            const acquired = await source.acquire();
            lease = { lease: acquired, executor: bind(acquired.resource) };
            return lease;
        };

        const releaseLease = async () => {
            if (!lease) return;
            const held = lease;
            lease = null;
            try {
                await held.executor.dispose();
            } finally {
                await held.lease.release();
            }
        };

        const withConnection = async <T>(use: (executor: DbExecutor) => Promise<T>): Promise<T> => {
            // Sticky mode, or an open transaction: reuse the held connection.
            if (mode === 'sticky' || lease) {
                const held = await getLease();
                return use(held.executor);
            }

            const acquired = await source.acquire();
            const executor = bind(acquired.resource);
            try {
                return await use(executor);
            } finally {
                try {
                    await executor.dispose();
                } finally {
                    await acquired.release();
                }
            }
        };

        return {
            executeSql(sql, params): Promise<QueryResult> {
                return withConnection(executor => executor.executeSql(sql, params));
            },

            runSql(sql, params): Promise<StatementResult> {
                return withConnection(executor => executor.runSql(sql, params));
            },

            async beginTransaction() {
                const held = await getLease();
                await held.executor.beginTransaction();
            },

            async commitTransaction() {
                if (!lease) {
                    throw new Error('commitTransaction called without an active transaction');
                }
                const held = lease;
                try {
                    await held.executor.commitTransaction();
                } finally {
                    if (mode === 'session') await releaseLease();
                }
            },

            async rollbackTransaction() {
                if (!lease) {
                    // Nothing to rollback; keep idempotent semantics.
                    return;
                }
                const held = lease;
                try {
                    await held.executor.rollbackTransaction();
                } finally {
                    if (mode === 'session') await releaseLease();
                }
            },

            dispose: releaseLease,
        };
    };

    return {
        createExecutor() {
            return makeExecutor('session');
        },
        createTransactionalExecutor() {
            return makeExecutor('sticky');
        },
        async dispose() {
            await source.destroy();
        },
    };
}
