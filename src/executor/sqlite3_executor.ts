import * as sqlite3 from 'sqlite3'
import { compile_operation, compile_select } from '../compiler/compile_statements'
import { get_auto_increment_column } from '../schema/schema_helpers'
import { SchemaModel } from '../schema/schema_types'
import { Row } from '../types'
import { ExecuteResult, TransactionExecutor } from './executor_types'

type RunResult = { last_id: number; changes: number }

const run_sql = (db: sqlite3.Database, sql: string) =>
    new Promise<RunResult>((resolve, reject) =>
        db.run(sql, function (err) {
            if (err) {
                reject(err)
                return
            }
            resolve({ last_id: this.lastID, changes: this.changes })
        })
    )

const all_sql = (db: sqlite3.Database, sql: string) =>
    new Promise<Row[]>((resolve, reject) =>
        db.all<Row>(sql, [], (err, rows) => {
            if (err) {
                reject(err)
                return
            }
            resolve(rows)
        })
    )

const is_unique_violation = (error: unknown): error is Error =>
    error instanceof Error &&
    'code' in error &&
    error.code === 'SQLITE_CONSTRAINT' &&
    error.message.includes('UNIQUE constraint failed')

/**
 * Transaction executor over one sqlite3 connection. Sqlite runs one transaction per connection at
 * a time, so concurrent writes need one executor (and connection) each.
 */
export const sqlite3_executor = (
    db: sqlite3.Database,
    model: SchemaModel
): TransactionExecutor<sqlite3.Database> => ({
    begin: async () => {
        await run_sql(db, 'BEGIN')
        return db
    },
    commit: async tx => {
        await run_sql(tx, 'COMMIT')
    },
    rollback: async tx => {
        await run_sql(tx, 'ROLLBACK')
    },
    query: async (tx, query) => all_sql(tx ?? db, compile_select(query)),
    execute: async (tx, operation): Promise<ExecuteResult> => {
        const sql = compile_operation(operation)
        try {
            const result = await run_sql(tx, sql)
            if (operation.kind === 'insert') {
                const auto_increment = get_auto_increment_column(
                    model,
                    operation.table
                )
                return {
                    kind: 'inserted',
                    generated:
                        auto_increment &&
                        operation.values[auto_increment] === undefined
                            ? { [auto_increment]: result.last_id }
                            : {},
                }
            }
            return { kind: 'affected', count: result.changes }
        } catch (error) {
            if (is_unique_violation(error)) {
                return { kind: 'conflict', message: error.message }
            }
            throw error
        }
    },
})
