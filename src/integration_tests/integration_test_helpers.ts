import * as sqlite3 from 'sqlite3'
import { compile_create_table } from '../compiler/compile_create_table'
import { compile_operation } from '../compiler/compile_statements'
import { TetherContext } from '../executor/executor_types'
import { sqlite3_executor } from '../executor/sqlite3_executor'
import { get_table_names } from '../schema/schema_helpers'
import { SchemaModel } from '../schema/schema_types'
import { Row } from '../types'

export const open_sqlite_database = async (path: string) =>
    new Promise<sqlite3.Database>((accept, reject) => {
        const db = new sqlite3.Database(path, e => (e ? reject(e) : accept(db)))
    })

export const close_sqlite_database = async (db: sqlite3.Database) =>
    new Promise<void>((resolve, reject) =>
        db.close(err => (err ? reject(err) : resolve()))
    )

const run_statement = (db: sqlite3.Database, sql: string) =>
    new Promise<void>((resolve, reject) =>
        db.run(sql, err => (err ? reject(err) : resolve()))
    )

/**
 * Opens an in-memory database with a table for every table of the schema, filled with the given
 * rows. Rows are inserted table by table in the order given, so referenced rows must come first.
 */
export const set_up_test_database = async (
    model: SchemaModel,
    hydration: Record<string, Row[]>
) => {
    const db = await open_sqlite_database(':memory:')
    await run_statement(db, 'PRAGMA foreign_keys = ON')

    for (const table of get_table_names(model)) {
        await run_statement(db, compile_create_table(model, table))
    }

    for (const [table, rows] of Object.entries(hydration)) {
        for (const values of rows) {
            await run_statement(
                db,
                compile_operation({ kind: 'insert', table, values })
            )
        }
    }

    return db
}

export const get_sqlite_context = (
    db: sqlite3.Database,
    model: SchemaModel
): TetherContext<sqlite3.Database> => ({
    schema: model,
    executor: sqlite3_executor(db, model),
    logger: { error: () => {} },
})
