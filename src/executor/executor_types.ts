import { StorageQuery, StorageWhere } from '../filter/filter_types'
import { SchemaModel } from '../schema/schema_types'
import { Row } from '../types'

export type PrimitiveOperation =
    | { readonly kind: 'insert'; readonly table: string; readonly values: Row }
    | {
          readonly kind: 'update'
          readonly table: string
          readonly where: StorageWhere
          readonly values: Row
      }
    | {
          readonly kind: 'delete'
          readonly table: string
          readonly where: StorageWhere
      }

/**
 * inserted: generated holds the values storage created for the row, such as an auto increment id.
 * conflict: a unique constraint rejected the operation. This is reported as a value instead of
 * thrown, since connect_or_create recovers from it.
 */
export type ExecuteResult =
    | { readonly kind: 'inserted'; readonly generated: Row }
    | { readonly kind: 'affected'; readonly count: number }
    | { readonly kind: 'conflict'; readonly message: string }

/**
 * Storage capability consumed by the library. Everything a write plan does happens between one
 * begin and one commit or rollback. Queries outside a write pass no transaction.
 */
export type TransactionExecutor<Tx = unknown> = {
    begin(): Promise<Tx>
    execute(tx: Tx, operation: PrimitiveOperation): Promise<ExecuteResult>
    query(tx: Tx | undefined, query: StorageQuery): Promise<Row[]>
    commit(tx: Tx): Promise<void>
    rollback(tx: Tx): Promise<void>
}

export type Logger = Pick<Console, 'error'>

/**
 * Passed into every read and write call. Nothing in the library keeps state between calls.
 */
export type TetherContext<Tx = unknown> = {
    readonly schema: SchemaModel
    readonly executor: TransactionExecutor<Tx>
    /** defaults to console */
    readonly logger?: Logger
}
