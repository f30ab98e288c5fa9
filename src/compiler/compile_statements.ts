import { PrimitiveOperation } from '../executor/executor_types'
import { StorageQuery } from '../filter/filter_types'
import { Row } from '../types'
import { compile_where } from './compile_where'
import { escape_identifier, escape_value } from './escape'

export const compile_select = (query: StorageQuery) => {
    const where_string =
        query.where === undefined ? '' : ` WHERE ${compile_where(query.where)}`

    const order_by_string = query.order_by?.length
        ? ` ORDER BY ${query.order_by
              .map(order =>
                  '$asc' in order
                      ? `${escape_identifier(order.$asc)} ASC`
                      : `${escape_identifier(order.$desc)} DESC`
              )
              .join(', ')}`
        : ''

    // sqlite only accepts an offset after a limit, and -1 means no limit
    const limit_string =
        query.limit !== undefined
            ? ` LIMIT ${escape_value(query.limit)}`
            : query.offset !== undefined
            ? ' LIMIT -1'
            : ''
    const offset_string =
        query.offset !== undefined ? ` OFFSET ${escape_value(query.offset)}` : ''

    return `SELECT * FROM ${escape_identifier(
        query.table
    )}${where_string}${order_by_string}${limit_string}${offset_string}`
}

const compile_assignments = (values: Row) =>
    Object.entries(values)
        .map(
            ([column, value]) =>
                `${escape_identifier(column)} = ${escape_value(value)}`
        )
        .join(', ')

export const compile_operation = (operation: PrimitiveOperation) => {
    const table = escape_identifier(operation.table)

    if (operation.kind === 'insert') {
        const columns = Object.keys(operation.values)
        if (columns.length === 0) {
            return `INSERT INTO ${table} DEFAULT VALUES`
        }
        const column_string = columns.map(escape_identifier).join(', ')
        const value_string = columns
            .map(column => escape_value(operation.values[column]))
            .join(', ')
        return `INSERT INTO ${table} (${column_string}) VALUES (${value_string})`
    }

    if (operation.kind === 'update') {
        return `UPDATE ${table} SET ${compile_assignments(
            operation.values
        )} WHERE ${compile_where(operation.where)}`
    }

    return `DELETE FROM ${table} WHERE ${compile_where(operation.where)}`
}
