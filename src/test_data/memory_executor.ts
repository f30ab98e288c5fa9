import {
    ExecuteResult,
    PrimitiveOperation,
    TransactionExecutor,
} from '../executor/executor_types'
import { is_subquery } from '../filter/filter_helpers'
import {
    OrderBy,
    StorageQuery,
    StorageSubquery,
    StorageWhere,
} from '../filter/filter_types'
import {
    get_auto_increment_column,
    get_column_names,
    get_column_schema,
    unique_constraints,
} from '../schema/schema_helpers'
import { SchemaModel } from '../schema/schema_types'
import { Row, Scalar } from '../types'

type Tables = Record<string, Row[]>

/**
 * In-process stand-in for a database, used by the unit tests. It enforces what the library relies
 * on a real database for: unique keys (reported as conflicts), not null columns, foreign keys
 * (restricting deletes) and all-or-nothing transactions.
 */
export type MemoryExecutor = TransactionExecutor<number> & {
    readonly tables: Tables
    readonly operations: PrimitiveOperation[]
    readonly queries: StorageQuery[]
    /** throw from the execute call with this index (counting from 0) */
    fail_at_operation?: number
    /** pretend a row matching this table does not exist for the next lookup, to simulate a race */
    hide_next_lookup?: string
}

export const memory_executor = (
    model: SchemaModel,
    hydration: Record<string, Row[]> = {}
): MemoryExecutor => {
    let tables: Tables = {}
    Object.keys(model.schema.tables).forEach(table => {
        tables[table] = (hydration[table] ?? []).map(row => ({ ...row }))
    })

    let snapshot: Tables | undefined
    let transaction_count = 0
    let execute_count = 0

    const executor: MemoryExecutor = {
        get tables() {
            return tables
        },
        operations: [],
        queries: [],
        begin: async () => {
            if (snapshot) {
                throw new Error('A transaction is already open')
            }
            snapshot = clone_tables(tables)
            transaction_count += 1
            return transaction_count
        },
        commit: async () => {
            snapshot = undefined
        },
        rollback: async () => {
            if (snapshot) {
                tables = snapshot
            }
            snapshot = undefined
        },
        query: async (_tx, query) => {
            executor.queries.push(query)
            if (executor.hide_next_lookup === query.table) {
                executor.hide_next_lookup = undefined
                return []
            }
            return run_query(tables, query).map(row => ({ ...row }))
        },
        execute: async (_tx, operation) => {
            const index = execute_count
            execute_count += 1
            executor.operations.push(operation)
            if (executor.fail_at_operation === index) {
                throw new Error(`Injected failure at operation ${index}`)
            }
            return execute_operation(model, tables, operation)
        },
    }

    return executor
}

const clone_tables = (tables: Tables): Tables =>
    Object.fromEntries(
        Object.entries(tables).map(([table, rows]): [string, Row[]] => [
            table,
            rows.map(row => ({ ...row })),
        ])
    )

const execute_operation = (
    model: SchemaModel,
    tables: Tables,
    operation: PrimitiveOperation
): ExecuteResult => {
    const rows = tables[operation.table]

    if (operation.kind === 'insert') {
        const row = build_row(model, rows, operation.table, operation.values)
        const conflict = find_conflict(model, rows, operation.table, row)
        if (conflict) {
            return { kind: 'conflict', message: conflict }
        }
        check_row(model, tables, operation.table, row)
        rows.push(row)
        const auto_increment = get_auto_increment_column(model, operation.table)
        return {
            kind: 'inserted',
            generated: auto_increment
                ? { [auto_increment]: row[auto_increment] }
                : {},
        }
    }

    const matches = rows.filter(row =>
        evaluate_where(tables, row, operation.where)
    )

    if (operation.kind === 'update') {
        for (const match of matches) {
            const updated = { ...match, ...operation.values }
            const others = rows.filter(row => row !== match)
            const conflict = find_conflict(model, others, operation.table, updated)
            if (conflict) {
                return { kind: 'conflict', message: conflict }
            }
            check_row(model, tables, operation.table, updated)
        }
        matches.forEach(match => Object.assign(match, operation.values))
        return { kind: 'affected', count: matches.length }
    }

    matches.forEach(match => check_not_referenced(model, tables, operation.table, match))
    tables[operation.table] = rows.filter(row => !matches.includes(row))
    return { kind: 'affected', count: matches.length }
}

const build_row = (
    model: SchemaModel,
    rows: Row[],
    table: string,
    values: Row
): Row => {
    const auto_increment = get_auto_increment_column(model, table)
    const next_id =
        rows.reduce((acc, row) => {
            const id = auto_increment ? row[auto_increment] : 0
            return typeof id === 'number' && id > acc ? id : acc
        }, 0) + 1

    return Object.fromEntries(
        get_column_names(model, table).map((column): [string, Scalar] => {
            const value = values[column]
            if (value !== undefined) {
                return [column, value]
            }
            if (column === auto_increment) {
                return [column, next_id]
            }
            return [column, get_column_schema(model, table, column)?.default ?? null]
        })
    )
}

const find_conflict = (
    model: SchemaModel,
    rows: Row[],
    table: string,
    row: Row
) => {
    const violated = unique_constraints(model, table).find(
        columns =>
            columns.every(column => row[column] !== null) &&
            rows.some(other =>
                columns.every(column => other[column] === row[column])
            )
    )
    return violated
        ? `UNIQUE constraint failed: ${violated
              .map(column => `${table}.${column}`)
              .join(', ')}`
        : undefined
}

const check_row = (
    model: SchemaModel,
    tables: Tables,
    table: string,
    row: Row
) => {
    get_column_names(model, table).forEach(column => {
        if (get_column_schema(model, table, column)?.not_null && row[column] === null) {
            throw new Error(`NOT NULL constraint failed: ${table}.${column}`)
        }
    })

    const foreign_keys = model.schema.tables[table].foreign_keys ?? []
    foreign_keys.forEach(foreign_key => {
        const value = row[foreign_key.columns[0]]
        const referenced_column = foreign_key.referenced_columns[0]
        if (
            value !== null &&
            !tables[foreign_key.referenced_table].some(
                referenced => referenced[referenced_column] === value
            )
        ) {
            throw new Error(
                `FOREIGN KEY constraint failed: ${table}.${foreign_key.columns[0]}`
            )
        }
    })
}

const check_not_referenced = (
    model: SchemaModel,
    tables: Tables,
    table: string,
    row: Row
) => {
    Object.entries(model.schema.tables).forEach(([other_table, table_schema]) => {
        const foreign_keys = table_schema.foreign_keys ?? []
        foreign_keys
            .filter(foreign_key => foreign_key.referenced_table === table)
            .forEach(foreign_key => {
                const value = row[foreign_key.referenced_columns[0]]
                const is_referenced = tables[other_table].some(
                    other => other[foreign_key.columns[0]] === value
                )
                if (is_referenced) {
                    throw new Error(
                        `FOREIGN KEY constraint failed: ${other_table}.${foreign_key.columns[0]} references ${table}`
                    )
                }
            })
    })
}

const run_query = (tables: Tables, query: StorageQuery): Row[] => {
    const rows = tables[query.table].filter(row =>
        query.where === undefined ? true : evaluate_where(tables, row, query.where)
    )
    const sorted = query.order_by ? sort_rows(rows, query.order_by) : rows
    const start = query.offset ?? 0
    const end = query.limit === undefined ? undefined : start + query.limit
    return sorted.slice(start, end)
}

const compare_values = (a: Scalar, b: Scalar) => {
    // nulls sort first, as in sqlite
    if (a === b) return 0
    if (a === null) return -1
    if (b === null) return 1
    return a < b ? -1 : 1
}

const sort_rows = (rows: Row[], order_by: OrderBy) =>
    rows.slice().sort((row1, row2) => {
        for (const order of order_by) {
            const [column, direction]: [string, number] =
                '$asc' in order ? [order.$asc, 1] : [order.$desc, -1]
            const comparison = compare_values(row1[column], row2[column])
            if (comparison !== 0) {
                return comparison * direction
            }
        }
        return 0
    })

const subquery_values = (tables: Tables, subquery: StorageSubquery) =>
    run_query(tables, { table: subquery.$from, where: subquery.$where }).map(
        row => row[subquery.$select[0]]
    )

const like_to_regex = (pattern: string) =>
    new RegExp(
        '^' +
            pattern
                .split('')
                .map(char =>
                    char === '%'
                        ? '.*'
                        : char === '_'
                        ? '.'
                        : char.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
                )
                .join('') +
            '$',
        'i'
    )

export const evaluate_where = (
    tables: Tables,
    row: Row,
    where: StorageWhere
): boolean => {
    if ('$and' in where) {
        return where.$and.every(el => evaluate_where(tables, row, el))
    }
    if ('$or' in where) {
        return where.$or.some(el => evaluate_where(tables, row, el))
    }
    if ('$not' in where) {
        return !evaluate_where(tables, row, where.$not)
    }
    if ('$eq' in where) {
        const [column, value] = where.$eq
        return value === null ? row[column] === null : row[column] === value
    }
    if ('$in' in where) {
        const [column, values] = where.$in
        const candidates = is_subquery(values)
            ? subquery_values(tables, values)
            : values
        return row[column] !== null && candidates.includes(row[column])
    }
    if ('$like' in where) {
        const [column, pattern] = where.$like
        const value = row[column]
        return typeof value === 'string' && like_to_regex(pattern).test(value)
    }

    const [operator, [column, value]] =
        '$gt' in where
            ? (['$gt', where.$gt] as const)
            : '$gte' in where
            ? (['$gte', where.$gte] as const)
            : '$lt' in where
            ? (['$lt', where.$lt] as const)
            : (['$lte', where.$lte] as const)
    const cell = row[column]
    if (cell === null) {
        return false
    }
    const comparison = compare_values(cell, value)
    return operator === '$gt'
        ? comparison > 0
        : operator === '$gte'
        ? comparison >= 0
        : operator === '$lt'
        ? comparison < 0
        : comparison <= 0
}
