/**
 * This file contains pure functions which answer questions about a compiled schema model
 * @module
 */

import { SchemaError } from '../helpers/error_handling'
import { is_scalar } from '../helpers/helpers'
import { ColumnSchema, RelationField, SchemaModel } from './schema_types'

export const get_table_names = (model: SchemaModel) =>
    Object.keys(model.schema.tables)

export const is_table_name = (model: SchemaModel, table: string) =>
    Object.prototype.hasOwnProperty.call(model.schema.tables, table)

/**
 * @returns a list of columns attatched to the given table
 */
export const get_column_names = (model: SchemaModel, table: string) =>
    Object.keys(model.schema.tables[table]?.columns ?? {})

export const is_column_name = (
    model: SchemaModel,
    table: string,
    column: string
) => get_column_schema(model, table, column) !== undefined

export const get_column_schema = (
    model: SchemaModel,
    table: string,
    column: string
): ColumnSchema | undefined => {
    const columns = model.schema.tables[table]?.columns
    return columns && Object.prototype.hasOwnProperty.call(columns, column)
        ? columns[column]
        : undefined
}

export const is_column_nullable = (
    model: SchemaModel,
    table: string,
    column: string
) => !get_column_schema(model, table, column)?.not_null

export const get_relation_names = (model: SchemaModel, table: string) =>
    Object.keys(model.relations[table] ?? {})

export const is_relation_name = (
    model: SchemaModel,
    table: string,
    name: string
) => {
    const relations = model.relations[table]
    return (
        relations !== undefined &&
        Object.prototype.hasOwnProperty.call(relations, name)
    )
}

export const relation = (
    model: SchemaModel,
    table: string,
    name: string
): RelationField => {
    if (!is_relation_name(model, table, name)) {
        throw new SchemaError(`${name} is not a relation of ${table}`, [name])
    }
    return model.relations[table][name]
}

/**
 * Gets a list of column names which have been marked as primary keys. More than one result
 * indicates a compound primary key
 */
export const get_primary_key = (model: SchemaModel, table: string) => [
    ...(model.schema.tables[table]?.primary_key.columns ?? []),
]

/**
 * Gets every set of columns that identifies exactly one row, primary key first.
 *
 * @example
 * return [
 *   ['id'],
 *   ['email'],
 *   ['first_name', 'last_name']
 * ]
 */
export const unique_constraints = (
    model: SchemaModel,
    table: string
): string[][] => {
    const table_schema = model.schema.tables[table]
    if (!table_schema) {
        return []
    }
    const unique_keys = table_schema.unique_keys ?? []
    return [
        [...table_schema.primary_key.columns],
        ...unique_keys.map(unique_key => [...unique_key.columns]),
    ]
}

/**
 * True when the selector names exactly the columns of one unique constraint and gives each of
 * them a non-null value. A partial or padded constraint could match several rows, so it is not
 * a unique selector.
 */
export const is_unique_selector = (
    model: SchemaModel,
    table: string,
    selector: Record<string, unknown>
) => {
    const columns = Object.keys(selector)
    if (columns.length === 0) {
        return false
    }
    const values_ok = columns.every(column => {
        const value = selector[column]
        return is_scalar(value) && value !== null
    })
    if (!values_ok) {
        return false
    }

    return unique_constraints(model, table).some(
        constraint =>
            constraint.length === columns.length &&
            constraint.every(column => columns.includes(column))
    )
}

export const get_auto_increment_column = (
    model: SchemaModel,
    table: string
) =>
    get_column_names(model, table).find(
        column => get_column_schema(model, table, column)?.auto_increment
    )
