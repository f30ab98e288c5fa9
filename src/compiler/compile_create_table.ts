import { get_auto_increment_column } from '../schema/schema_helpers'
import { ColumnSchema, DataType, SchemaModel } from '../schema/schema_types'
import { escape_identifier, escape_value } from './escape'

const sqlite_types: Record<DataType, string> = {
    int: 'INTEGER',
    bigint: 'INTEGER',
    boolean: 'INTEGER',
    decimal: 'REAL',
    varchar: 'TEXT',
    text: 'TEXT',
    date: 'TEXT',
    datetime: 'TEXT',
}

const compile_column_definition = (
    column: string,
    column_schema: ColumnSchema,
    is_inline_primary_key: boolean
) => {
    // sqlite only auto increments a column declared exactly as INTEGER PRIMARY KEY
    if (is_inline_primary_key) {
        return `${escape_identifier(column)} INTEGER PRIMARY KEY AUTOINCREMENT`
    }

    const not_null_string = column_schema.not_null ? ' NOT NULL' : ''
    const default_string =
        column_schema.default !== undefined
            ? ` DEFAULT ${escape_value(column_schema.default)}`
            : ''

    return `${escape_identifier(column)} ${
        sqlite_types[column_schema.data_type]
    }${not_null_string}${default_string}`
}

const compile_column_list = (columns: readonly string[]) =>
    columns.map(escape_identifier).join(', ')

/**
 * Generates the sqlite CREATE TABLE statement for a table of the schema, including its keys and
 * foreign keys.
 */
export const compile_create_table = (model: SchemaModel, table: string) => {
    const table_schema = model.schema.tables[table]
    const primary_key = table_schema.primary_key.columns
    const auto_increment = get_auto_increment_column(model, table)
    const inline_primary_key =
        auto_increment !== undefined &&
        primary_key.length === 1 &&
        primary_key[0] === auto_increment
            ? auto_increment
            : undefined

    const column_definitions = Object.entries(table_schema.columns).map(
        ([column, column_schema]) =>
            compile_column_definition(
                column,
                column_schema,
                column === inline_primary_key
            )
    )

    const primary_key_definitions = inline_primary_key
        ? []
        : [`PRIMARY KEY (${compile_column_list(primary_key)})`]

    const unique_definitions = (table_schema.unique_keys ?? []).map(
        unique_key => `UNIQUE (${compile_column_list(unique_key.columns)})`
    )

    const foreign_key_definitions = (table_schema.foreign_keys ?? []).map(
        foreign_key =>
            `FOREIGN KEY (${compile_column_list(
                foreign_key.columns
            )}) REFERENCES ${escape_identifier(
                foreign_key.referenced_table
            )} (${compile_column_list(foreign_key.referenced_columns)})`
    )

    const definitions = [
        ...column_definitions,
        ...primary_key_definitions,
        ...unique_definitions,
        ...foreign_key_definitions,
    ]

    return `CREATE TABLE ${escape_identifier(table)} (${definitions.join(', ')})`
}
