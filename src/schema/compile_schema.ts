import {
    throw_if_issues,
    ValidationIssue,
} from '../helpers/error_handling'
import { get_shape_issues } from '../helpers/validate_shape'
import { schema_validation_schema } from './schema_validation'
import {
    ForeignKeySchema,
    RelationDefinition,
    RelationField,
    SchemaModel,
    TableSchema,
    TetherSchema,
} from './schema_types'

/**
 * Validates a schema and resolves every relation field against the declared foreign keys. The
 * returned model is frozen, the rest of the library only ever reads from it.
 */
export const compile_schema = (schema: TetherSchema): SchemaModel => {
    // if the shape of the data is incorrect, we can't run the js validation since this may produce
    // nonsensical results or create actual runtime errors
    throw_if_issues(get_shape_issues(schema, schema_validation_schema, []))

    const issues: ValidationIssue[] = Object.entries(schema.tables).flatMap(
        ([table, table_schema]) => get_table_issues(schema, table, table_schema)
    )
    throw_if_issues(issues)

    const relations: Record<string, Record<string, RelationField>> = {}
    Object.entries(schema.tables).forEach(([table, table_schema]) => {
        relations[table] = {}
        Object.entries(table_schema.relations ?? {}).forEach(
            ([name, definition]) => {
                const relation_field = resolve_relation(
                    schema,
                    table,
                    name,
                    definition
                )
                if (typeof relation_field === 'string') {
                    issues.push({
                        message: relation_field,
                        path: ['tables', table, 'relations', name],
                    })
                } else {
                    relations[table][name] = Object.freeze(relation_field)
                }
            }
        )
        Object.freeze(relations[table])
    })
    throw_if_issues(issues)

    return Object.freeze({ schema, relations: Object.freeze(relations) })
}

const has_column = (schema: TetherSchema, table: string, column: string) => {
    const columns = schema.tables[table]?.columns
    return (
        columns !== undefined &&
        Object.prototype.hasOwnProperty.call(columns, column)
    )
}

const get_table_issues = (
    schema: TetherSchema,
    table: string,
    table_schema: TableSchema
): ValidationIssue[] => {
    const path = ['tables', table]
    const key_issues = [
        table_schema.primary_key,
        ...(table_schema.unique_keys ?? []),
    ].flatMap(key =>
        key.columns
            .filter(column => !has_column(schema, table, column))
            .map(column => ({
                message: `Key column ${column} is not a column of ${table}`,
                path,
            }))
    )

    const foreign_key_issues = (table_schema.foreign_keys ?? []).flatMap(
        (foreign_key, i) => {
            const fk_path = [...path, 'foreign_keys', i]
            const issues: ValidationIssue[] = []
            if (!has_column(schema, table, foreign_key.columns[0])) {
                issues.push({
                    message: `Foreign key column ${foreign_key.columns[0]} is not a column of ${table}`,
                    path: fk_path,
                })
            }
            if (
                !has_column(
                    schema,
                    foreign_key.referenced_table,
                    foreign_key.referenced_columns[0]
                )
            ) {
                issues.push({
                    message: `Foreign key references unknown column ${foreign_key.referenced_table}.${foreign_key.referenced_columns[0]}`,
                    path: fk_path,
                })
            }
            return issues
        }
    )

    const relation_issues = Object.entries(table_schema.relations ?? {})
        .filter(([_, definition]) => !schema.tables[definition.table])
        .map(([name, definition]) => ({
            message: `Relation ${name} points at unknown table ${definition.table}`,
            path: [...path, 'relations', name],
        }))

    return [...key_issues, ...foreign_key_issues, ...relation_issues]
}

const find_foreign_key = (
    schema: TetherSchema,
    table: string,
    column: string,
    referenced_table: string,
    referenced_column?: string
): ForeignKeySchema | undefined =>
    (schema.tables[table]?.foreign_keys ?? []).find(
        foreign_key =>
            foreign_key.columns[0] === column &&
            foreign_key.referenced_table === referenced_table &&
            (referenced_column === undefined ||
                foreign_key.referenced_columns[0] === referenced_column)
    )

const is_single_column_unique = (
    schema: TetherSchema,
    table: string,
    column: string
) => {
    const table_schema = schema.tables[table]
    return [table_schema.primary_key, ...(table_schema.unique_keys ?? [])].some(
        key => key.columns.length === 1 && key.columns[0] === column
    )
}

const is_nullable = (schema: TetherSchema, table: string, column: string) =>
    !schema.tables[table]?.columns[column]?.not_null

/**
 * @returns the resolved relation, or a message saying why it could not be resolved
 */
const resolve_relation = (
    schema: TetherSchema,
    table: string,
    name: string,
    definition: RelationDefinition
): RelationField | string => {
    const to_table = definition.table

    if ('through' in definition) {
        const { through } = definition
        const from_key = find_foreign_key(
            schema,
            through.table,
            through.from_column,
            table
        )
        const to_key = find_foreign_key(
            schema,
            through.table,
            through.to_column,
            to_table
        )
        if (!from_key || !to_key) {
            return `Join table ${through.table} needs foreign keys ${through.from_column} -> ${table} and ${through.to_column} -> ${to_table}`
        }

        return {
            name,
            from_table: table,
            to_table,
            from_column: from_key.referenced_columns[0],
            to_column: to_key.referenced_columns[0],
            cardinality: 'many_to_many',
            ownership: 'join_table',
            is_list: true,
            optional: true,
            nullable_foreign_key: true,
            through: { ...through },
        }
    }

    const { from_column, to_column } = definition
    if (
        !has_column(schema, table, from_column) ||
        !has_column(schema, to_table, to_column)
    ) {
        return `Relation ${name} pairs unknown columns ${table}.${from_column} and ${to_table}.${to_column}`
    }

    const base = { name, from_table: table, to_table, from_column, to_column }

    if (find_foreign_key(schema, table, from_column, to_table, to_column)) {
        const nullable = is_nullable(schema, table, from_column)
        return {
            ...base,
            cardinality: is_single_column_unique(schema, table, from_column)
                ? 'one_to_one'
                : 'many_to_one',
            ownership: 'source',
            is_list: false,
            optional: nullable,
            nullable_foreign_key: nullable,
        }
    }

    if (find_foreign_key(schema, to_table, to_column, table, from_column)) {
        const is_one_to_one = is_single_column_unique(
            schema,
            to_table,
            to_column
        )
        return {
            ...base,
            cardinality: is_one_to_one ? 'one_to_one' : 'one_to_many',
            ownership: 'target',
            is_list: !is_one_to_one,
            optional: true,
            nullable_foreign_key: is_nullable(schema, to_table, to_column),
        }
    }

    return `Relation ${name} needs a foreign key ${table}.${from_column} -> ${to_table}.${to_column} or ${to_table}.${to_column} -> ${table}.${from_column}`
}
