import { ValidationIssue } from '../helpers/error_handling'
import { is_scalar, is_simple_object } from '../helpers/helpers'
import {
    is_column_name,
    is_relation_name,
    is_table_name,
} from '../schema/schema_helpers'
import { SchemaModel } from '../schema/schema_types'
import { Path } from '../types'

const column_operators = ['$eq', '$gt', '$gte', '$lt', '$lte', '$like', '$in']
const connective_operators = ['$and', '$or']
const relation_operators = ['$some', '$none', '$every', '$is', '$is_not']

const get_column_issues = (
    model: SchemaModel,
    table: string,
    column: unknown,
    path: Path
): ValidationIssue[] =>
    typeof column === 'string' && is_column_name(model, table, column)
        ? []
        : [
              {
                  message: `${String(column)} is not a column of ${table}`,
                  path,
              },
          ]

const get_operand_issues = (
    operator: string,
    operand: unknown,
    path: Path
): ValidationIssue[] => {
    if (operator === '$eq') {
        return is_scalar(operand)
            ? []
            : [{ message: '$eq compares against a scalar', path }]
    }
    if (operator === '$like') {
        return typeof operand === 'string'
            ? []
            : [{ message: '$like needs a string pattern', path }]
    }
    return typeof operand === 'string' || typeof operand === 'number'
        ? []
        : [{ message: `${operator} compares against a string or number`, path }]
}

/**
 * Checks a filter written by a caller: the shape of every operator, the column names against the
 * table in scope and the relation names of relation filters. Whether a relation filter matches the
 * relation's cardinality is checked when the filter is translated.
 */
export const get_where_issues = (
    model: SchemaModel,
    table: string,
    where: unknown,
    path: Path
): ValidationIssue[] => {
    if (!is_simple_object(where)) {
        return [{ message: 'Filter must be an object', path }]
    }

    const keys = Object.keys(where)
    if (keys.length !== 1) {
        return [
            {
                message: `Filter must have exactly one operator, got ${keys.length}`,
                path,
                recommendation: 'Combine several conditions with $and',
            },
        ]
    }

    const operator = keys[0]
    const operand = where[operator]
    const operand_path = [...path, operator]

    if (connective_operators.includes(operator)) {
        return Array.isArray(operand)
            ? operand.flatMap((el, i) =>
                  get_where_issues(model, table, el, [...operand_path, i])
              )
            : [{ message: `${operator} needs an array of filters`, path: operand_path }]
    }

    if (operator === '$not') {
        return get_where_issues(model, table, operand, operand_path)
    }

    if (relation_operators.includes(operator)) {
        if (
            !Array.isArray(operand) ||
            operand.length < 1 ||
            operand.length > 2 ||
            typeof operand[0] !== 'string'
        ) {
            return [
                {
                    message: `${operator} needs a relation name and an optional filter`,
                    path: operand_path,
                },
            ]
        }
        const [name, inner] = operand
        if (!is_relation_name(model, table, name)) {
            return [
                {
                    message: `${name} is not a relation of ${table}`,
                    path: operand_path,
                },
            ]
        }
        return operand.length === 2
            ? get_where_issues(
                  model,
                  model.relations[table][name].to_table,
                  inner,
                  [...operand_path, 1]
              )
            : []
    }

    if (!column_operators.includes(operator)) {
        return [{ message: `Unknown filter operator ${operator}`, path }]
    }

    if (!Array.isArray(operand) || operand.length !== 2) {
        return [
            {
                message: `${operator} needs a column and a value`,
                path: operand_path,
            },
        ]
    }

    const [column, value] = operand
    const column_issues = get_column_issues(model, table, column, [
        ...operand_path,
        0,
    ])

    if (operator !== '$in') {
        return [
            ...column_issues,
            ...get_operand_issues(operator, value, [...operand_path, 1]),
        ]
    }

    if (Array.isArray(value)) {
        return [
            ...column_issues,
            ...(value.every(is_scalar)
                ? []
                : [{ message: '$in lists only hold scalars', path: [...operand_path, 1] }]),
        ]
    }

    return [
        ...column_issues,
        ...get_subquery_issues(model, value, [...operand_path, 1]),
    ]
}

const get_subquery_issues = (
    model: SchemaModel,
    subquery: unknown,
    path: Path
): ValidationIssue[] => {
    if (
        !is_simple_object(subquery) ||
        typeof subquery.$from !== 'string' ||
        !Array.isArray(subquery.$select) ||
        subquery.$select.length !== 1
    ) {
        return [
            {
                message: '$in needs a list of values or a { $select, $from, $where } subquery',
                path,
            },
        ]
    }
    const from = subquery.$from
    if (!is_table_name(model, from)) {
        return [{ message: `${from} is not a table`, path: [...path, '$from'] }]
    }
    return [
        ...get_column_issues(model, from, subquery.$select[0], [
            ...path,
            '$select',
            0,
        ]),
        ...(subquery.$where === undefined
            ? []
            : get_where_issues(model, from, subquery.$where, [...path, '$where'])),
    ]
}
