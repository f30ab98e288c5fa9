import { Schema } from 'jsonschema'
import { get_where_issues } from '../filter/filter_validation'
import { ValidationIssue } from '../helpers/error_handling'
import { get_shape_issues } from '../helpers/validate_shape'
import { is_column_name, is_relation_name } from '../schema/schema_helpers'
import { SchemaModel } from '../schema/schema_types'
import { Path } from '../types'
import { FindManyArgs, IncludeOptions, ReadSpec } from './read_types'

export const order_by_schema: Schema = {
    type: 'array',
    items: {
        type: 'object',
        properties: {
            $asc: { type: 'string' },
            $desc: { type: 'string' },
        },
        additionalProperties: false,
        minProperties: 1,
        maxProperties: 1,
    },
}

const read_spec_schema: Schema = {
    type: 'object',
    additionalProperties: {
        anyOf: [
            { enum: [true] },
            {
                type: 'object',
                properties: {
                    include: { type: 'object' },
                    where: { type: 'object' },
                    order_by: order_by_schema,
                    limit: { type: 'integer', minimum: 0 },
                },
                additionalProperties: false,
            },
        ],
    },
}

const find_many_schema: Schema = {
    type: 'object',
    properties: {
        where: { type: 'object' },
        order_by: order_by_schema,
        limit: { type: 'integer', minimum: 0 },
        offset: { type: 'integer', minimum: 0 },
        include: { type: 'object' },
    },
    additionalProperties: false,
}

export const get_order_by_issues = (
    model: SchemaModel,
    table: string,
    order_by: FindManyArgs['order_by'],
    path: Path
): ValidationIssue[] =>
    (order_by ?? []).flatMap((order, i) => {
        const column = '$asc' in order ? order.$asc : order.$desc
        return is_column_name(model, table, column)
            ? []
            : [
                  {
                      message: `Cannot order by ${column}, it is not a column of ${table}`,
                      path: [...path, i],
                  },
              ]
    })

const get_include_option_issues = (
    model: SchemaModel,
    table: string,
    name: string,
    options: IncludeOptions,
    path: Path
): ValidationIssue[] => {
    const relation = model.relations[table][name]
    const list_only_issues: ValidationIssue[] = relation.is_list
        ? []
        : (['where', 'order_by', 'limit'] as const)
              .filter(key => options[key] !== undefined)
              .map(key => ({
                  message: `${key} is only allowed on list relations, but ${table}.${name} is ${relation.cardinality}`,
                  path: [...path, key],
              }))

    const where_issues =
        options.where === undefined
            ? []
            : get_where_issues(model, relation.to_table, options.where, [
                  ...path,
                  'where',
              ])

    const order_by_issues = get_order_by_issues(
        model,
        relation.to_table,
        options.order_by,
        [...path, 'order_by']
    )

    const nested_issues =
        options.include === undefined
            ? []
            : get_read_spec_issues(model, relation.to_table, options.include, [
                  ...path,
                  'include',
              ])

    return [
        ...list_only_issues,
        ...where_issues,
        ...order_by_issues,
        ...nested_issues,
    ]
}

/**
 * Checks a read spec before anything is queried. The shape is checked first, since the schema
 * level checks assume a well formed read spec.
 */
export const get_read_spec_issues = (
    model: SchemaModel,
    table: string,
    read_spec: ReadSpec,
    path: Path = []
): ValidationIssue[] => {
    const shape_issues = get_shape_issues(read_spec, read_spec_schema, path)
    if (shape_issues.length > 0) {
        return shape_issues
    }

    return Object.entries(read_spec).flatMap(([name, options]) => {
        const relation_path = [...path, name]
        if (!is_relation_name(model, table, name)) {
            return [
                {
                    message: `${name} is not a relation of ${table}`,
                    path: relation_path,
                },
            ]
        }
        return options === true
            ? []
            : get_include_option_issues(
                  model,
                  table,
                  name,
                  options,
                  relation_path
              )
    })
}

export const get_find_many_issues = (
    model: SchemaModel,
    table: string,
    args: FindManyArgs
): ValidationIssue[] => {
    const shape_issues = get_shape_issues(args, find_many_schema, [])
    if (shape_issues.length > 0) {
        return shape_issues
    }

    return [
        ...(args.where === undefined
            ? []
            : get_where_issues(model, table, args.where, ['where'])),
        ...get_order_by_issues(model, table, args.order_by, ['order_by']),
        ...(args.include === undefined
            ? []
            : get_read_spec_issues(model, table, args.include, ['include'])),
    ]
}
