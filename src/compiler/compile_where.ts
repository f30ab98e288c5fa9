import { is_subquery } from '../filter/filter_helpers'
import { StorageSubquery, StorageWhere } from '../filter/filter_types'
import { escape_identifier, escape_value } from './escape'

const comparison_operators = {
    $gt: '>',
    $gte: '>=',
    $lt: '<',
    $lte: '<=',
} as const

/**
 * Compiles a storage where clause into a sqlite boolean expression. Nested clauses are always
 * wrapped in brackets, so operator precedence never has to be considered.
 */
export const compile_where = (where: StorageWhere): string => {
    if ('$and' in where) {
        return where.$and.length === 0
            ? '1 = 1'
            : where.$and.map(el => `(${compile_where(el)})`).join(' AND ')
    }

    if ('$or' in where) {
        return where.$or.length === 0
            ? '1 = 0'
            : where.$or.map(el => `(${compile_where(el)})`).join(' OR ')
    }

    if ('$not' in where) {
        return `NOT (${compile_where(where.$not)})`
    }

    if ('$eq' in where) {
        const [column, value] = where.$eq
        return value === null
            ? `${escape_identifier(column)} IS NULL`
            : `${escape_identifier(column)} = ${escape_value(value)}`
    }

    if ('$like' in where) {
        const [column, pattern] = where.$like
        return `${escape_identifier(column)} LIKE ${escape_value(pattern)}`
    }

    if ('$in' in where) {
        const [column, values] = where.$in
        if (is_subquery(values)) {
            return `${escape_identifier(column)} IN (${compile_subquery(values)})`
        }
        return values.length === 0
            ? '1 = 0'
            : `${escape_identifier(column)} IN (${values
                  .map(escape_value)
                  .join(', ')})`
    }

    const [operator, [column, value]] =
        '$gt' in where
            ? (['$gt', where.$gt] as const)
            : '$gte' in where
            ? (['$gte', where.$gte] as const)
            : '$lt' in where
            ? (['$lt', where.$lt] as const)
            : (['$lte', where.$lte] as const)

    return `${escape_identifier(column)} ${
        comparison_operators[operator]
    } ${escape_value(value)}`
}

export const compile_subquery = (subquery: StorageSubquery) => {
    const where_string =
        subquery.$where === undefined
            ? ''
            : ` WHERE ${compile_where(subquery.$where)}`
    return `SELECT ${escape_identifier(subquery.$select[0])} FROM ${escape_identifier(
        subquery.$from
    )}${where_string}`
}
