import { escape as escape_sqlite } from 'sqlstring-sqlite'
import { Scalar } from '../types'

/**
 * Small wrapper over sqlstring escape that keeps numbers as plain numbers
 */
export const escape_value = (val: Scalar) => {
    if (typeof val === 'number') {
        if (!Number.isFinite(val)) {
            throw new Error(`Cannot escape non-finite number ${val}`)
        }
        return String(val)
    }

    return escape_sqlite(val, true)
}

/**
 * Wrap column name in escape string. Does not escape things like quotes in the identifier,
 * since identifiers already must match something in the schema like a column or table name
 */
export const escape_identifier = (val: string) => {
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(val)) {
        throw new Error(
            `Invalid identifier ${val}. Identifiers must be alphanumeric and not start with a number.`
        )
    }

    return `\`${val}\``
}
