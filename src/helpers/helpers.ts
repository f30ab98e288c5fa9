import { Scalar } from '../types'

export const is_simple_object = (
    val: unknown
): val is Record<string, unknown> =>
    typeof val === 'object' &&
    val !== null &&
    !Array.isArray(val) &&
    (Object.getPrototypeOf(val) === Object.prototype ||
        Object.getPrototypeOf(val) === null)

export const is_scalar = (val: unknown): val is Scalar =>
    val === null ||
    typeof val === 'string' ||
    typeof val === 'number' ||
    typeof val === 'boolean'

export const group_by = <T, K>(
    array: readonly T[],
    key_function: (item: T, i: number) => K
): Map<K, T[]> =>
    array.reduce((acc, item, i) => {
        const key = key_function(item, i)
        const group = acc.get(key)
        if (group) {
            group.push(item)
        } else {
            acc.set(key, [item])
        }
        return acc
    }, new Map<K, T[]>())

/**
 * Distinct non null values in first-seen order. A null key never matches in a where clause.
 */
export const unique_values = (values: readonly Scalar[]) => [
    ...new Set(values.filter(value => value !== null)),
]
