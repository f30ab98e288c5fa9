import { OrderBy, Where } from '../filter/filter_types'
import { Scalar } from '../types'

export type IncludeOptions = {
    readonly include?: ReadSpec
    /** list relations only */
    readonly where?: Where
    /** list relations only */
    readonly order_by?: OrderBy
    /** list relations only, applied per parent row */
    readonly limit?: number
}

/**
 * Which relations to load under each row, nested to any depth.
 *
 * @example
 * { posts: { where: { $gt: ['views', 1] }, include: { comments: true } }, profile: true }
 */
export type ReadSpec = { readonly [relation: string]: true | IncludeOptions }

export type FindManyArgs = {
    readonly where?: Where
    readonly order_by?: OrderBy
    readonly limit?: number
    readonly offset?: number
    readonly include?: ReadSpec
}

export type FindUniqueArgs = {
    readonly include?: ReadSpec
}

export type ResultValue = Scalar | ResultRow | ResultRow[]

/**
 * A row with its included relations nested under the relation names. Single relations hold a row
 * or null, list relations an array.
 */
export type ResultRow = { [key: string]: ResultValue }
