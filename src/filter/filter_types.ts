import { Scalar } from '../types'

export type Comparable = string | number

export type Subquery<Extra> = {
    readonly $select: readonly [string]
    readonly $from: string
    readonly $where?: WhereOf<Extra>
}

/**
 * Column predicates shared by caller filters and storage filters. Extra adds the operators only
 * one of them understands.
 */
export type WhereOf<Extra> =
    | { readonly $eq: readonly [string, Scalar] }
    | { readonly $gt: readonly [string, Comparable] }
    | { readonly $gte: readonly [string, Comparable] }
    | { readonly $lt: readonly [string, Comparable] }
    | { readonly $lte: readonly [string, Comparable] }
    | { readonly $like: readonly [string, string] }
    | {
          readonly $in: readonly [
              string,
              readonly Scalar[] | Subquery<Extra>
          ]
      }
    | { readonly $and: readonly WhereOf<Extra>[] }
    | { readonly $or: readonly WhereOf<Extra>[] }
    | { readonly $not: WhereOf<Extra> }
    | Extra

/**
 * Filters through a relation field. The first element is the relation name on the table in scope,
 * the second a where clause scoped to the related table (omitted means any related row).
 *
 * @example
 * { $some: ['posts', { $gt: ['views', 10] }] }
 * { $is: ['author', { $eq: ['email', 'a@x.io'] }] }
 */
export type RelationFilter =
    | { readonly $some: RelationClause }
    | { readonly $none: RelationClause }
    | { readonly $every: RelationClause }
    | { readonly $is: RelationClause }
    | { readonly $is_not: RelationClause }

export type RelationClause = readonly [string] | readonly [string, Where]

/**
 * A filter as callers write it. Relation filters are allowed anywhere.
 */
export type Where = WhereOf<RelationFilter>

/**
 * A filter that only uses column predicates and subqueries, which is what executors evaluate.
 */
export type StorageWhere = WhereOf<never>

export type StorageSubquery = Subquery<never>

export type OrderBy = readonly ({ readonly $asc: string } | { readonly $desc: string })[]

export type StorageQuery = {
    readonly table: string
    readonly where?: StorageWhere
    readonly order_by?: OrderBy
    readonly limit?: number
    readonly offset?: number
}
