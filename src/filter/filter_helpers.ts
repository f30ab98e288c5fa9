import { RelationField, UniqueSelector } from '../schema/schema_types'
import { Row, Scalar } from '../types'
import { StorageWhere, Subquery, WhereOf } from './filter_types'

/**
 * Joins where clauses with $and or $or, dropping undefined ones and unwrapping a single clause
 */
export const combine_wheres = <Extra>(
    where_clauses: readonly (WhereOf<Extra> | undefined)[],
    connective: '$and' | '$or'
): WhereOf<Extra> | undefined => {
    const wheres = where_clauses.flatMap(where =>
        where === undefined ? [] : [where]
    )
    if (wheres.length === 0) {
        return undefined
    }
    if (wheres.length === 1) {
        return wheres[0]
    }
    return connective === '$and' ? { $and: wheres } : { $or: wheres }
}

/**
 * @example
 * selector_to_where({ first_name: 'a', last_name: 'b' })
 * // { $and: [{ $eq: ['first_name', 'a'] }, { $eq: ['last_name', 'b'] }] }
 */
export const selector_to_where = (
    selector: UniqueSelector
): StorageWhere | undefined =>
    combine_wheres<never>(
        Object.entries(selector).map(
            ([column, value]): StorageWhere => ({ $eq: [column, value] })
        ),
        '$and'
    )

export const is_subquery = <Extra>(
    value: readonly Scalar[] | Subquery<Extra>
): value is Subquery<Extra> => '$from' in value

/**
 * Where clause on relation.to_table that matches the rows linked to the given from_table row.
 * Returns undefined when the row has no key to link by (a null foreign key), in which case nothing
 * is linked.
 */
export const get_link_where = (
    relation: RelationField,
    from_row: Row
): StorageWhere | undefined => {
    const value = from_row[relation.from_column]
    if (value === null || value === undefined) {
        return undefined
    }

    if (relation.through) {
        return {
            $in: [
                relation.to_column,
                {
                    $select: [relation.through.to_column],
                    $from: relation.through.table,
                    $where: { $eq: [relation.through.from_column, value] },
                },
            ],
        }
    }

    return { $eq: [relation.to_column, value] }
}
