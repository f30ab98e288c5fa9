import { FilterError } from '../helpers/error_handling'
import { get_column_schema, is_relation_name } from '../schema/schema_helpers'
import { RelationField, SchemaModel } from '../schema/schema_types'
import { Path } from '../types'
import { combine_wheres, is_subquery } from './filter_helpers'
import { RelationClause, StorageWhere, Where } from './filter_types'

export type Edge = {
    from_table: string
    from_column: string
    to_table: string
    to_column: string
}

/**
 * Swaps the 'from' and 'to' components of an edge
 */
export const reverse_edge = (edge: Edge): Edge => ({
    from_table: edge.to_table,
    from_column: edge.to_column,
    to_table: edge.from_table,
    to_column: edge.from_column,
})

/**
 * The foreign key hops a relation makes: one for direct relations, two (through the join table)
 * for many-to-many relations.
 */
export const get_relation_edges = (relation: RelationField): Edge[] => {
    if (relation.through) {
        return [
            {
                from_table: relation.from_table,
                from_column: relation.from_column,
                to_table: relation.through.table,
                to_column: relation.through.from_column,
            },
            {
                from_table: relation.through.table,
                from_column: relation.through.to_column,
                to_table: relation.to_table,
                to_column: relation.to_column,
            },
        ]
    }

    return [
        {
            from_table: relation.from_table,
            from_column: relation.from_column,
            to_table: relation.to_table,
            to_column: relation.to_column,
        },
    ]
}

/**
 * Rewrites every relation filter ($some, $none, $every, $is, $is_not) in a where clause into $in
 * subqueries on the table in scope, so the whole filter runs as one query.
 *
 * @example
 * translate_relation_filters(model, 'users', { $some: ['posts', { $gt: ['views', 10] }] })
 * // {
 * //   $in: ['id', {
 * //     $select: ['author_id'],
 * //     $from: 'posts',
 * //     $where: { $and: [{ $not: { $eq: ['author_id', null] } }, { $gt: ['views', 10] }] }
 * //   }]
 * // }
 */
export const translate_relation_filters = (
    model: SchemaModel,
    table: string,
    where: Where,
    path: Path = []
): StorageWhere => {
    if ('$and' in where) {
        return {
            $and: where.$and.map((el, i) =>
                translate_relation_filters(model, table, el, [...path, '$and', i])
            ),
        }
    }

    if ('$or' in where) {
        return {
            $or: where.$or.map((el, i) =>
                translate_relation_filters(model, table, el, [...path, '$or', i])
            ),
        }
    }

    if ('$not' in where) {
        return {
            $not: translate_relation_filters(model, table, where.$not, [
                ...path,
                '$not',
            ]),
        }
    }

    if ('$in' in where) {
        const [column, values] = where.$in
        if (!is_subquery(values)) {
            return { $in: [column, values] }
        }
        const subquery_where =
            values.$where === undefined
                ? {}
                : {
                      $where: translate_relation_filters(
                          model,
                          values.$from,
                          values.$where,
                          [...path, '$in', 1, '$where']
                      ),
                  }
        return {
            $in: [
                column,
                { $select: values.$select, $from: values.$from, ...subquery_where },
            ],
        }
    }

    if ('$some' in where) {
        return relation_exists(model, table, where.$some, true, [...path, '$some'])
    }

    if ('$none' in where) {
        return {
            $not: relation_exists(model, table, where.$none, true, [
                ...path,
                '$none',
            ]),
        }
    }

    if ('$every' in where) {
        // every related row matches <=> no related row fails to match
        const [name, inner] = where.$every
        if (inner === undefined) {
            get_filter_relation(model, table, name, true, [...path, '$every'])
            return { $and: [] }
        }
        return {
            $not: relation_exists(model, table, [name, { $not: inner }], true, [
                ...path,
                '$every',
            ]),
        }
    }

    if ('$is' in where) {
        return relation_exists(model, table, where.$is, false, [...path, '$is'])
    }

    if ('$is_not' in where) {
        return {
            $not: relation_exists(model, table, where.$is_not, false, [
                ...path,
                '$is_not',
            ]),
        }
    }

    return where
}

const get_filter_relation = (
    model: SchemaModel,
    table: string,
    name: string,
    expects_list: boolean,
    path: Path
): RelationField => {
    if (!is_relation_name(model, table, name)) {
        throw new FilterError(`${name} is not a relation of ${table}`, path)
    }
    const relation = model.relations[table][name]
    if (relation.is_list !== expects_list) {
        const operators = expects_list ? '$some, $none and $every' : '$is and $is_not'
        throw new FilterError(
            `${operators} need a ${expects_list ? 'list' : 'single'} relation, but ${table}.${name} is ${relation.cardinality}`,
            path
        )
    }
    return relation
}

const relation_exists = (
    model: SchemaModel,
    table: string,
    clause: RelationClause,
    expects_list: boolean,
    path: Path
): StorageWhere => {
    const [name, inner] = clause
    const relation = get_filter_relation(model, table, name, expects_list, path)
    const inner_where =
        inner === undefined
            ? undefined
            : translate_relation_filters(model, relation.to_table, inner, [
                  ...path,
                  1,
              ])

    return edge_path_to_where_ins(
        model,
        get_relation_edges(relation),
        inner_where
    )
}

/**
 * Builds a where clause on the first table of the edge path that matches rows connected, through
 * every edge in order, to at least one row of the last table matching the given where clause.
 */
export const edge_path_to_where_ins = (
    model: SchemaModel,
    edge_path: readonly Edge[],
    where: StorageWhere | undefined
): StorageWhere => {
    // we need to reverse the edge path since we are building the where ins
    // from the inside out
    const reversed_edge_path = edge_path.slice().reverse()

    const clause = reversed_edge_path.reduce<StorageWhere | undefined>(
        (acc, edge) => edge_to_where_in(model, edge, acc),
        where
    )

    return clause ?? { $and: [] }
}

export const edge_to_where_in = (
    model: SchemaModel,
    edge: Edge,
    where: StorageWhere | undefined
): StorageWhere => {
    /*
        NOT IN breaks if there is a null on either side, since x NOT IN (1, NULL) is never true.
        Relation filters are negated for $none, $every and $is_not, so both sides of every where in
        filter out nulls.
    */
    const from_column_is_nullable = !get_column_schema(
        model,
        edge.from_table,
        edge.from_column
    )?.not_null
    const to_column_is_nullable = !get_column_schema(
        model,
        edge.to_table,
        edge.to_column
    )?.not_null

    const nullability_wheres: StorageWhere[] = to_column_is_nullable
        ? [{ $not: { $eq: [edge.to_column, null] } }]
        : []
    const inner_where = combine_wheres<never>(
        [...nullability_wheres, where],
        '$and'
    )

    const in_clause: StorageWhere = {
        $in: [
            edge.from_column,
            {
                $select: [edge.to_column],
                $from: edge.to_table,
                ...(inner_where ? { $where: inner_where } : {}),
            },
        ],
    }

    return from_column_is_nullable
        ? { $and: [{ $not: { $eq: [edge.from_column, null] } }, in_clause] }
        : in_clause
}
