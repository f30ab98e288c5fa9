import { combine_wheres, selector_to_where } from '../filter/filter_helpers'
import { StorageWhere } from '../filter/filter_types'
import { translate_relation_filters } from '../filter/relation_filter'
import {
    SchemaError,
    SelectorError,
    throw_if_issues,
} from '../helpers/error_handling'
import { group_by, unique_values } from '../helpers/helpers'
import { is_table_name, is_unique_selector } from '../schema/schema_helpers'
import { UniqueSelector } from '../schema/schema_types'
import { TetherContext } from '../executor/executor_types'
import { Row, Scalar } from '../types'
import { get_read_plan, RelationFetch } from './read_plan'
import {
    FindManyArgs,
    FindUniqueArgs,
    ReadSpec,
    ResultRow,
} from './read_types'
import { get_find_many_issues, get_read_spec_issues } from './read_validation'

/**
 * Children of one relation fetch, grouped by the parent key they belong to
 */
type FetchResult = {
    readonly rows: Row[]
    readonly by_parent_key: Map<Scalar, Row[]>
}

const path_key = (path: readonly string[]) => JSON.stringify(path)

const check_table = (context: TetherContext, table: string) => {
    if (!is_table_name(context.schema, table)) {
        throw new SchemaError(`${table} is not a table`)
    }
}

const get_target_query = (
    context: TetherContext,
    fetch: RelationFetch,
    key_column: string,
    keys: Scalar[]
) => {
    const { relation, options } = fetch
    const filter =
        options.where === undefined
            ? undefined
            : translate_relation_filters(
                  context.schema,
                  relation.to_table,
                  options.where,
                  [...fetch.path, 'where']
              )
    const key_where: StorageWhere = { $in: [key_column, keys] }
    return {
        table: relation.to_table,
        where: combine_wheres<never>([key_where, filter], '$and'),
        order_by: options.order_by,
    }
}

const run_fetch = async (
    context: TetherContext,
    fetch: RelationFetch,
    parent_rows: Row[]
): Promise<FetchResult> => {
    const { relation } = fetch
    const keys = unique_values(parent_rows.map(row => row[relation.from_column]))
    if (keys.length === 0) {
        return { rows: [], by_parent_key: new Map() }
    }

    if (!relation.through) {
        const rows = await context.executor.query(
            undefined,
            get_target_query(context, fetch, relation.to_column, keys)
        )
        return {
            rows,
            by_parent_key: group_by(rows, row => row[relation.to_column]),
        }
    }

    const { through } = relation
    const join_rows = await context.executor.query(undefined, {
        table: through.table,
        where: { $in: [through.from_column, keys] },
    })
    const target_keys = unique_values(
        join_rows.map(join_row => join_row[through.to_column])
    )
    if (target_keys.length === 0) {
        return { rows: [], by_parent_key: new Map() }
    }

    const rows = await context.executor.query(
        undefined,
        get_target_query(context, fetch, relation.to_column, target_keys)
    )

    // iterating targets in storage order keeps each parent's children in storage order
    const join_rows_by_target = group_by(
        join_rows,
        join_row => join_row[through.to_column]
    )
    const by_parent_key = new Map<Scalar, Row[]>()
    rows.forEach(row => {
        const links = join_rows_by_target.get(row[relation.to_column]) ?? []
        links.forEach(link => {
            const parent_key = link[through.from_column]
            const group = by_parent_key.get(parent_key)
            if (group) {
                group.push(row)
            } else {
                by_parent_key.set(parent_key, [row])
            }
        })
    })

    return { rows, by_parent_key }
}

const assemble_row = (
    row: Row,
    path: string[],
    fetches_by_parent: Map<string, RelationFetch[]>,
    results: Map<string, FetchResult>
): ResultRow => {
    const result_row: ResultRow = { ...row }
    const fetches = fetches_by_parent.get(path_key(path)) ?? []
    fetches.forEach(fetch => {
        const { relation } = fetch
        const fetch_result = results.get(path_key(fetch.path))
        const key = row[relation.from_column]
        const all_children =
            key === null ? [] : fetch_result?.by_parent_key.get(key) ?? []
        const children =
            fetch.options.limit === undefined
                ? all_children
                : all_children.slice(0, fetch.options.limit)
        const nested = children.map(child =>
            assemble_row(child, fetch.path, fetches_by_parent, results)
        )
        result_row[relation.name] = relation.is_list ? nested : nested[0] ?? null
    })
    return result_row
}

/**
 * Loads the relations of a read spec under the given rows. Each level of the read plan runs one
 * batched query per relation (two for join table relations), concurrently within the level.
 */
export const resolve_includes = async (
    context: TetherContext,
    table: string,
    rows: Row[],
    read_spec: ReadSpec
): Promise<ResultRow[]> => {
    const read_plan = get_read_plan(context.schema, table, read_spec)
    const results = new Map<string, FetchResult>([
        [path_key([]), { rows, by_parent_key: new Map() }],
    ])

    for (const level of read_plan) {
        const level_results = await Promise.all(
            level.map(fetch => {
                const parent = results.get(path_key(fetch.path.slice(0, -1)))
                return run_fetch(context, fetch, parent?.rows ?? [])
            })
        )
        level.forEach((fetch, i) =>
            results.set(path_key(fetch.path), level_results[i])
        )
    }

    const fetches_by_parent = group_by(read_plan.flat(), fetch =>
        path_key(fetch.path.slice(0, -1))
    )

    return rows.map(row => assemble_row(row, [], fetches_by_parent, results))
}

/**
 * @example
 * await tether_find_many(context, 'users', {
 *     where: { $some: ['posts', { $gt: ['views', 1] }] },
 *     order_by: [{ $asc: 'email' }],
 *     include: { posts: { include: { comments: true } } },
 * })
 */
export const tether_find_many = async (
    context: TetherContext,
    table: string,
    args: FindManyArgs = {}
): Promise<ResultRow[]> => {
    check_table(context, table)
    throw_if_issues(get_find_many_issues(context.schema, table, args))

    const where =
        args.where === undefined
            ? undefined
            : translate_relation_filters(context.schema, table, args.where, [
                  'where',
              ])
    const rows = await context.executor.query(undefined, {
        table,
        where,
        order_by: args.order_by,
        limit: args.limit,
        offset: args.offset,
    })

    return resolve_includes(context, table, rows, args.include ?? {})
}

export const tether_find_unique = async (
    context: TetherContext,
    table: string,
    selector: UniqueSelector,
    args: FindUniqueArgs = {}
): Promise<ResultRow | null> => {
    check_table(context, table)
    if (!is_unique_selector(context.schema, table, selector)) {
        throw new SelectorError(
            `${JSON.stringify(selector)} does not select a unique ${table} row`
        )
    }
    if (args.include) {
        throw_if_issues(
            get_read_spec_issues(context.schema, table, args.include, [
                'include',
            ])
        )
    }

    const rows = await context.executor.query(undefined, {
        table,
        where: selector_to_where(selector),
    })
    const [row] = await resolve_includes(
        context,
        table,
        rows.slice(0, 1),
        args.include ?? {}
    )
    return row ?? null
}
