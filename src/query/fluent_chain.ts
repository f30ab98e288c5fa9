import { combine_wheres, selector_to_where } from '../filter/filter_helpers'
import { StorageQuery, StorageWhere, Where } from '../filter/filter_types'
import { get_where_issues } from '../filter/filter_validation'
import {
    Edge,
    edge_path_to_where_ins,
    get_relation_edges,
    reverse_edge,
    translate_relation_filters,
} from '../filter/relation_filter'
import {
    ChainCardinalityError,
    SelectorError,
    throw_if_issues,
} from '../helpers/error_handling'
import { relation, is_unique_selector } from '../schema/schema_helpers'
import { SchemaModel, UniqueSelector } from '../schema/schema_types'
import { TetherContext } from '../executor/executor_types'
import { Path, Row } from '../types'

export type ChainStep = {
    readonly relation: string
    readonly where?: Where
}

export type ChainAnchor = 'single' | 'many'

/**
 * Query (a) locates the root row. Query (b), when there are steps, fetches the rows of the last
 * relation that are reachable from the root row through every step.
 */
export type ChainPlan = {
    readonly anchor: ChainAnchor
    readonly root_query: StorageQuery
    readonly final?: {
        readonly table: string
        /** edges from the first table after the root back through the chain to the last table */
        readonly edges: readonly Edge[]
        readonly first_edge: Edge
        readonly where?: StorageWhere
    }
}

export type ChainResult =
    | { readonly anchor: 'single'; readonly row: Row | null }
    | { readonly anchor: 'many'; readonly rows: Row[] }

/**
 * Validates a fluent chain and plans its queries. No storage access happens here.
 */
export const resolve_chain = (
    model: SchemaModel,
    table: string,
    selector: UniqueSelector,
    steps: readonly ChainStep[]
): ChainPlan => {
    if (!is_unique_selector(model, table, selector)) {
        throw new SelectorError(
            `${JSON.stringify(selector)} does not select a unique ${table} row`
        )
    }

    let anchor: ChainAnchor = 'single'
    let current_table = table
    const path: Path = []
    const edges: Edge[] = []

    steps.forEach(step => {
        const step_path = [...path, step.relation]
        if (anchor === 'many') {
            throw new ChainCardinalityError(
                `Cannot follow ${step.relation} after a list relation, a chain ends at its first list relation`,
                step_path
            )
        }

        const relation_field = relation(model, current_table, step.relation)
        if (step.where !== undefined) {
            if (!relation_field.is_list) {
                throw new ChainCardinalityError(
                    `Cannot filter ${current_table}.${step.relation}, filters are only allowed on list relations`,
                    step_path
                )
            }
            throw_if_issues(
                get_where_issues(model, relation_field.to_table, step.where, [
                    ...step_path,
                    'where',
                ])
            )
        }

        anchor = relation_field.is_list ? 'many' : 'single'
        current_table = relation_field.to_table
        path.push(step.relation)
        edges.push(...get_relation_edges(relation_field))
    })

    const root_query: StorageQuery = {
        table,
        where: selector_to_where(selector),
        limit: 1,
    }

    const last_step = steps[steps.length - 1]
    if (last_step === undefined) {
        return { anchor, root_query }
    }

    const [first_edge, ...rest_edges] = edges
    const final_where =
        last_step.where === undefined
            ? undefined
            : translate_relation_filters(model, current_table, last_step.where, [
                  ...path,
                  'where',
              ])

    return {
        anchor,
        root_query,
        final: {
            table: current_table,
            edges: rest_edges.reverse().map(reverse_edge),
            first_edge,
            where: final_where,
        },
    }
}

/**
 * Where clause on the last table of the chain matching the rows reachable from the root row
 */
export const get_chain_where = (
    model: SchemaModel,
    final: NonNullable<ChainPlan['final']>,
    root_row: Row
): StorageWhere | undefined => {
    const root_value = root_row[final.first_edge.from_column]
    if (root_value === null || root_value === undefined) {
        return undefined
    }

    const first_table_where: StorageWhere = {
        $eq: [final.first_edge.to_column, root_value],
    }
    const reachable_where =
        final.edges.length === 0
            ? first_table_where
            : edge_path_to_where_ins(model, final.edges, first_table_where)

    return combine_wheres<never>([reachable_where, final.where], '$and')
}

export const run_chain = async (
    context: TetherContext,
    plan: ChainPlan
): Promise<ChainResult> => {
    const to_result = (rows: Row[]): ChainResult =>
        plan.anchor === 'many'
            ? { anchor: 'many', rows }
            : { anchor: 'single', row: rows[0] ?? null }

    const [root_row] = await context.executor.query(undefined, plan.root_query)
    if (root_row === undefined) {
        return to_result([])
    }
    if (!plan.final) {
        return to_result([root_row])
    }

    const where = get_chain_where(context.schema, plan.final, root_row)
    if (where === undefined) {
        return to_result([])
    }

    const rows = await context.executor.query(undefined, {
        table: plan.final.table,
        where,
    })
    return to_result(rows)
}

export type FluentChain = {
    readonly plan: ChainPlan
    /** follows a relation of the current anchor. Throws straight away for invalid chains */
    to(relation: string, where?: Where): FluentChain
    /** runs the two queries one after the other, without a transaction */
    fetch(): Promise<ChainResult>
}

const make_chain = (
    context: TetherContext,
    table: string,
    selector: UniqueSelector,
    steps: readonly ChainStep[]
): FluentChain => {
    const plan = resolve_chain(context.schema, table, selector, steps)
    return {
        plan,
        to: (relation_name, where) =>
            make_chain(context, table, selector, [
                ...steps,
                where === undefined
                    ? { relation: relation_name }
                    : { relation: relation_name, where },
            ]),
        fetch: () => run_chain(context, plan),
    }
}

/**
 * @example
 * const posts = await fluent(context, 'users', { email: 'alice@test.io' })
 *     .to('posts', { $gt: ['views', 1] })
 *     .fetch()
 */
export const fluent = (
    context: TetherContext,
    table: string,
    selector: UniqueSelector
) => make_chain(context, table, selector, [])
