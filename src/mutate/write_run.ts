import {
    PrimitiveOperation,
    TetherContext,
} from '../executor/executor_types'
import { combine_wheres, get_link_where, selector_to_where } from '../filter/filter_helpers'
import { StorageWhere } from '../filter/filter_types'
import {
    CardinalityViolationError,
    TransactionAbortedError,
    UniqueTargetNotFoundError,
} from '../helpers/error_handling'
import { get_primary_key, get_relation_names, relation } from '../schema/schema_helpers'
import { JoinTable, RelationField } from '../schema/schema_types'
import { Path, Row, Scalar } from '../types'
import { is_value_ref } from './write_plan'
import {
    RowRef,
    StepCondition,
    ValueSource,
    WritePlan,
    WriteResult,
    WriteStep,
} from './write_types'

type RowState = {
    readonly table: string
    status: 'found' | 'missing' | 'created'
    row?: Row
}

type RunState<Tx> = {
    readonly context: TetherContext<Tx>
    readonly tx: Tx
    readonly rows: Map<RowRef, RowState>
}

const values_where = (values: Row): StorageWhere => ({
    $and: Object.entries(values).map(
        ([column, value]): StorageWhere => ({ $eq: [column, value] })
    ),
})

const identity = (run: RunState<unknown>, table: string, row: Row): Row =>
    Object.fromEntries(
        get_primary_key(run.context.schema, table).map(
            (column): [string, Scalar] => [column, row[column]]
        )
    )

const same_row = (
    run: RunState<unknown>,
    table: string,
    row1: Row,
    row2: Row
) => {
    const identity1 = identity(run, table, row1)
    return Object.keys(identity1).every(column => identity1[column] === row2[column])
}

const get_row = (run: RunState<unknown>, ref: RowRef) => {
    const state = run.rows.get(ref)
    if (!state?.row) {
        throw new Error(`Row ${ref} was used before it was located or inserted`)
    }
    return state.row
}

const get_through = (relation: RelationField): JoinTable => {
    if (!relation.through) {
        throw new Error(`${relation.from_table}.${relation.name} has no join table`)
    }
    return relation.through
}

const resolve_values = (
    run: RunState<unknown>,
    values: Record<string, ValueSource>
): Row =>
    Object.fromEntries(
        Object.entries(values).map(([column, value]): [string, Scalar] => [
            column,
            is_value_ref(value) ? get_row(run, value.$ref)[value.$column] : value,
        ])
    )

const conditions_met = (
    run: RunState<unknown>,
    conditions: readonly StepCondition[]
) =>
    conditions.every(condition => {
        const status = run.rows.get(condition.ref)?.status
        return condition.outcome === 'found'
            ? status === 'found'
            : status === 'missing' || status === 'created'
    })

const execute = async (run: RunState<unknown>, operation: PrimitiveOperation) => {
    const result = await run.context.executor.execute(run.tx, operation)
    if (result.kind === 'conflict') {
        throw new Error(result.message)
    }
    return result
}

const query = (run: RunState<unknown>, table: string, where: StorageWhere | undefined) =>
    run.context.executor.query(run.tx, { table, where })

/**
 * A one to one relation stored on this table allows a single row per referenced row. Storage may
 * enforce this with a unique key, but the write is rejected here either way.
 */
const check_one_to_one_links = async (
    run: RunState<unknown>,
    table: string,
    values: Row,
    path: Path,
    own_row?: Row
) => {
    const one_to_one_relations = get_relation_names(run.context.schema, table)
        .map(name => relation(run.context.schema, table, name))
        .filter(
            field =>
                field.ownership === 'source' &&
                field.cardinality === 'one_to_one' &&
                field.from_column in values &&
                values[field.from_column] !== null
        )

    for (const field of one_to_one_relations) {
        const value = values[field.from_column]
        const holders = await query(run, table, { $eq: [field.from_column, value] })
        const others = holders.filter(
            row => !own_row || !same_row(run, table, row, own_row)
        )
        if (others.length > 0) {
            throw new CardinalityViolationError(
                `${table}.${field.name} is one to one, but the ${field.to_table} row with ${field.to_column} ${JSON.stringify(value)} is already linked to another ${table} row`,
                path
            )
        }
    }
}

const update_row = async (
    run: RunState<unknown>,
    table: string,
    row: Row,
    values: Row,
    path: Path
) => {
    await check_one_to_one_links(run, table, values, path, row)
    await execute(run, {
        kind: 'update',
        table,
        where: values_where(identity(run, table, row)),
        values,
    })
}

/**
 * Updates a row the plan refers to, keeping the copy the plan holds in step with storage
 */
const update_ref = async (
    run: RunState<unknown>,
    ref: RowRef,
    values: Row,
    path: Path
) => {
    const row = get_row(run, ref)
    const state = run.rows.get(ref)
    if (state) {
        await update_row(run, state.table, row, values, path)
        state.row = { ...row, ...values }
    }
}

const delete_row = async (run: RunState<unknown>, table: string, row: Row) => {
    await execute(run, {
        kind: 'delete',
        table,
        where: values_where(identity(run, table, row)),
    })
}

const get_linked_rows = async (
    run: RunState<unknown>,
    relation: RelationField,
    parent: RowRef,
    where?: StorageWhere
) => {
    const link_where = get_link_where(relation, get_row(run, parent))
    if (link_where === undefined) {
        return []
    }
    return query(
        run,
        relation.to_table,
        combine_wheres<never>([link_where, where], '$and')
    )
}

const detach_children = async (
    run: RunState<unknown>,
    step: { readonly relation: RelationField; readonly path: Path },
    children: Row[]
) => {
    const { relation } = step
    if (children.length > 0 && !relation.nullable_foreign_key) {
        throw new CardinalityViolationError(
            `${relation.from_table}.${relation.name} would leave ${children.length} ${relation.to_table} row(s) without their required ${relation.to_column}`,
            step.path
        )
    }
    for (const child of children) {
        await update_row(
            run,
            relation.to_table,
            child,
            { [relation.to_column]: null },
            step.path
        )
    }
}

const remove_join_rows = async (
    run: RunState<unknown>,
    relation: RelationField,
    parent: Row | undefined,
    child: Row
) => {
    const through = get_through(relation)
    await execute(run, {
        kind: 'delete',
        table: through.table,
        where: values_where({
            ...(parent ? { [through.from_column]: parent[relation.from_column] } : {}),
            [through.to_column]: child[relation.to_column],
        }),
    })
}

const run_locate = async (
    run: RunState<unknown>,
    step: Extract<WriteStep, { kind: 'locate' }>
) => {
    const link_where = step.linked_to
        ? get_link_where(step.linked_to.relation, get_row(run, step.linked_to.parent))
        : undefined
    const [row] =
        step.linked_to && link_where === undefined
            ? []
            : await run.context.executor.query(run.tx, {
                  table: step.table,
                  where: combine_wheres<never>(
                      [selector_to_where(step.where), link_where],
                      '$and'
                  ),
                  limit: 1,
              })

    if (row !== undefined) {
        run.rows.set(step.ref, { table: step.table, status: 'found', row })
        return
    }
    if (step.if_missing === 'fail') {
        throw new UniqueTargetNotFoundError(step.table, step.where, step.path)
    }
    run.rows.set(step.ref, { table: step.table, status: 'missing' })
}

const run_insert = async (
    run: RunState<unknown>,
    step: Extract<WriteStep, { kind: 'insert' }>
) => {
    const values = resolve_values(run, step.values)
    await check_one_to_one_links(run, step.table, values, step.path)
    const result = await run.context.executor.execute(run.tx, {
        kind: 'insert',
        table: step.table,
        values,
    })

    if (result.kind === 'conflict') {
        if (step.on_conflict === 'fail') {
            throw new Error(result.message)
        }
        // a concurrent writer created the row after it was looked up
        const [row] = await query(run, step.table, selector_to_where(step.on_conflict.relocate))
        if (row === undefined) {
            throw new Error(result.message)
        }
        run.rows.set(step.ref, { table: step.table, status: 'found', row })
        return
    }

    const inserted = {
        ...values,
        ...(result.kind === 'inserted' ? result.generated : {}),
    }
    // read back to pick up the values storage filled in, such as defaults
    const [row] = await query(
        run,
        step.table,
        values_where(identity(run, step.table, inserted))
    )
    run.rows.set(step.ref, {
        table: step.table,
        status: 'created',
        row: row ?? inserted,
    })
}

const run_step = async (run: RunState<unknown>, step: WriteStep) => {
    switch (step.kind) {
        case 'locate':
            return run_locate(run, step)
        case 'insert':
            return run_insert(run, step)
        case 'update':
            return update_ref(run, step.ref, resolve_values(run, step.values), step.path)
        case 'delete':
            return delete_row(run, step.table, get_row(run, step.ref))
        case 'link': {
            const { relation } = step
            return relation.ownership === 'source'
                ? update_ref(
                      run,
                      step.parent,
                      { [relation.from_column]: get_row(run, step.child)[relation.to_column] },
                      step.path
                  )
                : update_ref(
                      run,
                      step.child,
                      { [relation.to_column]: get_row(run, step.parent)[relation.from_column] },
                      step.path
                  )
        }
        case 'unlink': {
            const { relation } = step
            return relation.ownership === 'source'
                ? update_ref(run, step.parent, { [relation.from_column]: null }, step.path)
                : update_ref(run, step.child, { [relation.to_column]: null }, step.path)
        }
        case 'link_join': {
            const { relation } = step
            const through = get_through(relation)
            const values = {
                [through.from_column]: get_row(run, step.parent)[relation.from_column],
                [through.to_column]: get_row(run, step.child)[relation.to_column],
            }
            const existing = await query(run, through.table, values_where(values))
            if (existing.length === 0) {
                await execute(run, { kind: 'insert', table: through.table, values })
            }
            return
        }
        case 'unlink_join':
            return remove_join_rows(
                run,
                step.relation,
                step.parent === undefined ? undefined : get_row(run, step.parent),
                get_row(run, step.child)
            )
        case 'unlink_current': {
            const keep = step.keep === undefined ? undefined : run.rows.get(step.keep)?.row
            const current = await get_linked_rows(run, step.relation, step.parent)
            const to_unlink = current.filter(
                row => !keep || !same_row(run, step.relation.to_table, row, keep)
            )
            return detach_children(run, step, to_unlink)
        }
        case 'unlink_many': {
            const { relation } = step
            const keep = step.keep.flatMap(ref => {
                const row = run.rows.get(ref)?.row
                return row ? [row] : []
            })
            const current = await get_linked_rows(run, relation, step.parent)
            const to_unlink = current.filter(
                row => !keep.some(kept => same_row(run, relation.to_table, row, kept))
            )
            if (relation.ownership !== 'join_table') {
                return detach_children(run, step, to_unlink)
            }
            const parent = get_row(run, step.parent)
            for (const row of to_unlink) {
                await remove_join_rows(run, relation, parent, row)
            }
            return
        }
        case 'update_many': {
            const children = await get_linked_rows(run, step.relation, step.parent, step.where)
            for (const child of children) {
                await update_row(run, step.relation.to_table, child, step.values, step.path)
            }
            return
        }
        case 'delete_many': {
            const { relation } = step
            const children = await get_linked_rows(run, relation, step.parent, step.where)
            for (const child of children) {
                if (relation.ownership === 'join_table') {
                    await remove_join_rows(run, relation, undefined, child)
                }
                await delete_row(run, relation.to_table, child)
            }
            return
        }
    }
}

/**
 * Runs every step of a write plan in one transaction. Steps run one at a time in plan order,
 * since later steps read rows produced by earlier ones. Any failure rolls the transaction back.
 */
export const run_write_plan = async <Tx>(
    context: TetherContext<Tx>,
    plan: WritePlan
): Promise<WriteResult> => {
    const logger = context.logger ?? console
    const tx = await context.executor.begin()
    const run: RunState<Tx> = { context, tx, rows: new Map() }

    let step_index = 0
    try {
        for (; step_index < plan.steps.length; step_index++) {
            const step = plan.steps[step_index]
            if (conditions_met(run, step.conditions)) {
                await run_step(run, step)
            }
        }
        await context.executor.commit(tx)
    } catch (error) {
        const path = plan.steps[step_index]?.path ?? []
        try {
            await context.executor.rollback(tx)
        } catch (rollback_error) {
            logger.error(`Rollback of write to ${plan.table} failed`, rollback_error)
        }
        const aborted = new TransactionAbortedError(error, step_index, path)
        logger.error(`Write to ${plan.table} rolled back: ${aborted.message}`, { path })
        throw aborted
    }

    const root = run.rows.get(plan.root)
    if (!root?.row) {
        return { row: null, plan }
    }
    const [row] = await context.executor.query(undefined, {
        table: root.table,
        where: values_where(identity(run, root.table, root.row)),
    })
    return { row: row ?? null, plan }
}
