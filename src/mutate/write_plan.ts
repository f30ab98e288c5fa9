/**
 * Turns a parsed write into an ordered list of steps. Rows are referred to by symbolic references
 * until the plan runs, and the order of the steps comes from the rows each step reads.
 *
 * @module write_plan
 */

import { translate_relation_filters } from '../filter/relation_filter'
import { ConstraintCycleError } from '../helpers/error_handling'
import { toposort } from '../helpers/toposort'
import { is_column_nullable } from '../schema/schema_helpers'
import { RelationField, SchemaModel, UniqueSelector } from '../schema/schema_types'
import { Path } from '../types'
import {
    InsertStep,
    ParsedRelationWrite,
    ParsedRow,
    ParsedSelector,
    ParsedWrite,
    RowRef,
    StepCondition,
    UpdateStep,
    ValueSource,
    WritePlan,
    WriteStep,
} from './write_types'

type PlanState = {
    readonly model: SchemaModel
    readonly steps: WriteStep[]
    readonly label_refs: Map<string, RowRef>
    ref_count: number
}

type ParentRow = {
    readonly ref: RowRef
    readonly table: string
    /** set while the parent is being created, foreign keys it stores go straight into its insert */
    readonly insert_values?: Record<string, ValueSource>
}

export const is_value_ref = (
    value: ValueSource
): value is { readonly $ref: RowRef; readonly $column: string } =>
    typeof value === 'object' && value !== null

const new_ref = (state: PlanState): RowRef => {
    const ref = `r${state.ref_count}`
    state.ref_count += 1
    return ref
}

const label_ref = (state: PlanState, label: string) => {
    const existing = state.label_refs.get(label)
    if (existing) {
        return existing
    }
    const ref = new_ref(state)
    state.label_refs.set(label, ref)
    return ref
}

const created_ref = (state: PlanState, row: ParsedRow) =>
    row.label === undefined ? new_ref(state) : label_ref(state, row.label)

const push_locate = (
    state: PlanState,
    ref: RowRef,
    table: string,
    where: UniqueSelector,
    if_missing: 'fail' | 'continue',
    conditions: readonly StepCondition[],
    path: Path,
    linked_to?: { relation: RelationField; parent: RowRef }
) => {
    state.steps.push({
        kind: 'locate',
        ref,
        table,
        where,
        if_missing,
        conditions,
        path,
        ...(linked_to ? { linked_to } : {}),
    })
}

const resolve_selector = (
    state: PlanState,
    table: string,
    selector: ParsedSelector,
    conditions: readonly StepCondition[],
    path: Path
) => {
    if (selector.kind === 'label') {
        return label_ref(state, selector.label)
    }
    const ref = new_ref(state)
    push_locate(state, ref, table, selector.where, 'fail', conditions, path)
    return ref
}

const plan_created_row = (
    state: PlanState,
    row: ParsedRow,
    ref: RowRef,
    on_conflict: InsertStep['on_conflict'],
    conditions: readonly StepCondition[],
    path: Path,
    foreign_values: Record<string, ValueSource> = {}
) => {
    const values: Record<string, ValueSource> = { ...row.values, ...foreign_values }
    state.steps.push({
        kind: 'insert',
        ref,
        table: row.table,
        values,
        on_conflict,
        conditions,
        path,
    })
    plan_relation_writes(
        state,
        { ref, table: row.table, insert_values: values },
        row.relation_writes,
        conditions
    )
}

const plan_updated_row = (
    state: PlanState,
    ref: RowRef,
    data: ParsedRow,
    conditions: readonly StepCondition[],
    path: Path
) => {
    if (Object.keys(data.values).length > 0) {
        state.steps.push({
            kind: 'update',
            ref,
            table: data.table,
            values: { ...data.values },
            conditions,
            path,
        })
    }
    plan_relation_writes(
        state,
        { ref, table: data.table },
        data.relation_writes,
        conditions
    )
}

const link_existing = (
    state: PlanState,
    parent: ParentRow,
    relation: RelationField,
    child: RowRef,
    conditions: readonly StepCondition[],
    path: Path
) => {
    if (relation.ownership === 'source' && parent.insert_values) {
        parent.insert_values[relation.from_column] = {
            $ref: child,
            $column: relation.to_column,
        }
        return
    }

    state.steps.push({
        kind: relation.ownership === 'join_table' ? 'link_join' : 'link',
        relation,
        parent: parent.ref,
        child,
        conditions,
        path,
    })
}

/**
 * A single relation stored on the child side can only hold one child, so the current one is
 * unlinked before another is linked.
 */
const unlink_current_child = (
    state: PlanState,
    parent: ParentRow,
    relation: RelationField,
    keep: RowRef | undefined,
    conditions: readonly StepCondition[],
    path: Path
) => {
    if (relation.ownership !== 'target' || relation.is_list || parent.insert_values) {
        return
    }
    state.steps.push({
        kind: 'unlink_current',
        relation,
        parent: parent.ref,
        conditions,
        path,
        ...(keep ? { keep } : {}),
    })
}

const create_linked = (
    state: PlanState,
    parent: ParentRow,
    relation: RelationField,
    row: ParsedRow,
    ref: RowRef,
    conditions: readonly StepCondition[],
    path: Path
) => {
    if (relation.ownership === 'target') {
        plan_created_row(state, row, ref, 'fail', conditions, path, {
            [relation.to_column]: {
                $ref: parent.ref,
                $column: relation.from_column,
            },
        })
        return
    }

    plan_created_row(state, row, ref, 'fail', conditions, path)
    link_existing(state, parent, relation, ref, conditions, path)
}

const plan_relation_write = (
    state: PlanState,
    parent: ParentRow,
    write: ParsedRelationWrite,
    conditions: readonly StepCondition[]
) => {
    const { relation, directive, path } = write
    const to_table = relation.to_table
    const linked_to = { relation, parent: parent.ref }

    switch (directive.kind) {
        case 'create': {
            unlink_current_child(state, parent, relation, undefined, conditions, path)
            const ref = created_ref(state, directive.row)
            create_linked(
                state,
                parent,
                relation,
                directive.row,
                ref,
                conditions,
                path
            )
            return
        }
        case 'connect': {
            const child = resolve_selector(
                state,
                to_table,
                directive.selector,
                conditions,
                path
            )
            unlink_current_child(state, parent, relation, child, conditions, path)
            link_existing(state, parent, relation, child, conditions, path)
            return
        }
        case 'connect_or_create': {
            const ref = created_ref(state, directive.row)
            const found = [...conditions, { ref, outcome: 'found' as const }]
            const missing = [...conditions, { ref, outcome: 'missing' as const }]
            const on_conflict = { relocate: directive.where }

            push_locate(
                state,
                ref,
                to_table,
                directive.where,
                'continue',
                conditions,
                path
            )
            unlink_current_child(state, parent, relation, ref, conditions, path)

            if (relation.ownership === 'target') {
                plan_created_row(
                    state,
                    directive.row,
                    ref,
                    on_conflict,
                    missing,
                    path,
                    {
                        [relation.to_column]: {
                            $ref: parent.ref,
                            $column: relation.from_column,
                        },
                    }
                )
                link_existing(state, parent, relation, ref, found, path)
            } else {
                plan_created_row(
                    state,
                    directive.row,
                    ref,
                    on_conflict,
                    missing,
                    path
                )
                link_existing(state, parent, relation, ref, conditions, path)
            }
            return
        }
        case 'update': {
            const ref = new_ref(state)
            push_locate(
                state,
                ref,
                to_table,
                directive.where ?? {},
                'fail',
                conditions,
                path,
                linked_to
            )
            plan_updated_row(state, ref, directive.data, conditions, path)
            return
        }
        case 'upsert': {
            const ref = created_ref(state, directive.create)
            const found = [...conditions, { ref, outcome: 'found' as const }]
            const missing = [...conditions, { ref, outcome: 'missing' as const }]

            push_locate(
                state,
                ref,
                to_table,
                directive.where ?? {},
                'continue',
                conditions,
                path,
                linked_to
            )
            plan_updated_row(state, ref, directive.update, found, path)
            unlink_current_child(state, parent, relation, undefined, missing, path)
            create_linked(
                state,
                parent,
                relation,
                directive.create,
                ref,
                missing,
                path
            )
            return
        }
        case 'delete': {
            const ref = new_ref(state)
            push_locate(
                state,
                ref,
                to_table,
                directive.where ?? {},
                'fail',
                conditions,
                path,
                linked_to
            )
            // nothing may still point at the row when it is deleted
            if (relation.ownership === 'join_table') {
                state.steps.push({
                    kind: 'unlink_join',
                    relation,
                    child: ref,
                    conditions,
                    path,
                })
            }
            if (relation.ownership === 'source') {
                state.steps.push({
                    kind: 'unlink',
                    relation,
                    parent: parent.ref,
                    child: ref,
                    conditions,
                    path,
                })
            }
            state.steps.push({
                kind: 'delete',
                ref,
                table: to_table,
                conditions,
                path,
            })
            return
        }
        case 'disconnect': {
            const ref = new_ref(state)
            push_locate(
                state,
                ref,
                to_table,
                directive.where ?? {},
                'fail',
                conditions,
                path,
                linked_to
            )
            state.steps.push({
                kind:
                    relation.ownership === 'join_table' ? 'unlink_join' : 'unlink',
                relation,
                parent: parent.ref,
                child: ref,
                conditions,
                path,
            })
            return
        }
        case 'set': {
            const refs = directive.selectors.map((selector, i) =>
                resolve_selector(state, to_table, selector, conditions, [
                    ...path,
                    i,
                ])
            )
            state.steps.push({
                kind: 'unlink_many',
                relation,
                parent: parent.ref,
                keep: refs,
                conditions,
                path,
            })
            refs.forEach((ref, i) =>
                link_existing(state, parent, relation, ref, conditions, [
                    ...path,
                    i,
                ])
            )
            return
        }
        case 'update_many': {
            state.steps.push({
                kind: 'update_many',
                relation,
                parent: parent.ref,
                where: translate_relation_filters(
                    state.model,
                    to_table,
                    directive.where,
                    [...path, 'where']
                ),
                values: directive.values,
                conditions,
                path,
            })
            return
        }
        case 'delete_many': {
            state.steps.push({
                kind: 'delete_many',
                relation,
                parent: parent.ref,
                where: translate_relation_filters(
                    state.model,
                    to_table,
                    directive.where,
                    path
                ),
                conditions,
                path,
            })
            return
        }
    }
}

const plan_relation_writes = (
    state: PlanState,
    parent: ParentRow,
    writes: readonly ParsedRelationWrite[],
    conditions: readonly StepCondition[]
) => {
    writes.forEach(write => plan_relation_write(state, parent, write, conditions))
}

const value_refs = (values: Record<string, ValueSource>) =>
    Object.values(values).flatMap(value => (is_value_ref(value) ? [value.$ref] : []))

/**
 * Row references a step reads, each of which must have been located or inserted before it runs
 */
export const get_step_reads = (step: WriteStep): RowRef[] => {
    switch (step.kind) {
        case 'locate':
            return step.linked_to ? [step.linked_to.parent] : []
        case 'insert':
            return value_refs(step.values)
        case 'update':
            return [step.ref, ...value_refs(step.values)]
        case 'delete':
            return [step.ref]
        case 'link':
        case 'unlink':
        case 'link_join':
            return [step.parent, step.child]
        case 'unlink_join':
            return step.parent ? [step.parent, step.child] : [step.child]
        case 'unlink_current':
        case 'update_many':
        case 'delete_many':
            return [step.parent]
        case 'unlink_many':
            return [step.parent, ...step.keep]
    }
}

/**
 * @returns dag[i] lists the steps that must run after step i
 */
export const get_step_dag = (steps: readonly WriteStep[]) => {
    const definers = new Map<RowRef, { index: number; is_locate: boolean }[]>()
    steps.forEach((step, index) => {
        if (step.kind === 'locate' || step.kind === 'insert') {
            definers.set(step.ref, [
                ...(definers.get(step.ref) ?? []),
                { index, is_locate: step.kind === 'locate' },
            ])
        }
    })

    const dag: number[][] = steps.map(() => [])
    const add_edges = (ref: RowRef, index: number, locate_only: boolean) =>
        (definers.get(ref) ?? [])
            .filter(
                definer =>
                    definer.index !== index &&
                    (!locate_only || definer.is_locate) &&
                    !dag[definer.index].includes(index)
            )
            .forEach(definer => dag[definer.index].push(index))

    steps.forEach((step, index) => {
        get_step_reads(step).forEach(ref => add_edges(ref, index, false))
        // conditions and kept rows only need the lookup, the row itself may be inserted later
        step.conditions.forEach(condition =>
            add_edges(condition.ref, index, true)
        )
        if (step.kind === 'unlink_current' && step.keep) {
            add_edges(step.keep, index, true)
        }
    })

    return dag
}

/**
 * Breaks one insert cycle by taking a nullable foreign key out of an insert and setting it in a
 * deferred update once the referenced row exists.
 */
const split_cycle = (
    model: SchemaModel,
    steps: readonly WriteStep[],
    unsorted: readonly number[]
): WriteStep[] | undefined => {
    const unsorted_refs = new Set(
        unsorted.flatMap(index => {
            const step = steps[index]
            return step.kind === 'insert' || step.kind === 'locate' ? [step.ref] : []
        })
    )

    for (const index of unsorted) {
        const step = steps[index]
        if (step.kind !== 'insert') {
            continue
        }

        const column = Object.keys(step.values).find(column => {
            const value = step.values[column]
            return (
                is_value_ref(value) &&
                value.$ref !== step.ref &&
                unsorted_refs.has(value.$ref) &&
                is_column_nullable(model, step.table, column)
            )
        })
        if (column === undefined) {
            continue
        }

        const { [column]: deferred_value, ...values } = step.values
        const insert: InsertStep = { ...step, values }
        const patch: UpdateStep = {
            kind: 'update',
            ref: step.ref,
            table: step.table,
            values: { [column]: deferred_value },
            deferred: true,
            conditions: step.conditions,
            path: step.path,
        }
        return [...steps.slice(0, index), insert, ...steps.slice(index + 1), patch]
    }

    return undefined
}

/**
 * Orders steps so every step runs after the steps that produce the rows it reads. Ties keep the
 * order the steps were planned in, which is the order of the write tree.
 */
export const order_steps = (
    model: SchemaModel,
    steps: readonly WriteStep[]
): WriteStep[] => {
    let current = [...steps]
    for (;;) {
        const { sorted, unsorted } = toposort(get_step_dag(current))
        if (unsorted.length === 0) {
            return sorted.map(index => current[index])
        }

        const split = split_cycle(model, current, unsorted)
        if (!split) {
            const cycle_steps = unsorted.map(index => current[index])
            const tables = [
                ...new Set(
                    cycle_steps.flatMap(step => (step.kind === 'insert' ? [step.table] : []))
                ),
            ]
            throw new ConstraintCycleError(
                `Rows of ${tables.join(', ')} reference each other through required foreign keys, so none of them can be inserted first`,
                cycle_steps[0].path,
                cycle_steps.map(step => step.path)
            )
        }
        current = split
    }
}

export const get_write_plan = (model: SchemaModel, parsed: ParsedWrite): WritePlan => {
    const state: PlanState = {
        model,
        steps: [],
        label_refs: new Map(),
        ref_count: 0,
    }

    if (parsed.operation === 'create') {
        const root = created_ref(state, parsed.row)
        plan_created_row(state, parsed.row, root, 'fail', [], [])
        return { root, table: parsed.row.table, steps: order_steps(model, state.steps) }
    }

    const root = new_ref(state)
    push_locate(state, root, parsed.data.table, parsed.where, 'fail', [], [])
    plan_updated_row(state, root, parsed.data, [], [])
    return { root, table: parsed.data.table, steps: order_steps(model, state.steps) }
}
