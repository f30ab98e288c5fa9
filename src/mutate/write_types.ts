import { StorageWhere, Where } from '../filter/filter_types'
import { RelationField, UniqueSelector } from '../schema/schema_types'
import { Path, Row, Scalar } from '../types'

/**
 * Identifies one row, either by a unique constraint or, with `{ $label }`, as a row created by a
 * labelled create payload somewhere in the same write.
 */
export type Selector = UniqueSelector

/**
 * Column values and relation writes of one row. A create payload may carry a `$label` so that
 * other parts of the write can connect to the row it creates.
 */
export type WritePayload = { readonly [key: string]: Scalar | RelationWrite }

export type ConnectOrCreateArgs = {
    readonly where: Selector
    readonly create: WritePayload
}

export type NestedUpdateArgs = {
    /** required on list relations, defaults to the linked row on single relations */
    readonly where?: Selector
    readonly data: WritePayload
}

export type NestedUpsertArgs = {
    /** required on list relations, defaults to the linked row on single relations */
    readonly where?: Selector
    readonly create: WritePayload
    readonly update: WritePayload
}

export type UpdateManyArgs = {
    readonly where: Where
    readonly data: WritePayload
}

type OneOrMany<T> = T | readonly T[]

/**
 * One operation on a relation. Lists of rows are only accepted by list relations.
 */
export type WriteDirective =
    | { readonly create: OneOrMany<WritePayload> }
    | { readonly connect: OneOrMany<Selector> }
    | { readonly connect_or_create: OneOrMany<ConnectOrCreateArgs> }
    | { readonly update: OneOrMany<NestedUpdateArgs> }
    | { readonly upsert: OneOrMany<NestedUpsertArgs> }
    | { readonly delete: true | OneOrMany<Selector> }
    | { readonly disconnect: true | OneOrMany<Selector> }
    | { readonly set: readonly Selector[] }
    | { readonly update_many: OneOrMany<UpdateManyArgs> }
    | { readonly delete_many: OneOrMany<Where> }

export type RelationWrite = WriteDirective | readonly WriteDirective[]

/**
 * @example
 * {
 *     table: 'users',
 *     operation: 'create',
 *     data: { email: 'a@x.io', profile: { create: { bio: 'hi' } } },
 * }
 */
export type WriteRequest =
    | {
          readonly table: string
          readonly operation: 'create'
          readonly data: WritePayload
      }
    | {
          readonly table: string
          readonly operation: 'update'
          readonly where: Selector
          readonly data: WritePayload
      }

export type DirectiveKind =
    | 'create'
    | 'connect'
    | 'connect_or_create'
    | 'update'
    | 'upsert'
    | 'delete'
    | 'disconnect'
    | 'set'
    | 'update_many'
    | 'delete_many'

/*
    Parsed writes. Every list in the wire shape is expanded into one parsed directive per row, so
    the planner handles exactly one row per directive.
*/

export type ParsedSelector =
    | { readonly kind: 'label'; readonly label: string }
    | { readonly kind: 'unique'; readonly where: UniqueSelector }

export type ParsedRow = {
    readonly table: string
    readonly values: Row
    readonly label?: string
    readonly relation_writes: readonly ParsedRelationWrite[]
}

export type ParsedDirective =
    | { readonly kind: 'create'; readonly row: ParsedRow }
    | { readonly kind: 'connect'; readonly selector: ParsedSelector }
    | {
          readonly kind: 'connect_or_create'
          readonly where: UniqueSelector
          readonly row: ParsedRow
      }
    | {
          readonly kind: 'update'
          readonly where?: UniqueSelector
          readonly data: ParsedRow
      }
    | {
          readonly kind: 'upsert'
          readonly where?: UniqueSelector
          readonly create: ParsedRow
          readonly update: ParsedRow
      }
    | { readonly kind: 'delete'; readonly where?: UniqueSelector }
    | { readonly kind: 'disconnect'; readonly where?: UniqueSelector }
    | { readonly kind: 'set'; readonly selectors: readonly ParsedSelector[] }
    | {
          readonly kind: 'update_many'
          readonly where: Where
          readonly values: Row
      }
    | { readonly kind: 'delete_many'; readonly where: Where }

export type ParsedRelationWrite = {
    readonly relation: RelationField
    readonly directive: ParsedDirective
    readonly path: Path
}

export type ParsedWrite =
    | { readonly operation: 'create'; readonly row: ParsedRow }
    | {
          readonly operation: 'update'
          readonly where: UniqueSelector
          readonly data: ParsedRow
      }

/*
    Write plans. Rows are referred to by symbolic references (r0, r1, ...) which are resolved to
    real rows while the plan runs.
*/

export type RowRef = string

export type ValueSource = Scalar | { readonly $ref: RowRef; readonly $column: string }

/**
 * found: a locate step found the row. missing: it did not, which is also satisfied once the
 * missing row has been inserted.
 */
export type StepCondition = {
    readonly ref: RowRef
    readonly outcome: 'found' | 'missing'
}

type StepBase = {
    /** directive path of the write that produced this step */
    readonly path: Path
    readonly conditions: readonly StepCondition[]
}

export type LocateStep = StepBase & {
    readonly kind: 'locate'
    readonly ref: RowRef
    readonly table: string
    readonly where: UniqueSelector
    /** only rows currently linked to this parent through the relation match */
    readonly linked_to?: { readonly relation: RelationField; readonly parent: RowRef }
    readonly if_missing: 'fail' | 'continue'
}

export type InsertStep = StepBase & {
    readonly kind: 'insert'
    readonly ref: RowRef
    readonly table: string
    readonly values: Record<string, ValueSource>
    /** relocate: a unique conflict means a concurrent writer created the row, look it up again */
    readonly on_conflict: 'fail' | { readonly relocate: UniqueSelector }
}

export type UpdateStep = StepBase & {
    readonly kind: 'update'
    readonly ref: RowRef
    readonly table: string
    readonly values: Record<string, ValueSource>
    /** set on the foreign key patch that breaks an insert cycle */
    readonly deferred?: boolean
}

export type DeleteStep = StepBase & {
    readonly kind: 'delete'
    readonly ref: RowRef
    readonly table: string
}

type RelationStepBase = StepBase & {
    readonly relation: RelationField
    readonly parent: RowRef
}

export type WriteStep =
    | LocateStep
    | InsertStep
    | UpdateStep
    | DeleteStep
    | (RelationStepBase & { readonly kind: 'link'; readonly child: RowRef })
    | (RelationStepBase & { readonly kind: 'unlink'; readonly child: RowRef })
    | (RelationStepBase & { readonly kind: 'link_join'; readonly child: RowRef })
    | (StepBase & {
          readonly kind: 'unlink_join'
          readonly relation: RelationField
          /** without a parent every join row of the child is removed */
          readonly parent?: RowRef
          readonly child: RowRef
      })
    | (RelationStepBase & {
          readonly kind: 'unlink_current'
          /** this row stays linked */
          readonly keep?: RowRef
      })
    | (RelationStepBase & {
          readonly kind: 'unlink_many'
          readonly keep: readonly RowRef[]
      })
    | (RelationStepBase & {
          readonly kind: 'update_many'
          readonly where: StorageWhere
          readonly values: Row
      })
    | (RelationStepBase & {
          readonly kind: 'delete_many'
          readonly where: StorageWhere
      })

export type WritePlan = {
    readonly root: RowRef
    readonly table: string
    readonly steps: readonly WriteStep[]
}

export type WriteResult = {
    /** the root row, read again after commit */
    readonly row: Row | null
    readonly plan: WritePlan
}
