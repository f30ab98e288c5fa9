import { get_where_issues } from '../filter/filter_validation'
import { Where } from '../filter/filter_types'
import {
    CardinalityViolationError,
    SchemaError,
    SelectorError,
    throw_if_issues,
    ValidationIssue,
} from '../helpers/error_handling'
import { is_scalar, is_simple_object } from '../helpers/helpers'
import { get_shape_issues } from '../helpers/validate_shape'
import {
    is_column_name,
    is_relation_name,
    is_table_name,
    is_unique_selector,
} from '../schema/schema_helpers'
import { RelationField, SchemaModel, UniqueSelector } from '../schema/schema_types'
import { Path, Scalar } from '../types'
import { directive_schema, write_request_schema } from './write_validation'
import {
    ParsedDirective,
    ParsedRelationWrite,
    ParsedRow,
    ParsedSelector,
    ParsedWrite,
    RelationWrite,
    Selector,
    WriteDirective,
    WritePayload,
    WriteRequest,
} from './write_types'

type PayloadMode = 'create' | 'update'

type ParseState = {
    readonly model: SchemaModel
    readonly issues: ValidationIssue[]
    readonly labels: Map<string, { table: string; path: Path }>
    readonly label_references: { label: string; table: string; path: Path }[]
}

const creation_directives = ['create', 'connect', 'connect_or_create']

const is_list = <T>(value: T | readonly T[]): value is readonly T[] =>
    Array.isArray(value)

const relation_string = (relation: RelationField) =>
    `${relation.from_table}.${relation.name}`

/**
 * Validates a write request against the schema and expands it into one parsed directive per row.
 * Nothing here touches storage.
 */
export const parse_write = (
    model: SchemaModel,
    request: WriteRequest
): ParsedWrite => {
    // the js checks below assume a well formed request
    throw_if_issues(get_shape_issues(request, write_request_schema, []))
    if (!is_table_name(model, request.table)) {
        throw new SchemaError(`${request.table} is not a table`, ['table'])
    }

    const state: ParseState = {
        model,
        issues: [],
        labels: new Map(),
        label_references: [],
    }

    let parsed: ParsedWrite
    if (request.operation === 'create') {
        parsed = {
            operation: 'create',
            row: parse_payload(state, request.table, request.data, 'create', []),
        }
    } else {
        if (!is_simple_object(request.where)) {
            throw_if_issues([
                { message: 'Updates need a where selector', path: ['where'] },
            ])
        }
        parsed = {
            operation: 'update',
            where: parse_unique_selector(model, request.table, request.where, [
                'where',
            ]),
            data: parse_payload(state, request.table, request.data, 'update', []),
        }
    }

    state.label_references.forEach(reference => {
        const label = state.labels.get(reference.label)
        if (!label) {
            state.issues.push({
                message: `No create payload is labelled ${reference.label}`,
                path: reference.path,
            })
        } else if (label.table !== reference.table) {
            state.issues.push({
                message: `Label ${reference.label} is a ${label.table} row, not a ${reference.table} row`,
                path: reference.path,
            })
        }
    })
    throw_if_issues(state.issues)

    return parsed
}

const parse_payload = (
    state: ParseState,
    table: string,
    payload: WritePayload,
    mode: PayloadMode,
    path: Path
): ParsedRow => {
    const { model } = state
    const values: Record<string, Scalar> = {}
    const relation_writes: ParsedRelationWrite[] = []
    let label: string | undefined

    Object.entries(payload).forEach(([key, value]) => {
        const key_path = [...path, key]

        if (key === '$label') {
            if (mode !== 'create' || typeof value !== 'string') {
                state.issues.push({
                    message: '$label must be a string on a create payload',
                    path: key_path,
                })
            } else if (state.labels.has(value)) {
                state.issues.push({
                    message: `Label ${value} is used more than once`,
                    path: key_path,
                })
            } else {
                label = value
                state.labels.set(value, { table, path })
            }
            return
        }

        if (is_column_name(model, table, key)) {
            if (is_scalar(value)) {
                values[key] = value
            } else {
                state.issues.push({
                    message: `${table}.${key} is a column and takes a scalar value`,
                    path: key_path,
                })
            }
            return
        }

        if (is_relation_name(model, table, key)) {
            if (is_scalar(value)) {
                state.issues.push({
                    message: `${table}.${key} is a relation and takes a directive`,
                    path: key_path,
                    recommendation: `Use a directive such as { connect: {...} } or { create: {...} }`,
                })
            } else {
                relation_writes.push(
                    ...parse_relation_write(
                        state,
                        model.relations[table][key],
                        value,
                        mode,
                        key_path
                    )
                )
            }
            return
        }

        state.issues.push({
            message: `${key} is not a column or relation of ${table}`,
            path: key_path,
        })
    })

    return { table, values, label, relation_writes }
}

const parse_relation_write = (
    state: ParseState,
    relation: RelationField,
    value: RelationWrite,
    mode: PayloadMode,
    path: Path
): ParsedRelationWrite[] => {
    if (!is_list(value)) {
        return parse_directive(state, relation, value, mode, path)
    }

    if (!relation.is_list && value.length > 1) {
        throw new CardinalityViolationError(
            `${relation_string(relation)} is a single relation and takes one directive`,
            path
        )
    }
    return value.flatMap((directive, i) =>
        parse_directive(state, relation, directive, mode, [...path, i])
    )
}

const parse_unique_selector = (
    model: SchemaModel,
    table: string,
    selector: Selector,
    path: Path
): UniqueSelector => {
    if (!is_unique_selector(model, table, selector)) {
        throw new SelectorError(
            `${JSON.stringify(selector)} does not match a unique constraint of ${table}`,
            path
        )
    }
    return selector
}

const parse_selector = (
    state: ParseState,
    table: string,
    selector: Selector,
    path: Path
): ParsedSelector => {
    if ('$label' in selector) {
        const label = selector.$label
        if (Object.keys(selector).length !== 1 || typeof label !== 'string') {
            throw new SelectorError(
                'A $label selector names a label and nothing else',
                path
            )
        }
        state.label_references.push({ label, table, path })
        return { kind: 'label', label }
    }

    return {
        kind: 'unique',
        where: parse_unique_selector(state.model, table, selector, path),
    }
}

const parse_directive = (
    state: ParseState,
    relation: RelationField,
    directive: WriteDirective,
    mode: PayloadMode,
    path: Path
): ParsedRelationWrite[] => {
    const shape_issues = get_shape_issues(directive, directive_schema, path)
    if (shape_issues.length > 0) {
        state.issues.push(...shape_issues)
        return []
    }

    const kind = Object.keys(directive)[0]
    const kind_path = [...path, kind]
    if (mode === 'create' && !creation_directives.includes(kind)) {
        state.issues.push({
            message: `${kind} is not allowed on a row that is being created`,
            path: kind_path,
            recommendation: `Use one of ${creation_directives.join(', ')}`,
        })
        return []
    }

    const to_table = relation.to_table

    /**
     * Pairs every row of a directive with its path. Single relations take one row.
     */
    const items = <T>(value: T | readonly T[]) => {
        if (!is_list(value)) {
            return [{ item: value, item_path: kind_path }]
        }
        if (!relation.is_list && value.length > 1) {
            throw new CardinalityViolationError(
                `${relation_string(relation)} is a single relation, so ${kind} takes one row, got ${value.length}`,
                kind_path
            )
        }
        return value.map((item, i) => ({ item, item_path: [...kind_path, i] }))
    }

    const parsed = (
        parsed_directive: ParsedDirective,
        directive_path: Path
    ): ParsedRelationWrite => ({
        relation,
        directive: parsed_directive,
        path: directive_path,
    })

    const require_list = () => {
        if (!relation.is_list) {
            throw new CardinalityViolationError(
                `${kind} needs a list relation, but ${relation_string(relation)} is ${relation.cardinality}`,
                kind_path
            )
        }
    }

    const require_where_on_list = (where: Selector | undefined, where_path: Path) => {
        if (relation.is_list && where === undefined) {
            state.issues.push({
                message: `${kind} on the list relation ${relation_string(relation)} needs a where selector`,
                path: where_path,
            })
        }
        return where === undefined
            ? undefined
            : parse_unique_selector(state.model, to_table, where, [
                  ...where_path,
                  'where',
              ])
    }

    if ('create' in directive) {
        return items(directive.create).map(({ item, item_path }) =>
            parsed(
                {
                    kind: 'create',
                    row: parse_payload(state, to_table, item, 'create', item_path),
                },
                item_path
            )
        )
    }

    if ('connect' in directive) {
        return items(directive.connect).map(({ item, item_path }) =>
            parsed(
                {
                    kind: 'connect',
                    selector: parse_selector(state, to_table, item, item_path),
                },
                item_path
            )
        )
    }

    if ('connect_or_create' in directive) {
        return items(directive.connect_or_create).map(({ item, item_path }) =>
            parsed(
                {
                    kind: 'connect_or_create',
                    where: parse_unique_selector(state.model, to_table, item.where, [
                        ...item_path,
                        'where',
                    ]),
                    row: parse_payload(state, to_table, item.create, 'create', [
                        ...item_path,
                        'create',
                    ]),
                },
                item_path
            )
        )
    }

    if ('update' in directive) {
        return items(directive.update).map(({ item, item_path }) =>
            parsed(
                {
                    kind: 'update',
                    where: require_where_on_list(item.where, item_path),
                    data: parse_payload(state, to_table, item.data, 'update', [
                        ...item_path,
                        'data',
                    ]),
                },
                item_path
            )
        )
    }

    if ('upsert' in directive) {
        return items(directive.upsert).map(({ item, item_path }) =>
            parsed(
                {
                    kind: 'upsert',
                    where: require_where_on_list(item.where, item_path),
                    create: parse_payload(state, to_table, item.create, 'create', [
                        ...item_path,
                        'create',
                    ]),
                    update: parse_payload(state, to_table, item.update, 'update', [
                        ...item_path,
                        'update',
                    ]),
                },
                item_path
            )
        )
    }

    if ('delete' in directive || 'disconnect' in directive) {
        const [detach_kind, value] =
            'delete' in directive
                ? (['delete', directive.delete] as const)
                : (['disconnect', directive.disconnect] as const)
        const detachable =
            detach_kind === 'delete'
                ? relation.optional
                : relation.nullable_foreign_key
        if (!detachable) {
            throw new CardinalityViolationError(
                `Cannot ${kind} through ${relation_string(relation)}, the relation is required`,
                kind_path
            )
        }

        if (value === true) {
            if (relation.is_list) {
                state.issues.push({
                    message: `${kind}: true only works on single relations, list relations need selectors`,
                    path: kind_path,
                })
                return []
            }
            return [parsed({ kind: detach_kind }, kind_path)]
        }

        return items(value).map(({ item, item_path }) =>
            parsed(
                {
                    kind: detach_kind,
                    where: parse_unique_selector(
                        state.model,
                        to_table,
                        item,
                        item_path
                    ),
                },
                item_path
            )
        )
    }

    if ('set' in directive) {
        require_list()
        return [
            parsed(
                {
                    kind: 'set',
                    selectors: directive.set.map((selector, i) =>
                        parse_selector(state, to_table, selector, [...kind_path, i])
                    ),
                },
                kind_path
            ),
        ]
    }

    const check_where = (where: Where, where_path: Path) => {
        state.issues.push(
            ...get_where_issues(state.model, to_table, where, where_path)
        )
        return where
    }

    if ('update_many' in directive) {
        require_list()
        return items(directive.update_many).map(({ item, item_path }) => {
            const data = parse_payload(state, to_table, item.data, 'update', [
                ...item_path,
                'data',
            ])
            if (data.relation_writes.length > 0) {
                state.issues.push({
                    message: 'update_many data only takes columns',
                    path: [...item_path, 'data'],
                })
            }
            return parsed(
                {
                    kind: 'update_many',
                    where: check_where(item.where, [...item_path, 'where']),
                    values: data.values,
                },
                item_path
            )
        })
    }

    require_list()
    return items(directive.delete_many).map(({ item, item_path }) =>
        parsed(
            { kind: 'delete_many', where: check_where(item, item_path) },
            item_path
        )
    )
}
