import { Schema } from 'jsonschema'
import { DirectiveKind } from './write_types'

const scalar_schema: Schema = {
    type: ['string', 'number', 'boolean', 'null'],
}

const selector_schema: Schema = {
    type: 'object',
    additionalProperties: scalar_schema,
    minProperties: 1,
}

const payload_schema: Schema = { type: 'object' }

const one_or_many = (schema: Schema): Schema => ({
    anyOf: [schema, { type: 'array', items: schema, minItems: 1 }],
})

const object_schema = (
    properties: Record<string, Schema>,
    required: string[]
): Schema => ({
    type: 'object',
    properties,
    required,
    additionalProperties: false,
})

const directive_argument_schemas: Record<DirectiveKind, Schema> = {
    create: one_or_many(payload_schema),
    connect: one_or_many(selector_schema),
    connect_or_create: one_or_many(
        object_schema(
            { where: selector_schema, create: payload_schema },
            ['where', 'create']
        )
    ),
    update: one_or_many(
        object_schema({ where: selector_schema, data: payload_schema }, [
            'data',
        ])
    ),
    upsert: one_or_many(
        object_schema(
            {
                where: selector_schema,
                create: payload_schema,
                update: payload_schema,
            },
            ['create', 'update']
        )
    ),
    delete: { anyOf: [{ enum: [true] }, one_or_many(selector_schema)] },
    disconnect: { anyOf: [{ enum: [true] }, one_or_many(selector_schema)] },
    set: { type: 'array', items: selector_schema },
    update_many: one_or_many(
        object_schema({ where: { type: 'object' }, data: payload_schema }, [
            'where',
            'data',
        ])
    ),
    delete_many: one_or_many({ type: 'object' }),
}

export const directive_kinds = Object.keys(directive_argument_schemas)

export const is_directive_kind = (key: string): key is DirectiveKind =>
    directive_kinds.includes(key)

/**
 * A directive object holds exactly one operation. Payloads are checked one level at a time, so
 * nested payloads only need to be objects here.
 */
export const directive_schema: Schema = {
    type: 'object',
    properties: directive_argument_schemas,
    additionalProperties: false,
    minProperties: 1,
    maxProperties: 1,
}

export const write_request_schema: Schema = {
    type: 'object',
    properties: {
        table: { type: 'string', minLength: 1 },
        operation: { enum: ['create', 'update'] },
        where: selector_schema,
        data: payload_schema,
    },
    required: ['table', 'operation', 'data'],
    additionalProperties: false,
}
