import { Schema } from 'jsonschema'

const key_schema: Schema = {
    type: 'object',
    properties: {
        name: { type: 'string' },
        columns: {
            type: 'array',
            items: { type: 'string' },
            minItems: 1,
        },
    },
    required: ['columns'],
    additionalProperties: false,
}

const single_column: Schema = {
    type: 'array',
    items: { type: 'string' },
    minItems: 1,
    maxItems: 1,
}

export const schema_validation_schema: Schema = {
    type: 'object',
    properties: {
        tables: {
            type: 'object',
            additionalProperties: {
                type: 'object',
                properties: {
                    columns: {
                        type: 'object',
                        minProperties: 1,
                        additionalProperties: {
                            type: 'object',
                            properties: {
                                data_type: {
                                    type: 'string',
                                    enum: [
                                        'int',
                                        'bigint',
                                        'decimal',
                                        'varchar',
                                        'text',
                                        'boolean',
                                        'date',
                                        'datetime',
                                    ],
                                },
                                not_null: { type: 'boolean' },
                                auto_increment: { type: 'boolean' },
                                default: {
                                    type: ['string', 'number', 'boolean', 'null'],
                                },
                            },
                            required: ['data_type'],
                            additionalProperties: false,
                        },
                    },
                    primary_key: key_schema,
                    unique_keys: { type: 'array', items: key_schema },
                    foreign_keys: {
                        type: 'array',
                        items: {
                            type: 'object',
                            properties: {
                                name: { type: 'string' },
                                columns: single_column,
                                referenced_table: { type: 'string' },
                                referenced_columns: single_column,
                            },
                            required: [
                                'columns',
                                'referenced_table',
                                'referenced_columns',
                            ],
                            additionalProperties: false,
                        },
                    },
                    relations: {
                        type: 'object',
                        additionalProperties: {
                            oneOf: [
                                {
                                    type: 'object',
                                    properties: {
                                        table: { type: 'string' },
                                        from_column: { type: 'string' },
                                        to_column: { type: 'string' },
                                    },
                                    required: ['table', 'from_column', 'to_column'],
                                    additionalProperties: false,
                                },
                                {
                                    type: 'object',
                                    properties: {
                                        table: { type: 'string' },
                                        through: {
                                            type: 'object',
                                            properties: {
                                                table: { type: 'string' },
                                                from_column: { type: 'string' },
                                                to_column: { type: 'string' },
                                            },
                                            required: [
                                                'table',
                                                'from_column',
                                                'to_column',
                                            ],
                                            additionalProperties: false,
                                        },
                                    },
                                    required: ['table', 'through'],
                                    additionalProperties: false,
                                },
                            ],
                        },
                    },
                },
                required: ['columns', 'primary_key'],
                additionalProperties: false,
            },
        },
    },
    required: ['tables'],
    additionalProperties: false,
}
