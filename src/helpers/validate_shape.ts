import { Schema, validate } from 'jsonschema'
import { Path } from '../types'
import { ValidationIssue } from './error_handling'

/**
 * Checks the shape of a value with jsonschema. Schema level checks run after this, since they
 * assume a well formed value.
 */
export const get_shape_issues = (
    value: unknown,
    schema: Schema,
    path: Path
): ValidationIssue[] =>
    validate(value, schema).errors.map(error => ({
        message: error.stack,
        path: [...path, ...error.path],
    }))
