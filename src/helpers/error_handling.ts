import { Path } from '../types'

export type ErrorCode =
    | 'schema_error'
    | 'validation_error'
    | 'selector_error'
    | 'filter_error'
    | 'unique_target_not_found'
    | 'cardinality_violation'
    | 'chain_cardinality'
    | 'constraint_cycle'
    | 'transaction_aborted'

/**
 * A single problem found while validating a request. Validation collects these instead of
 * throwing on the first one, so callers can see everything wrong with a request at once.
 */
export type ValidationIssue = {
    message: string
    path: Path
    recommendation?: string
}

export class TetherError extends Error {
    readonly code: ErrorCode
    /** relation field chain (and array indices) in the request that produced this error */
    readonly path: Path
    readonly additional_info?: Record<string, unknown>

    constructor(
        code: ErrorCode,
        message: string,
        path: Path = [],
        additional_info?: Record<string, unknown>,
        options?: { cause?: unknown }
    ) {
        super(message, options)
        this.name = new.target.name
        this.code = code
        this.path = path
        this.additional_info = additional_info
    }
}

export class SchemaError extends TetherError {
    constructor(message: string, path: Path = []) {
        super('schema_error', message, path)
    }
}

export class ValidationError extends TetherError {
    readonly issues: ValidationIssue[]

    constructor(issues: ValidationIssue[]) {
        const first = issues[0]
        const message =
            issues.length === 1
                ? first.message
                : `${issues.length} validation errors, first: ${first?.message}`
        super('validation_error', message, first?.path ?? [])
        this.issues = issues
    }
}

export class SelectorError extends TetherError {
    constructor(message: string, path: Path = []) {
        super('selector_error', message, path)
    }
}

export class FilterError extends TetherError {
    constructor(message: string, path: Path = []) {
        super('filter_error', message, path)
    }
}

export class UniqueTargetNotFoundError extends TetherError {
    constructor(table: string, where: unknown, path: Path = []) {
        super(
            'unique_target_not_found',
            `No ${table} row matches ${JSON.stringify(where)}`,
            path,
            { table, where }
        )
    }
}

export class CardinalityViolationError extends TetherError {
    constructor(message: string, path: Path = []) {
        super('cardinality_violation', message, path)
    }
}

export class ChainCardinalityError extends TetherError {
    constructor(message: string, path: Path = []) {
        super('chain_cardinality', message, path)
    }
}

export class ConstraintCycleError extends TetherError {
    constructor(message: string, path: Path = [], cycle_paths: Path[] = []) {
        super('constraint_cycle', message, path, { cycle_paths })
    }
}

/**
 * Thrown after a write plan was rolled back. The cause is the first error raised while running the
 * plan, and the path is the directive path of the step that raised it.
 */
export class TransactionAbortedError extends TetherError {
    readonly step_index: number

    constructor(cause: unknown, step_index: number, path: Path) {
        const cause_message =
            cause instanceof Error ? cause.message : String(cause)
        super(
            'transaction_aborted',
            `Transaction rolled back at step ${step_index}: ${cause_message}`,
            path,
            undefined,
            { cause }
        )
        this.step_index = step_index
    }
}

export const throw_if_issues = (issues: ValidationIssue[]) => {
    if (issues.length > 0) {
        throw new ValidationError(issues)
    }
}
