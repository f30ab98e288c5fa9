// schema
export { compile_schema } from './schema/compile_schema'
export {
    type TetherSchema,
    type TableSchema,
    type ColumnSchema,
    type RelationDefinition,
    type RelationField,
    type SchemaModel,
    type UniqueSelector,
} from './schema/schema_types'
export {
    get_table_names,
    get_column_names,
    get_relation_names,
    relation,
    unique_constraints,
    is_unique_selector,
} from './schema/schema_helpers'

// filters
export { type Where, type OrderBy } from './filter/filter_types'
export {
    translate_relation_filters,
    get_relation_edges,
    reverse_edge,
    type Edge,
} from './filter/relation_filter'

// reads
export { tether_find_many, tether_find_unique } from './query/read_resolver'
export {
    type FindManyArgs,
    type FindUniqueArgs,
    type ReadSpec,
    type ResultRow,
} from './query/read_types'
export {
    fluent,
    resolve_chain,
    type FluentChain,
    type ChainResult,
} from './query/fluent_chain'

// writes
export { tether_mutate } from './mutate/mutate'
export { parse_write } from './mutate/write_parse'
export { get_write_plan } from './mutate/write_plan'
export { run_write_plan } from './mutate/write_run'
export {
    type WriteRequest,
    type WriteDirective,
    type WritePayload,
    type WritePlan,
    type WriteStep,
    type WriteResult,
} from './mutate/write_types'

// storage
export {
    type TransactionExecutor,
    type PrimitiveOperation,
    type ExecuteResult,
    type TetherContext,
    type Logger,
} from './executor/executor_types'
export { sqlite3_executor } from './executor/sqlite3_executor'
export { compile_create_table } from './compiler/compile_create_table'
export { compile_operation, compile_select } from './compiler/compile_statements'

// errors
export * from './helpers/error_handling'
