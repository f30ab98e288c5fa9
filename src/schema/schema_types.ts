import { Scalar } from '../types'

export type DataType =
    | 'int'
    | 'bigint'
    | 'decimal'
    | 'varchar'
    | 'text'
    | 'boolean'
    | 'date'
    | 'datetime'

export type ColumnSchema = {
    readonly data_type: DataType
    readonly not_null?: boolean
    readonly auto_increment?: boolean
    readonly default?: Scalar
}

export type KeySchema = {
    readonly name?: string
    readonly columns: readonly string[]
}

export type ForeignKeySchema = {
    readonly name?: string
    readonly columns: readonly [string]
    readonly referenced_table: string
    readonly referenced_columns: readonly [string]
}

/**
 * A relation field as written in the schema. Direct relations pair a column of this table with a
 * column of the related table, and one of the two tables must declare the matching foreign key.
 * Join table relations name the join table and its two foreign key columns.
 *
 * @example
 * // users.posts, where posts.user_id references users.id
 * { table: 'posts', from_column: 'id', to_column: 'user_id' }
 * // posts.categories through post_categories(post_id, category_id)
 * { table: 'categories', through: { table: 'post_categories', from_column: 'post_id', to_column: 'category_id' } }
 */
export type RelationDefinition =
    | {
          readonly table: string
          readonly from_column: string
          readonly to_column: string
      }
    | {
          readonly table: string
          readonly through: {
              readonly table: string
              readonly from_column: string
              readonly to_column: string
          }
      }

export type TableSchema = {
    readonly columns: { readonly [column: string]: ColumnSchema }
    readonly primary_key: KeySchema
    readonly unique_keys?: readonly KeySchema[]
    readonly foreign_keys?: readonly ForeignKeySchema[]
    readonly relations?: { readonly [relation: string]: RelationDefinition }
}

export type TetherSchema = {
    readonly tables: { readonly [table: string]: TableSchema }
}

export type Cardinality =
    | 'one_to_one'
    | 'one_to_many'
    | 'many_to_one'
    | 'many_to_many'

/**
 * source: from_table stores the foreign key. target: to_table stores it. join_table: neither
 * does, a join table row links the two.
 */
export type Ownership = 'source' | 'target' | 'join_table'

export type JoinTable = {
    readonly table: string
    /** join table column referencing from_table.from_column */
    readonly from_column: string
    /** join table column referencing to_table.to_column */
    readonly to_column: string
}

/**
 * A relation field resolved against the foreign keys of the schema. from_column always lives on
 * from_table and to_column on to_table, so a related row is one where
 * `to_row[to_column] === from_row[from_column]` (or, for join tables, where a join row links the
 * two values).
 */
export type RelationField = {
    readonly name: string
    readonly from_table: string
    readonly to_table: string
    readonly from_column: string
    readonly to_column: string
    readonly cardinality: Cardinality
    readonly ownership: Ownership
    /** true when this side can point at any number of rows */
    readonly is_list: boolean
    /** true when a from_table row is allowed to have no related row */
    readonly optional: boolean
    /** nullability of the foreign key column on the owning side. Always true for join tables */
    readonly nullable_foreign_key: boolean
    readonly through?: JoinTable
}

/**
 * The read-only lookup surface every other module is given. Built once by {@link compile_schema}.
 */
export type SchemaModel = {
    readonly schema: TetherSchema
    readonly relations: {
        readonly [table: string]: { readonly [relation: string]: RelationField }
    }
}

export type UniqueSelector = { readonly [column: string]: Scalar }
