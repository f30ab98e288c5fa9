export type Path = (string | number)[]

export type Scalar = string | number | boolean | null

/**
 * A row as it is stored or returned by a transaction executor. Nested relation results are added
 * on top of this by the read resolver.
 */
export type Row = Record<string, Scalar>
