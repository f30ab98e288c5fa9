// sqlstring-sqlite ships no type declarations and has no @types package
declare module 'sqlstring-sqlite' {
    export function escape(
        value: unknown,
        stringify_objects?: boolean,
        time_zone?: string
    ): string
    export function escapeId(value: string, forbid_qualified?: boolean): string
}
