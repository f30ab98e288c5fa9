/**
 * A read plan lists the relation fetches of a read spec by depth. Every fetch in a level only needs
 * the rows of the level before it, so fetches in a level can run concurrently.
 *
 * @module read_plan
 */

import { relation } from '../schema/schema_helpers'
import { RelationField, SchemaModel } from '../schema/schema_types'
import { IncludeOptions, ReadSpec } from './read_types'

export type RelationFetch = {
    /** relation names from the root table down to this relation */
    readonly path: string[]
    readonly relation: RelationField
    readonly options: IncludeOptions
}

export const get_read_plan = (
    model: SchemaModel,
    table: string,
    read_spec: ReadSpec
): RelationFetch[][] => {
    const read_plan: RelationFetch[][] = []

    let level: { table: string; path: string[]; read_spec: ReadSpec }[] = [
        { table, path: [], read_spec },
    ]
    while (level.length > 0) {
        const fetches = level.flatMap(parent =>
            Object.entries(parent.read_spec).map(
                ([name, options]): RelationFetch => ({
                    path: [...parent.path, name],
                    relation: relation(model, parent.table, name),
                    options: options === true ? {} : options,
                })
            )
        )

        if (fetches.length > 0) {
            read_plan.push(fetches)
        }

        level = fetches.flatMap(fetch =>
            fetch.options.include
                ? [
                      {
                          table: fetch.relation.to_table,
                          path: fetch.path,
                          read_spec: fetch.options.include,
                      },
                  ]
                : []
        )
    }

    return read_plan
}
