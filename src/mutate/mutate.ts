import { TetherContext } from '../executor/executor_types'
import { parse_write } from './write_parse'
import { get_write_plan } from './write_plan'
import { run_write_plan } from './write_run'
import { WriteRequest, WriteResult } from './write_types'

/**
 * Validates and plans a nested write, then runs it in one transaction. Every validation and
 * planning error is thrown before the transaction begins.
 *
 * @example
 * await tether_mutate(context, {
 *     table: 'users',
 *     operation: 'update',
 *     where: { email: 'a@x.io' },
 *     data: { posts: { set: [{ id: 1 }, { id: 2 }] } },
 * })
 */
export const tether_mutate = async <Tx>(
    context: TetherContext<Tx>,
    request: WriteRequest
): Promise<WriteResult> => {
    const parsed = parse_write(context.schema, request)
    const plan = get_write_plan(context.schema, parsed)
    return run_write_plan(context, plan)
}
