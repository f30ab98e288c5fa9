import { TetherContext } from '../executor/executor_types'
import { global_test_hydration } from './global_test_hydration'
import { global_test_model } from './global_test_schema'
import { memory_executor, MemoryExecutor } from './memory_executor'

export const get_error = (fn: () => unknown): unknown => {
    try {
        fn()
    } catch (error) {
        return error
    }
    throw new Error('Expected an error to be thrown')
}

export const get_rejection = async (promise: Promise<unknown>) => {
    try {
        await promise
    } catch (error) {
        return error
    }
    throw new Error('Expected the promise to reject')
}

/**
 * A fresh in-memory database with the global test data, and a context reading from it that logs
 * nowhere
 */
export const get_test_context = (): {
    executor: MemoryExecutor
    context: TetherContext<number>
    logged_errors: unknown[][]
} => {
    const executor = memory_executor(global_test_model, global_test_hydration)
    const logged_errors: unknown[][] = []
    const context: TetherContext<number> = {
        schema: global_test_model,
        executor,
        logger: {
            error: (...args: unknown[]) => {
                logged_errors.push(args)
            },
        },
    }
    return { executor, context, logged_errors }
}
