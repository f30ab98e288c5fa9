/**
 * Topological sorting is a graph algorithm to sort by dependencies.
 * Based on Kahn's algorithm, but instead of batching every node whose dependencies are met, it
 * always takes the ready node with the lowest index. When the given node order already satisfies
 * the graph, it is returned unchanged, so callers can use node order as a tie breaker.
 *
 * @param dag dag[i] lists the nodes that must come after node i
 * @returns the sorted nodes, plus every node that could not be sorted because it is on a cycle or
 * depends on one
 */
export const toposort = (dag: readonly (readonly number[])[]): ToposortResult => {
    const indegrees = count_in_degrees(dag)
    const sorted: number[] = []

    const ready = new Set<number>()
    indegrees.forEach((degree, node) => {
        if (degree === 0) {
            ready.add(node)
        }
    })

    while (ready.size) {
        const next = Math.min(...ready)
        ready.delete(next)
        sorted.push(next)

        dag[next].forEach(dependent => {
            indegrees[dependent]--
            if (indegrees[dependent] === 0) {
                ready.add(dependent)
            }
        })
    }

    const unsorted = indegrees.flatMap((degree, node) =>
        degree !== 0 ? [node] : []
    )

    return { sorted, unsorted }
}

export const count_in_degrees = (dag: readonly (readonly number[])[]) => {
    const counts = dag.map(() => 0)
    dag.forEach(dependents => {
        dependents.forEach(dependent => {
            counts[dependent]++
        })
    })
    return counts
}

export type ToposortResult = {
    sorted: number[]
    unsorted: number[]
}
