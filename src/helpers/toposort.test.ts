import { expect } from 'chai'
import { describe, it } from 'mocha'
import { count_in_degrees, toposort } from './toposort'

describe('toposort', () => {
    it('toposorts an empty graph', () => {
        expect(toposort([])).to.deep.equal({ sorted: [], unsorted: [] })
    })

    it('toposorts a simple DAG', () => {
        expect(toposort([[1], [2], []])).to.deep.equal({
            sorted: [0, 1, 2],
            unsorted: [],
        })
    })

    it('keeps node order when the graph allows it', () => {
        // 0 -> 2, 1 -> 2: both 0 and 1 are ready, lowest index goes first
        expect(toposort([[2], [2], []]).sorted).to.deep.equal([0, 1, 2])
    })

    it('moves a node earlier only when a dependency requires it', () => {
        // node 2 must come before node 0
        expect(toposort([[], [], [0]]).sorted).to.deep.equal([1, 2, 0])
    })

    it('prefers the lowest ready index after each step', () => {
        const result = toposort([[3], [], [], [], [1]])
        // 0, 2, 4 ready; 0 frees 3; then 2; then 3; 4 frees 1
        expect(result.sorted).to.deep.equal([0, 2, 3, 4, 1])
    })

    it('reports nodes on a small cycle', () => {
        expect(toposort([[1], [0], []])).to.deep.equal({
            sorted: [2],
            unsorted: [0, 1],
        })
    })

    it('reports nodes that depend on a cycle', () => {
        const result = toposort([[1, 2], [2], [3, 4], [1], []])
        expect(result.sorted).to.deep.equal([0])
        expect(result.unsorted).to.deep.equal([1, 2, 3, 4])
    })

    it('counts in-degrees', () => {
        expect(count_in_degrees([[1, 2], [2], []])).to.deep.equal([0, 1, 2])
    })
})
