import { expect } from 'chai'
import { describe, test } from 'mocha'
import { ConstraintCycleError } from '../helpers/error_handling'
import { global_test_model } from '../test_data/global_test_schema'
import { get_error } from '../test_data/test_helpers'
import { parse_write } from './write_parse'
import { get_step_dag, get_write_plan } from './write_plan'
import { WriteRequest, WriteStep } from './write_types'

const plan = (request: WriteRequest) =>
    get_write_plan(global_test_model, parse_write(global_test_model, request))

const describe_step = (step: WriteStep) =>
    'table' in step
        ? `${step.kind} ${step.table}`
        : `${step.kind} ${step.relation.from_table}.${step.relation.name}`

describe('write_plan.ts', () => {
    describe(get_write_plan.name, () => {
        test('inserts the child first when the created row stores the foreign key', () => {
            const write_plan = plan({
                table: 'posts',
                operation: 'create',
                data: {
                    title: 'New',
                    author: { create: { email: 'dan@test.io' } },
                },
            })
            expect(write_plan.root).to.equal('r0')
            expect(write_plan.steps.map(describe_step)).to.deep.equal([
                'insert users',
                'insert posts',
            ])
            expect(write_plan.steps[1]).to.deep.include({
                ref: 'r0',
                values: {
                    title: 'New',
                    author_id: { $ref: 'r1', $column: 'id' },
                },
            })
        })
        test('inserts the parent first when the child stores the foreign key', () => {
            const write_plan = plan({
                table: 'users',
                operation: 'create',
                data: {
                    email: 'dan@test.io',
                    profile: { create: { bio: 'hi' } },
                },
            })
            expect(write_plan.steps.map(describe_step)).to.deep.equal([
                'insert users',
                'insert profiles',
            ])
            expect(write_plan.steps[1]).to.deep.include({
                values: { bio: 'hi', user_id: { $ref: 'r0', $column: 'id' } },
                path: ['profile', 'create'],
            })
        })
        test('locates connected rows and replaces the current child of a single relation', () => {
            const write_plan = plan({
                table: 'users',
                operation: 'update',
                where: { email: 'alice@test.io' },
                data: { first_name: 'Al', profile: { connect: { id: 5 } } },
            })
            expect(write_plan.steps.map(describe_step)).to.deep.equal([
                'locate users',
                'update users',
                'locate profiles',
                'unlink_current users.profile',
                'link users.profile',
            ])
            expect(write_plan.steps[3]).to.deep.include({ parent: 'r0', keep: 'r1' })
        })
        test('keeps sibling order', () => {
            const write_plan = plan({
                table: 'users',
                operation: 'create',
                data: {
                    email: 'dan@test.io',
                    posts: { create: [{ title: 'A' }, { title: 'B' }] },
                    addresses: { create: { street: '3 Low Rd' } },
                },
            })
            expect(
                write_plan.steps.map(step => ({
                    kind: step.kind,
                    path: step.path,
                }))
            ).to.deep.equal([
                { kind: 'insert', path: [] },
                { kind: 'insert', path: ['posts', 'create', 0] },
                { kind: 'insert', path: ['posts', 'create', 1] },
                { kind: 'insert', path: ['addresses', 'create'] },
            ])
        })
        test('conditions the create and update halves of connect_or_create', () => {
            const write_plan = plan({
                table: 'posts',
                operation: 'update',
                where: { id: 3 },
                data: {
                    categories: {
                        connect_or_create: {
                            where: { name: 'sports' },
                            create: { name: 'sports' },
                        },
                    },
                },
            })
            expect(
                write_plan.steps.map(step => [describe_step(step), step.conditions])
            ).to.deep.equal([
                ['locate posts', []],
                ['locate categories', []],
                ['insert categories', [{ ref: 'r1', outcome: 'missing' }]],
                ['link_join posts.categories', []],
            ])
            expect(write_plan.steps[2]).to.deep.include({
                on_conflict: { relocate: { name: 'sports' } },
            })
        })
        test('removes join rows before deleting a row of a join table relation', () => {
            const write_plan = plan({
                table: 'posts',
                operation: 'update',
                where: { id: 1 },
                data: { categories: { delete: { id: 2 } } },
            })
            expect(write_plan.steps.map(describe_step)).to.deep.equal([
                'locate posts',
                'locate categories',
                'unlink_join posts.categories',
                'delete categories',
            ])
            expect(write_plan.steps[2]).to.not.have.property('parent')
        })
        test('plans set as an unlink of the rest followed by links', () => {
            const write_plan = plan({
                table: 'users',
                operation: 'update',
                where: { id: 2 },
                data: { posts: { set: [{ id: 1 }, { id: 2 }] } },
            })
            expect(write_plan.steps.map(describe_step)).to.deep.equal([
                'locate users',
                'locate posts',
                'locate posts',
                'unlink_many users.posts',
                'link users.posts',
                'link users.posts',
            ])
            expect(write_plan.steps[3]).to.deep.include({ keep: ['r1', 'r2'] })
        })
        test('defers a nullable foreign key to break an insert cycle', () => {
            const write_plan = plan({
                table: 'users',
                operation: 'create',
                data: {
                    email: 'eve@test.io',
                    addresses: { create: { $label: 'home', street: '2 Side St' } },
                    primary_address: { connect: { $label: 'home' } },
                },
            })
            expect(write_plan.steps).to.deep.equal([
                {
                    kind: 'insert',
                    ref: 'r0',
                    table: 'users',
                    values: { email: 'eve@test.io' },
                    on_conflict: 'fail',
                    conditions: [],
                    path: [],
                },
                {
                    kind: 'insert',
                    ref: 'r1',
                    table: 'addresses',
                    values: {
                        street: '2 Side St',
                        owner_id: { $ref: 'r0', $column: 'id' },
                    },
                    on_conflict: 'fail',
                    conditions: [],
                    path: ['addresses', 'create'],
                },
                {
                    kind: 'update',
                    ref: 'r0',
                    table: 'users',
                    values: { primary_address_id: { $ref: 'r1', $column: 'id' } },
                    deferred: true,
                    conditions: [],
                    path: [],
                },
            ])
        })
        test('rejects cycles of required foreign keys', () => {
            const error = get_error(() =>
                plan({
                    table: 'teams',
                    operation: 'create',
                    data: {
                        $label: 'owls',
                        name: 'Owls',
                        captain: {
                            create: {
                                name: 'Ann',
                                team: { connect: { $label: 'owls' } },
                            },
                        },
                    },
                })
            )
            expect(error).to.be.instanceOf(ConstraintCycleError)
            if (error instanceof ConstraintCycleError) {
                expect(error.message).to.equal(
                    'Rows of teams, players reference each other through required foreign keys, so none of them can be inserted first'
                )
                expect(error.additional_info).to.deep.equal({
                    cycle_paths: [[], ['captain', 'create']],
                })
            }
        })
    })
    describe(get_step_dag.name, () => {
        test('orders conditioned steps after the lookup only', () => {
            const write_plan = plan({
                table: 'users',
                operation: 'update',
                where: { id: 2 },
                data: {
                    profile: {
                        connect_or_create: {
                            where: { user_id: 2 },
                            create: { bio: 'new' },
                        },
                    },
                },
            })
            expect(write_plan.steps.map(describe_step)).to.deep.equal([
                'locate users',
                'locate profiles',
                'unlink_current users.profile',
                'insert profiles',
                'link users.profile',
            ])
            expect(get_step_dag(write_plan.steps)).to.deep.equal([
                [2, 3, 4],
                [2, 3, 4],
                [],
                [4],
                [],
            ])
        })
    })
})
