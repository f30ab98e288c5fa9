import { expect } from 'chai'
import { describe, test } from 'mocha'
import {
    CardinalityViolationError,
    ConstraintCycleError,
    TransactionAbortedError,
    UniqueTargetNotFoundError,
} from '../helpers/error_handling'
import { global_test_hydration } from '../test_data/global_test_hydration'
import { get_rejection, get_test_context } from '../test_data/test_helpers'
import { tether_mutate } from './mutate'
import { WriteRequest } from './write_types'

const post_authors = (rows: Record<string, unknown>[]) =>
    rows.map(row => [row.id, row.author_id])

describe('mutate.ts', () => {
    describe(tether_mutate.name, () => {
        test('creates a row with a nested child', async () => {
            const { context, executor } = get_test_context()
            const result = await tether_mutate(context, {
                table: 'users',
                operation: 'create',
                data: {
                    email: 'dan@test.io',
                    first_name: 'Dan',
                    profile: { create: { bio: 'hi' } },
                },
            })

            expect(result.row).to.deep.equal({
                id: 4,
                email: 'dan@test.io',
                first_name: 'Dan',
                last_name: null,
                primary_address_id: null,
            })
            expect(executor.tables.profiles).to.deep.equal([
                { id: 1, user_id: 1, bio: 'alice bio' },
                { id: 2, user_id: 4, bio: 'hi' },
            ])
        })
        test('fills in column defaults on created rows', async () => {
            const { context } = get_test_context()
            const result = await tether_mutate(context, {
                table: 'posts',
                operation: 'create',
                data: { title: 'Fresh', author: { connect: { id: 3 } } },
            })
            expect(result.row).to.deep.equal({
                id: 5,
                title: 'Fresh',
                author_id: 3,
                views: 0,
            })
        })
        test('rolls back when a connected row does not exist', async () => {
            const { context, executor, logged_errors } = get_test_context()
            const error = await get_rejection(
                tether_mutate(context, {
                    table: 'users',
                    operation: 'update',
                    where: { email: 'alice@test.io' },
                    data: { first_name: 'Al', profile: { connect: { id: 5 } } },
                })
            )

            expect(error).to.be.instanceOf(TransactionAbortedError)
            if (error instanceof TransactionAbortedError) {
                expect(error.cause).to.be.instanceOf(UniqueTargetNotFoundError)
                expect(error.step_index).to.equal(2)
                expect(error.path).to.deep.equal(['profile', 'connect'])
            }
            expect(executor.tables.users[0].first_name).to.equal('Alice')
            expect(executor.tables.profiles).to.deep.equal(
                global_test_hydration.profiles
            )
            expect(logged_errors).to.have.lengthOf(1)
        })
        test('creates rows that reference each other through a nullable foreign key', async () => {
            const { context, executor } = get_test_context()
            const result = await tether_mutate(context, {
                table: 'users',
                operation: 'create',
                data: {
                    email: 'eve@test.io',
                    addresses: { create: { $label: 'home', street: '2 Side St' } },
                    primary_address: { connect: { $label: 'home' } },
                },
            })

            expect(result.row).to.deep.equal({
                id: 4,
                email: 'eve@test.io',
                first_name: null,
                last_name: null,
                primary_address_id: 2,
            })
            expect(executor.tables.addresses[1]).to.deep.equal({
                id: 2,
                street: '2 Side St',
                owner_id: 4,
            })
        })
        test('rejects required foreign key cycles before opening a transaction', async () => {
            const { context, executor } = get_test_context()
            const error = await get_rejection(
                tether_mutate(context, {
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
            expect(executor.operations).to.deep.equal([])
            expect(executor.queries).to.deep.equal([])
        })
        test('replaces the rows of a list relation with set', async () => {
            const { context, executor } = get_test_context()
            await tether_mutate(context, {
                table: 'users',
                operation: 'update',
                where: { id: 2 },
                data: { posts: { set: [{ id: 1 }, { id: 2 }] } },
            })
            expect(post_authors(executor.tables.posts)).to.deep.equal([
                [1, 2],
                [2, 2],
                [3, null],
                [4, null],
            ])
        })
        test('moves a one to one child to a new parent', async () => {
            const { context, executor } = get_test_context()
            await tether_mutate(context, {
                table: 'users',
                operation: 'update',
                where: { id: 2 },
                data: { profile: { connect: { id: 1 } } },
            })
            expect(executor.tables.profiles).to.deep.equal([
                { id: 1, user_id: 2, bio: 'alice bio' },
            ])
        })
        test('will not orphan a child whose foreign key is required', async () => {
            const { context, executor } = get_test_context()
            const error = await get_rejection(
                tether_mutate(context, {
                    table: 'users',
                    operation: 'update',
                    where: { id: 1 },
                    data: { profile: { create: { bio: 'second' } } },
                })
            )
            expect(error).to.be.instanceOf(TransactionAbortedError)
            if (error instanceof TransactionAbortedError) {
                expect(error.cause).to.be.instanceOf(CardinalityViolationError)
            }
            expect(executor.tables.profiles).to.have.lengthOf(1)
        })
        test('does nothing on a repeated connect_or_create', async () => {
            const { context, executor } = get_test_context()
            const request: WriteRequest = {
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
            }

            await tether_mutate(context, request)
            await tether_mutate(context, request)

            expect(executor.tables.categories).to.deep.equal([
                { id: 1, name: 'news' },
                { id: 2, name: 'tech' },
                { id: 3, name: 'life' },
                { id: 4, name: 'sports' },
            ])
            expect(executor.tables.post_categories.slice(4)).to.deep.equal([
                { post_id: 3, category_id: 4 },
            ])
        })
        test('connects the existing row when connect_or_create loses a race', async () => {
            const { context, executor } = get_test_context()
            executor.hide_next_lookup = 'categories'
            await tether_mutate(context, {
                table: 'posts',
                operation: 'update',
                where: { id: 3 },
                data: {
                    categories: {
                        connect_or_create: {
                            where: { name: 'news' },
                            create: { name: 'news' },
                        },
                    },
                },
            })

            expect(executor.tables.categories).to.have.lengthOf(3)
            expect(executor.tables.post_categories.slice(4)).to.deep.equal([
                { post_id: 3, category_id: 1 },
            ])
        })
        test('leaves storage untouched whichever operation fails', async () => {
            const request: WriteRequest = {
                table: 'users',
                operation: 'create',
                data: {
                    email: 'dan@test.io',
                    posts: {
                        create: [
                            { title: 'A', categories: { connect: { id: 1 } } },
                            { title: 'B', categories: { create: { name: 'sports' } } },
                        ],
                    },
                    profile: { create: { bio: 'hi' } },
                },
            }

            const { context: clean_context, executor: clean_executor } =
                get_test_context()
            await tether_mutate(clean_context, request)
            const operation_count = clean_executor.operations.length
            expect(operation_count).to.equal(7)

            for (let index = 0; index < operation_count; index++) {
                const { context, executor } = get_test_context()
                executor.fail_at_operation = index
                const error = await get_rejection(tether_mutate(context, request))

                expect(error).to.be.instanceOf(TransactionAbortedError)
                expect(executor.tables).to.deep.equal(global_test_hydration)
            }
        })
        test('rejects a second row linked into a one to one relation', async () => {
            const { context, executor } = get_test_context()
            const error = await get_rejection(
                tether_mutate(context, {
                    table: 'profiles',
                    operation: 'create',
                    data: { bio: 'second', user: { connect: { id: 1 } } },
                })
            )

            expect(error).to.be.instanceOf(TransactionAbortedError)
            if (error instanceof TransactionAbortedError) {
                expect(error.cause).to.be.instanceOf(CardinalityViolationError)
                expect(error.step_index).to.equal(1)
                expect(error.path).to.deep.equal([])
            }
            expect(executor.operations).to.deep.equal([])
            expect(executor.tables.profiles).to.deep.equal(
                global_test_hydration.profiles
            )
        })
        test('rejects moving a row into a one to one relation that is taken', async () => {
            const { context } = get_test_context()
            await tether_mutate(context, {
                table: 'profiles',
                operation: 'create',
                data: { bio: 'bob bio', user: { connect: { id: 2 } } },
            })
            const error = await get_rejection(
                tether_mutate(context, {
                    table: 'profiles',
                    operation: 'update',
                    where: { id: 2 },
                    data: { user: { connect: { id: 1 } } },
                })
            )

            expect(error).to.be.instanceOf(TransactionAbortedError)
            if (error instanceof TransactionAbortedError) {
                expect(error.cause).to.be.instanceOf(CardinalityViolationError)
                expect(error.path).to.deep.equal(['user', 'connect'])
            }
        })
        test('removes only the join row on a join table disconnect', async () => {
            const { context, executor } = get_test_context()
            await tether_mutate(context, {
                table: 'posts',
                operation: 'update',
                where: { id: 1 },
                data: { categories: { disconnect: { id: 2 } } },
            })
            expect(executor.tables.post_categories).to.deep.equal([
                { post_id: 1, category_id: 1 },
                { post_id: 2, category_id: 2 },
                { post_id: 3, category_id: 3 },
            ])
            expect(executor.tables.categories).to.have.lengthOf(3)
        })
        test('removes every join row of a deleted row', async () => {
            const { context, executor } = get_test_context()
            await tether_mutate(context, {
                table: 'posts',
                operation: 'update',
                where: { id: 1 },
                data: { categories: { delete: { id: 2 } } },
            })
            expect(executor.tables.post_categories).to.deep.equal([
                { post_id: 1, category_id: 1 },
                { post_id: 3, category_id: 3 },
            ])
            expect(executor.tables.categories).to.deep.equal([
                { id: 1, name: 'news' },
                { id: 3, name: 'life' },
            ])
        })
        test('only disconnects rows that are linked', async () => {
            const { context } = get_test_context()
            const error = await get_rejection(
                tether_mutate(context, {
                    table: 'posts',
                    operation: 'update',
                    where: { id: 1 },
                    data: { categories: { disconnect: { id: 3 } } },
                })
            )
            expect(error).to.be.instanceOf(TransactionAbortedError)
            if (error instanceof TransactionAbortedError) {
                expect(error.cause).to.be.instanceOf(UniqueTargetNotFoundError)
            }
        })
        test('updates a linked child', async () => {
            const { context, executor } = get_test_context()
            await tether_mutate(context, {
                table: 'users',
                operation: 'update',
                where: { id: 1 },
                data: {
                    posts: { update: { where: { id: 2 }, data: { views: 7 } } },
                },
            })
            expect(executor.tables.posts[1].views).to.equal(7)
        })
        test('upserts a single child', async () => {
            const { context, executor } = get_test_context()
            const upsert = {
                upsert: { create: { bio: 'created' }, update: { bio: 'updated' } },
            }
            await tether_mutate(context, {
                table: 'users',
                operation: 'update',
                where: { id: 1 },
                data: { profile: upsert },
            })
            await tether_mutate(context, {
                table: 'users',
                operation: 'update',
                where: { id: 2 },
                data: { profile: upsert },
            })
            expect(executor.tables.profiles).to.deep.equal([
                { id: 1, user_id: 1, bio: 'updated' },
                { id: 2, user_id: 2, bio: 'created' },
            ])
        })
        test('deletes a single child', async () => {
            const { context, executor } = get_test_context()
            await tether_mutate(context, {
                table: 'users',
                operation: 'update',
                where: { id: 1 },
                data: { profile: { delete: true } },
            })
            expect(executor.tables.profiles).to.deep.equal([])
        })
        test('updates and deletes matching children in bulk', async () => {
            const { context, executor } = get_test_context()
            await tether_mutate(context, {
                table: 'users',
                operation: 'update',
                where: { id: 1 },
                data: {
                    posts: {
                        update_many: {
                            where: { $gt: ['views', 6] },
                            data: { views: 0 },
                        },
                    },
                },
            })
            await tether_mutate(context, {
                table: 'posts',
                operation: 'update',
                where: { id: 1 },
                data: { comments: { delete_many: { $eq: ['body', 'nice'] } } },
            })
            expect(executor.tables.posts.map(post => post.views)).to.deep.equal([
                0, 5, 0, 1,
            ])
            expect(executor.tables.comments.map(comment => comment.id)).to.deep.equal(
                [2, 3]
            )
        })
    })
})
