import { expect } from 'chai'
import { afterEach, beforeEach, describe, test } from 'mocha'
import * as sqlite3 from 'sqlite3'
import { TetherContext } from '../executor/executor_types'
import {
    CardinalityViolationError,
    ChainCardinalityError,
    TransactionAbortedError,
    UniqueTargetNotFoundError,
} from '../helpers/error_handling'
import { tether_mutate } from '../mutate/mutate'
import { WriteRequest } from '../mutate/write_types'
import { fluent } from '../query/fluent_chain'
import { tether_find_many, tether_find_unique } from '../query/read_resolver'
import { global_test_hydration } from '../test_data/global_test_hydration'
import { global_test_model } from '../test_data/global_test_schema'
import { get_rejection } from '../test_data/test_helpers'
import {
    close_sqlite_database,
    get_sqlite_context,
    set_up_test_database,
} from './integration_test_helpers'

describe('full integration test', () => {
    let db: sqlite3.Database
    let context: TetherContext<sqlite3.Database>

    beforeEach(async () => {
        db = await set_up_test_database(global_test_model, global_test_hydration)
        context = get_sqlite_context(db, global_test_model)
    })

    afterEach(async () => {
        await close_sqlite_database(db)
    })

    test('creates a row and its child in one write', async () => {
        const result = await tether_mutate(context, {
            table: 'users',
            operation: 'create',
            data: {
                email: 'dan@test.io',
                first_name: 'Dan',
                profile: { create: { bio: 'hi' } },
            },
        })
        expect(result.row?.id).to.equal(4)

        const user = await tether_find_unique(
            context,
            'users',
            { email: 'dan@test.io' },
            { include: { profile: true } }
        )
        expect(user?.profile).to.deep.equal({ id: 2, user_id: 4, bio: 'hi' })
    })

    test('rolls back every change when a connected row is missing', async () => {
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
        }

        const user = await tether_find_unique(
            context,
            'users',
            { id: 1 },
            { include: { profile: true } }
        )
        expect(user?.first_name).to.equal('Alice')
        expect(user?.profile).to.deep.equal({ id: 1, user_id: 1, bio: 'alice bio' })
    })

    test('rejects a second profile for the same user', async () => {
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
        }

        const profiles = await tether_find_many(context, 'profiles')
        expect(profiles).to.deep.equal([{ id: 1, user_id: 1, bio: 'alice bio' }])
    })

    test('creates rows that reference each other', async () => {
        const result = await tether_mutate(context, {
            table: 'users',
            operation: 'create',
            data: {
                email: 'eve@test.io',
                addresses: { create: { $label: 'home', street: '2 Side St' } },
                primary_address: { connect: { $label: 'home' } },
            },
        })

        const addresses = await tether_find_many(context, 'addresses', {
            where: { $eq: ['street', '2 Side St'] },
        })
        expect(addresses).to.deep.equal([
            { id: 2, street: '2 Side St', owner_id: 4 },
        ])
        expect(result.row?.primary_address_id).to.equal(2)
    })

    test('replaces the rows of a list relation', async () => {
        await tether_mutate(context, {
            table: 'users',
            operation: 'update',
            where: { email: 'bob@test.io' },
            data: { posts: { set: [{ id: 1 }, { id: 2 }] } },
        })

        const posts = await tether_find_many(context, 'posts', {
            order_by: [{ $asc: 'id' }],
        })
        expect(posts.map(post => post.author_id)).to.deep.equal([
            2,
            2,
            null,
            null,
        ])
    })

    test('connects or creates without duplicating rows', async () => {
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

        const post = await tether_find_unique(
            context,
            'posts',
            { id: 3 },
            { include: { categories: { order_by: [{ $asc: 'name' }] } } }
        )
        expect(post?.categories).to.deep.equal([
            { id: 3, name: 'life' },
            { id: 4, name: 'sports' },
        ])
        const categories = await tether_find_many(context, 'categories')
        expect(categories).to.have.lengthOf(4)
    })

    test('recovers from a unique conflict in connect_or_create', async () => {
        // the first lookup misses, as if the row was created by someone else right after it
        let hidden = false
        const racing_context: TetherContext<sqlite3.Database> = {
            ...context,
            executor: {
                ...context.executor,
                query: async (tx, query) => {
                    if (!hidden && query.table === 'categories') {
                        hidden = true
                        return []
                    }
                    return context.executor.query(tx, query)
                },
            },
        }

        await tether_mutate(racing_context, {
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

        const categories = await fluent(context, 'posts', { id: 3 })
            .to('categories')
            .fetch()
        expect(categories).to.deep.equal({
            anchor: 'many',
            rows: [
                { id: 1, name: 'news' },
                { id: 3, name: 'life' },
            ],
        })
    })

    test('removes join rows with the row they link', async () => {
        await tether_mutate(context, {
            table: 'posts',
            operation: 'update',
            where: { id: 1 },
            data: { categories: { delete: { name: 'tech' } } },
        })

        const post_categories = await tether_find_many(context, 'post_categories', {
            order_by: [{ $asc: 'post_id' }, { $asc: 'category_id' }],
        })
        expect(post_categories).to.deep.equal([
            { post_id: 1, category_id: 1 },
            { post_id: 3, category_id: 3 },
        ])
    })

    test('reads through relation filters and nested includes', async () => {
        const users = await tether_find_many(context, 'users', {
            where: { $every: ['posts', { $gte: ['views', 5] }] },
            order_by: [{ $asc: 'id' }],
            include: {
                posts: {
                    order_by: [{ $desc: 'views' }],
                    include: { categories: { order_by: [{ $asc: 'id' }] } },
                },
            },
        })

        expect(
            users.map(user => ({ id: user.id, posts: user.posts }))
        ).to.deep.equal([
            {
                id: 1,
                posts: [
                    {
                        id: 1,
                        title: 'First',
                        author_id: 1,
                        views: 10,
                        categories: [
                            { id: 1, name: 'news' },
                            { id: 2, name: 'tech' },
                        ],
                    },
                    {
                        id: 2,
                        title: 'Second',
                        author_id: 1,
                        views: 5,
                        categories: [{ id: 2, name: 'tech' }],
                    },
                ],
            },
            { id: 3, posts: [] },
        ])
    })

    test('follows a fluent chain', async () => {
        const result = await fluent(context, 'comments', { id: 3 })
            .to('post')
            .to('author')
            .fetch()
        expect(result).to.deep.equal({
            anchor: 'single',
            row: {
                id: 2,
                email: 'bob@test.io',
                first_name: 'Bob',
                last_name: 'Brown',
                primary_address_id: null,
            },
        })
    })
    test('rejects a chain that continues from a list relation', () => {
        expect(() =>
            fluent(context, 'users', { email: 'alice@test.io' })
                .to('posts')
                .to('comments')
        ).to.throw(ChainCardinalityError)
    })
})
