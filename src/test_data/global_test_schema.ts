import { compile_schema } from '../schema/compile_schema'
import { TetherSchema } from '../schema/schema_types'

/**
 * users 1-1 profiles (profiles.user_id, required, unique)
 * users 1-n posts (posts.author_id, optional)
 * users 1-n addresses (addresses.owner_id, required)
 * users n-1 addresses as primary_address (users.primary_address_id, optional)
 * posts 1-n comments (comments.post_id, required)
 * posts n-n categories through post_categories
 * teams n-1 players as captain and players n-1 teams, both required
 */
export const global_test_schema = {
    tables: {
        users: {
            columns: {
                id: { data_type: 'int', auto_increment: true, not_null: true },
                email: { data_type: 'varchar', not_null: true },
                first_name: { data_type: 'varchar' },
                last_name: { data_type: 'varchar' },
                primary_address_id: { data_type: 'int' },
            },
            primary_key: { columns: ['id'] },
            unique_keys: [
                { columns: ['email'] },
                { columns: ['first_name', 'last_name'] },
            ],
            foreign_keys: [
                {
                    columns: ['primary_address_id'],
                    referenced_table: 'addresses',
                    referenced_columns: ['id'],
                },
            ],
            relations: {
                profile: {
                    table: 'profiles',
                    from_column: 'id',
                    to_column: 'user_id',
                },
                posts: {
                    table: 'posts',
                    from_column: 'id',
                    to_column: 'author_id',
                },
                addresses: {
                    table: 'addresses',
                    from_column: 'id',
                    to_column: 'owner_id',
                },
                primary_address: {
                    table: 'addresses',
                    from_column: 'primary_address_id',
                    to_column: 'id',
                },
            },
        },
        profiles: {
            columns: {
                id: { data_type: 'int', auto_increment: true, not_null: true },
                user_id: { data_type: 'int', not_null: true },
                bio: { data_type: 'text' },
            },
            primary_key: { columns: ['id'] },
            unique_keys: [{ columns: ['user_id'] }],
            foreign_keys: [
                {
                    columns: ['user_id'],
                    referenced_table: 'users',
                    referenced_columns: ['id'],
                },
            ],
            relations: {
                user: { table: 'users', from_column: 'user_id', to_column: 'id' },
            },
        },
        posts: {
            columns: {
                id: { data_type: 'int', auto_increment: true, not_null: true },
                title: { data_type: 'varchar', not_null: true },
                author_id: { data_type: 'int' },
                views: { data_type: 'int', not_null: true, default: 0 },
            },
            primary_key: { columns: ['id'] },
            unique_keys: [{ columns: ['title'] }],
            foreign_keys: [
                {
                    columns: ['author_id'],
                    referenced_table: 'users',
                    referenced_columns: ['id'],
                },
            ],
            relations: {
                author: {
                    table: 'users',
                    from_column: 'author_id',
                    to_column: 'id',
                },
                comments: {
                    table: 'comments',
                    from_column: 'id',
                    to_column: 'post_id',
                },
                categories: {
                    table: 'categories',
                    through: {
                        table: 'post_categories',
                        from_column: 'post_id',
                        to_column: 'category_id',
                    },
                },
            },
        },
        comments: {
            columns: {
                id: { data_type: 'int', auto_increment: true, not_null: true },
                post_id: { data_type: 'int', not_null: true },
                body: { data_type: 'text', not_null: true },
            },
            primary_key: { columns: ['id'] },
            foreign_keys: [
                {
                    columns: ['post_id'],
                    referenced_table: 'posts',
                    referenced_columns: ['id'],
                },
            ],
            relations: {
                post: { table: 'posts', from_column: 'post_id', to_column: 'id' },
            },
        },
        categories: {
            columns: {
                id: { data_type: 'int', auto_increment: true, not_null: true },
                name: { data_type: 'varchar', not_null: true },
            },
            primary_key: { columns: ['id'] },
            unique_keys: [{ columns: ['name'] }],
            relations: {
                posts: {
                    table: 'posts',
                    through: {
                        table: 'post_categories',
                        from_column: 'category_id',
                        to_column: 'post_id',
                    },
                },
            },
        },
        post_categories: {
            columns: {
                post_id: { data_type: 'int', not_null: true },
                category_id: { data_type: 'int', not_null: true },
            },
            primary_key: { columns: ['post_id', 'category_id'] },
            foreign_keys: [
                {
                    columns: ['post_id'],
                    referenced_table: 'posts',
                    referenced_columns: ['id'],
                },
                {
                    columns: ['category_id'],
                    referenced_table: 'categories',
                    referenced_columns: ['id'],
                },
            ],
        },
        addresses: {
            columns: {
                id: { data_type: 'int', auto_increment: true, not_null: true },
                street: { data_type: 'varchar', not_null: true },
                owner_id: { data_type: 'int', not_null: true },
            },
            primary_key: { columns: ['id'] },
            foreign_keys: [
                {
                    columns: ['owner_id'],
                    referenced_table: 'users',
                    referenced_columns: ['id'],
                },
            ],
            relations: {
                owner: {
                    table: 'users',
                    from_column: 'owner_id',
                    to_column: 'id',
                },
            },
        },
        teams: {
            columns: {
                id: { data_type: 'int', auto_increment: true, not_null: true },
                name: { data_type: 'varchar', not_null: true },
                captain_id: { data_type: 'int', not_null: true },
            },
            primary_key: { columns: ['id'] },
            foreign_keys: [
                {
                    columns: ['captain_id'],
                    referenced_table: 'players',
                    referenced_columns: ['id'],
                },
            ],
            relations: {
                captain: {
                    table: 'players',
                    from_column: 'captain_id',
                    to_column: 'id',
                },
                players: {
                    table: 'players',
                    from_column: 'id',
                    to_column: 'team_id',
                },
            },
        },
        players: {
            columns: {
                id: { data_type: 'int', auto_increment: true, not_null: true },
                name: { data_type: 'varchar', not_null: true },
                team_id: { data_type: 'int', not_null: true },
            },
            primary_key: { columns: ['id'] },
            foreign_keys: [
                {
                    columns: ['team_id'],
                    referenced_table: 'teams',
                    referenced_columns: ['id'],
                },
            ],
            relations: {
                team: { table: 'teams', from_column: 'team_id', to_column: 'id' },
            },
        },
    },
} as const satisfies TetherSchema

export const global_test_model = compile_schema(global_test_schema)
