import { Row } from '../types'

export const global_test_hydration: Record<string, Row[]> = {
    users: [
        {
            id: 1,
            email: 'alice@test.io',
            first_name: 'Alice',
            last_name: 'Anders',
            primary_address_id: null,
        },
        {
            id: 2,
            email: 'bob@test.io',
            first_name: 'Bob',
            last_name: 'Brown',
            primary_address_id: null,
        },
        {
            id: 3,
            email: 'cara@test.io',
            first_name: 'Cara',
            last_name: null,
            primary_address_id: null,
        },
    ],
    profiles: [{ id: 1, user_id: 1, bio: 'alice bio' }],
    posts: [
        { id: 1, title: 'First', author_id: 1, views: 10 },
        { id: 2, title: 'Second', author_id: 1, views: 5 },
        { id: 3, title: 'Third', author_id: 2, views: 0 },
        { id: 4, title: 'Orphan', author_id: null, views: 1 },
    ],
    comments: [
        { id: 1, post_id: 1, body: 'nice' },
        { id: 2, post_id: 1, body: 'great' },
        { id: 3, post_id: 3, body: 'meh' },
    ],
    categories: [
        { id: 1, name: 'news' },
        { id: 2, name: 'tech' },
        { id: 3, name: 'life' },
    ],
    post_categories: [
        { post_id: 1, category_id: 1 },
        { post_id: 1, category_id: 2 },
        { post_id: 2, category_id: 2 },
        { post_id: 3, category_id: 3 },
    ],
    addresses: [{ id: 1, street: '1 Main St', owner_id: 1 }],
    teams: [],
    players: [],
}
