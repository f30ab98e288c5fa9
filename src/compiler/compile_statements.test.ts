import { expect } from 'chai'
import { describe, test } from 'mocha'
import { format } from 'sql-formatter'
import { global_test_model } from '../test_data/global_test_schema'
import { compile_create_table } from './compile_create_table'
import { compile_operation, compile_select } from './compile_statements'
import { compile_where } from './compile_where'

const sqlite_format = (sql: string) => format(sql, { language: 'sqlite' })

describe('compile_statements.ts', () => {
    describe(compile_where.name, () => {
        test('compiles comparisons', () => {
            expect(compile_where({ $eq: ['title', 'a'] })).to.equal(
                "`title` = 'a'"
            )
            expect(compile_where({ $gte: ['views', 10] })).to.equal(
                '`views` >= 10'
            )
            expect(compile_where({ $like: ['title', 'F%'] })).to.equal(
                "`title` LIKE 'F%'"
            )
        })
        test('compiles null equality as IS NULL', () => {
            expect(compile_where({ $eq: ['author_id', null] })).to.equal(
                '`author_id` IS NULL'
            )
        })
        test('escapes quotes in values', () => {
            expect(compile_where({ $eq: ['title', "it's"] })).to.equal(
                "`title` = 'it''s'"
            )
        })
        test('brackets every connective part', () => {
            const sql = compile_where({
                $or: [
                    { $eq: ['id', 1] },
                    { $and: [{ $eq: ['id', 2] }, { $not: { $eq: ['title', null] } }] },
                ],
            })
            expect(sql).to.equal(
                '(`id` = 1) OR ((`id` = 2) AND (NOT (`title` IS NULL)))'
            )
        })
        test('compiles empty connectives to constants', () => {
            expect(compile_where({ $and: [] })).to.equal('1 = 1')
            expect(compile_where({ $or: [] })).to.equal('1 = 0')
            expect(compile_where({ $in: ['id', []] })).to.equal('1 = 0')
        })
        test('compiles in subqueries', () => {
            const sql = compile_where({
                $in: [
                    'id',
                    {
                        $select: ['author_id'],
                        $from: 'posts',
                        $where: { $gt: ['views', 1] },
                    },
                ],
            })
            expect(sql).to.equal(
                '`id` IN (SELECT `author_id` FROM `posts` WHERE `views` > 1)'
            )
        })
        test('rejects identifiers that are not plain names', () => {
            expect(() => compile_where({ $eq: ['id; DROP', 1] })).to.throw()
        })
    })
    describe(compile_select.name, () => {
        test('compiles a full query', () => {
            const sql = compile_select({
                table: 'posts',
                where: { $in: ['author_id', [1, 2]] },
                order_by: [{ $desc: 'views' }, { $asc: 'id' }],
                limit: 2,
                offset: 1,
            })
            expect(sqlite_format(sql)).to.equal(
                sqlite_format(
                    'SELECT * FROM `posts` WHERE `author_id` IN (1, 2) ORDER BY `views` DESC, `id` ASC LIMIT 2 OFFSET 1'
                )
            )
        })
        test('adds a limit when only an offset is given', () => {
            expect(compile_select({ table: 'posts', offset: 3 })).to.equal(
                'SELECT * FROM `posts` LIMIT -1 OFFSET 3'
            )
        })
    })
    describe(compile_operation.name, () => {
        test('compiles inserts', () => {
            expect(
                compile_operation({
                    kind: 'insert',
                    table: 'posts',
                    values: { title: 'a', author_id: null },
                })
            ).to.equal(
                "INSERT INTO `posts` (`title`, `author_id`) VALUES ('a', NULL)"
            )
        })
        test('compiles inserts without values', () => {
            expect(
                compile_operation({ kind: 'insert', table: 'categories', values: {} })
            ).to.equal('INSERT INTO `categories` DEFAULT VALUES')
        })
        test('compiles updates and deletes', () => {
            expect(
                compile_operation({
                    kind: 'update',
                    table: 'posts',
                    where: { $eq: ['id', 1] },
                    values: { views: 3, author_id: null },
                })
            ).to.equal(
                'UPDATE `posts` SET `views` = 3, `author_id` = NULL WHERE `id` = 1'
            )
            expect(
                compile_operation({
                    kind: 'delete',
                    table: 'comments',
                    where: { $eq: ['post_id', 1] },
                })
            ).to.equal('DELETE FROM `comments` WHERE `post_id` = 1')
        })
    })
    describe(compile_create_table.name, () => {
        test('inlines single auto increment primary keys', () => {
            const sql = compile_create_table(global_test_model, 'posts')
            expect(sql).to.equal(
                'CREATE TABLE `posts` (`id` INTEGER PRIMARY KEY AUTOINCREMENT, `title` TEXT NOT NULL, `author_id` INTEGER, `views` INTEGER NOT NULL DEFAULT 0, UNIQUE (`title`), FOREIGN KEY (`author_id`) REFERENCES `users` (`id`))'
            )
        })
        test('declares compound primary keys separately', () => {
            const sql = compile_create_table(global_test_model, 'post_categories')
            expect(sql).to.equal(
                'CREATE TABLE `post_categories` (`post_id` INTEGER NOT NULL, `category_id` INTEGER NOT NULL, PRIMARY KEY (`post_id`, `category_id`), FOREIGN KEY (`post_id`) REFERENCES `posts` (`id`), FOREIGN KEY (`category_id`) REFERENCES `categories` (`id`))'
            )
        })
    })
})
