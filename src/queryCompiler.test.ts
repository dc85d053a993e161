/**
 * Tests for QueryCompiler
 */

import { describe, it, expect } from 'vitest';
import { QueryCompiler } from './queryCompiler';
import { MySQLEscaper, PostgreSQLEscaper } from './dataProviders/sqlEscaper';
import { InvalidArgumentError } from './errors';
import type { Query } from './queryObject';

describe('QueryCompiler', () =>
{
	describe('MySQL Compiler', () =>
	{
		const compiler = new QueryCompiler(new MySQLEscaper());

		it('should compile simple SELECT query', () =>
		{
			const query: Query = {
				type: 'SELECT',
				table: 'dummy',
				fields: ['id', 'data']
			};

			const prepared = compiler.compile(query);

			expect(prepared.type).toBe('SELECT');
			expect(prepared.table).toBe('dummy');
			expect(prepared.safeFields).toEqual(['`id`', '`data`']);
			expect(prepared.where).toBeUndefined();
			expect(prepared.orderBy).toBeUndefined();
		});

		it('should compile a comparison into a parameterized fragment', () =>
		{
			const prepared = compiler.compile({
				type: 'SELECT',
				table: 'dummy',
				where: { field: 'id', op: '>', value: 1 }
			});

			expect(prepared.where).toEqual({ sql: '`id` > ?', params: [1] });
		});

		it('should compile a COUNT aggregate with alias', () =>
		{
			const prepared = compiler.compile({
				type: 'SELECT',
				table: 'dummy',
				fields: [{ type: 'COUNT', field: 'id', alias: 'result' }]
			});

			expect(prepared.safeFields).toEqual(['COUNT(`id`) AS `result`']);
		});

		it('should keep ORDER BY terms in order', () =>
		{
			const prepared = compiler.compile({
				type: 'SELECT',
				table: 'dummy',
				orderBy: [
					{ field: 'data', direction: 'DESC' },
					{ field: 'id', direction: 'ASC' }
				]
			});

			expect(prepared.orderBy).toEqual([
				{ field: '`data`', direction: 'DESC' },
				{ field: '`id`', direction: 'ASC' }
			]);
		});

		it('should copy LIMIT and OFFSET', () =>
		{
			const prepared = compiler.compile({ type: 'SELECT', table: 'dummy', limit: 2, offset: 4 });

			expect(prepared.limit).toBe(2);
			expect(prepared.offset).toBe(4);
		});
	});

	describe('PostgreSQL Compiler', () =>
	{
		const compiler = new QueryCompiler(new PostgreSQLEscaper());

		it('should parenthesize AND children and concatenate their params', () =>
		{
			const prepared = compiler.compile({
				type: 'SELECT',
				table: 'dummy',
				where: {
					and: [
						{ field: 'id', op: '>=', value: 2 },
						{ field: 'data', op: '=', value: 'b' }
					]
				}
			});

			expect(prepared.where).toEqual({ sql: '("id" >= ?) AND ("data" = ?)', params: [2, 'b'] });
		});

		it('should compile OR and NOT', () =>
		{
			const prepared = compiler.compile({
				type: 'SELECT',
				table: 'dummy',
				where: {
					not: {
						or: [
							{ field: 'id', op: '=', value: 1 },
							{ field: 'data', op: 'IS NULL' }
						]
					}
				}
			});

			expect(prepared.where).toEqual({ sql: 'NOT (("id" = ?) OR ("data" IS NULL))', params: [1] });
		});

		it('should compile IN with one placeholder per value', () =>
		{
			const prepared = compiler.compile({
				type: 'DELETE',
				table: 'dummy',
				where: { field: 'id', op: 'IN', values: [1, 2, 4] }
			});

			expect(prepared.where).toEqual({ sql: '"id" IN (?, ?, ?)', params: [1, 2, 4] });
		});

		it('should compile an empty IN list to a false predicate', () =>
		{
			const prepared = compiler.compile({
				type: 'SELECT',
				table: 'dummy',
				where: { field: 'id', op: 'IN', values: [] }
			});

			expect(prepared.where).toEqual({ sql: '1 = 0', params: [] });
		});

		it('should compile an empty NOT IN list to a true predicate', () =>
		{
			const prepared = compiler.compile({
				type: 'SELECT',
				table: 'dummy',
				where: { field: 'id', op: 'NOT IN', values: [] }
			});

			expect(prepared.where).toEqual({ sql: '1 = 1', params: [] });
		});

		it('should compile empty AND and OR groups to constant predicates', () =>
		{
			expect(compiler.compile({ type: 'SELECT', table: 'dummy', where: { and: [] } }).where)
				.toEqual({ sql: '1 = 1', params: [] });
			expect(compiler.compile({ type: 'SELECT', table: 'dummy', where: { or: [] } }).where)
				.toEqual({ sql: '1 = 0', params: [] });
		});

		it('should carry values and returning column for INSERT', () =>
		{
			const prepared = compiler.compile({
				type: 'INSERT',
				table: 'dummy',
				values: { data: 'a' },
				returning: 'id'
			});

			expect(prepared.values).toEqual({ data: 'a' });
			expect(prepared.returning).toBe('id');
			expect(prepared.safeFields).toBeUndefined();
		});

		it('should drop returning for statements other than INSERT', () =>
		{
			const prepared = compiler.compile({
				type: 'UPDATE',
				table: 'dummy',
				values: { data: 'z' },
				where: { field: 'id', op: '=', value: 1 },
				returning: 'id'
			});

			expect(prepared.returning).toBeUndefined();
			expect(prepared.values).toEqual({ data: 'z' });
		});
	});

	describe('Validation', () =>
	{
		const compiler = new QueryCompiler(new MySQLEscaper());

		it('should reject an invalid table name', () =>
		{
			expect(() => compiler.compile({ type: 'SELECT', table: 'dummy; DROP TABLE dummy' }))
				.toThrow(InvalidArgumentError);
		});

		it('should reject an invalid column in a condition', () =>
		{
			expect(() => compiler.compile({
				type: 'SELECT',
				table: 'dummy',
				where: { field: 'id OR 1=1', op: '=', value: 1 }
			})).toThrow('Invalid identifier: id OR 1=1');
		});

		it('should reject a negative LIMIT', () =>
		{
			expect(() => compiler.compile({ type: 'SELECT', table: 'dummy', limit: -1 }))
				.toThrow('[SQLValidator.validateLimitOffset] Invalid LIMIT/OFFSET value: -1');
		});

		it('should reject an invalid alias', () =>
		{
			expect(() => compiler.compile({
				type: 'SELECT',
				table: 'dummy',
				fields: [{ type: 'COUNT', field: 'id', alias: 'a b' }]
			})).toThrow('Invalid alias: a b');
		});
	});
});
