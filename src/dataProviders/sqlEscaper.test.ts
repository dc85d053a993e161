import { describe, it, expect } from 'vitest';
import { MySQLEscaper, PostgreSQLEscaper, SQLiteEscaper } from './sqlEscaper';
import { SQLValidator } from './sqlValidator';
import { InvalidArgumentError } from '../errors';

describe('SQLEscaper', () =>
{
	it('should quote MySQL identifiers with backticks', () =>
	{
		const escaper = new MySQLEscaper();
		expect(escaper.escapeIdentifier('id')).toBe('`id`');
		expect(escaper.escapeIdentifier('dummy.id')).toBe('`dummy`.`id`');
		expect(escaper.escapeIdentifier('we`ird')).toBe('`we``ird`');
	});

	it('should quote PostgreSQL and SQLite identifiers with double quotes', () =>
	{
		expect(new PostgreSQLEscaper().escapeIdentifier('dummy.data')).toBe('"dummy"."data"');
		expect(new SQLiteEscaper().escapeIdentifier('we"ird')).toBe('"we""ird"');
	});
});

describe('SQLValidator', () =>
{
	it('should accept plain and qualified identifiers', () =>
	{
		expect(SQLValidator.validateIdentifier('dummy')).toBe('dummy');
		expect(SQLValidator.validateIdentifier('dummy.id')).toBe('dummy.id');
		expect(SQLValidator.validateIdentifier('_private1')).toBe('_private1');
	});

	it('should reject identifiers with SQL in them', () =>
	{
		expect(() => SQLValidator.validateIdentifier('id; --')).toThrow(InvalidArgumentError);
		expect(() => SQLValidator.validateIdentifier('1abc')).toThrow(InvalidArgumentError);
		expect(() => SQLValidator.validateIdentifier('a.b.c')).toThrow(InvalidArgumentError);
	});

	it('should reject identifiers longer than 128 characters', () =>
	{
		expect(() => SQLValidator.validateIdentifier('a'.repeat(129))).toThrow(InvalidArgumentError);
	});

	it('should normalize directions', () =>
	{
		expect(SQLValidator.validateDirection('desc')).toBe('DESC');
		expect(() => SQLValidator.validateDirection('sideways')).toThrow('Invalid ORDER BY direction: sideways');
	});

	it('should know the supported operators and aggregates', () =>
	{
		expect(SQLValidator.validateOperator('not in')).toBe(true);
		expect(SQLValidator.validateOperator('LIKE')).toBe(false);
		expect(SQLValidator.validateAggregateType('count')).toBe(true);
		expect(SQLValidator.validateAggregateType('MEDIAN')).toBe(false);
	});
});
