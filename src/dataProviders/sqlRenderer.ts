import { PreparedQuery } from '../preparedQuery';
import { SQLEscaper } from './sqlEscaper';

/**
 * SQL text with `?` placeholders and its bound values.
 */
export interface RenderedSQL
{
	sql: string;
	params: unknown[];
}

/**
 * The few places where the supported dialects disagree.
 */
export interface SQLDialect
{
	escaper: SQLEscaper;
	/** LIMIT value meaning "no limit", needed when only OFFSET is given */
	unlimited: string;
	/** INSERT tail used when no column has a value */
	emptyInsert: string;
}

/**
 * Assembles the final statement for a compiled query.
 * LIMIT/OFFSET are inlined; the validator only lets non-negative integers through.
 */
export function renderPreparedQuery(prepared: PreparedQuery, dialect: SQLDialect): RenderedSQL
{
	const table = dialect.escaper.escapeIdentifier(prepared.table);

	switch (prepared.type)
	{
		case 'SELECT':
		{
			const fields = prepared.safeFields && prepared.safeFields.length > 0 ? prepared.safeFields.join(', ') : '*';
			let sql = `SELECT ${fields} FROM ${table}`;
			const params: unknown[] = [];

			if (prepared.where)
			{
				sql += ` WHERE ${prepared.where.sql}`;
				params.push(...prepared.where.params);
			}
			if (prepared.orderBy && prepared.orderBy.length > 0)
			{
				sql += ` ORDER BY ${prepared.orderBy.map(o => `${o.field} ${o.direction}`).join(', ')}`;
			}
			if (prepared.limit !== undefined)
			{
				sql += ` LIMIT ${prepared.limit}`;
			}
			else if (prepared.offset !== undefined)
			{
				sql += ` LIMIT ${dialect.unlimited}`;
			}
			if (prepared.offset !== undefined)
			{
				sql += ` OFFSET ${prepared.offset}`;
			}
			return { sql, params };
		}

		case 'INSERT':
		{
			const columns = Object.keys(prepared.values ?? {});
			if (columns.length === 0)
			{
				return { sql: `INSERT INTO ${table} ${dialect.emptyInsert}`, params: [] };
			}
			const escaped = columns.map(c => dialect.escaper.escapeIdentifier(c));
			return {
				sql: `INSERT INTO ${table} (${escaped.join(', ')}) VALUES (${columns.map(() => '?').join(', ')})`,
				params: columns.map(c => prepared.values?.[c])
			};
		}

		case 'UPDATE':
		{
			const columns = Object.keys(prepared.values ?? {});
			if (columns.length === 0)
			{
				throw new Error('UPDATE query requires values');
			}
			let sql = `UPDATE ${table} SET ${columns.map(c => `${dialect.escaper.escapeIdentifier(c)} = ?`).join(', ')}`;
			const params: unknown[] = columns.map(c => prepared.values?.[c]);
			if (prepared.where)
			{
				sql += ` WHERE ${prepared.where.sql}`;
				params.push(...prepared.where.params);
			}
			return { sql, params };
		}

		case 'DELETE':
		{
			let sql = `DELETE FROM ${table}`;
			const params: unknown[] = [];
			if (prepared.where)
			{
				sql += ` WHERE ${prepared.where.sql}`;
				params.push(...prepared.where.params);
			}
			return { sql, params };
		}
	}
}
