/**
 * QueryCompiler - turns a {@link Query} into a {@link PreparedQuery}.
 *
 * Validates the query with SQLValidator, escapes identifiers with the
 * provider's SQLEscaper and renders conditions as parameterized fragments,
 * so providers only assemble and run SQL.
 *
 * @module queryCompiler
 */

import { Query, Condition, Aggregate, OrderBy, isAggregate } from './queryObject';
import { PreparedQuery, PreparedCondition, PreparedOrderBy } from './preparedQuery';
import { SQLValidator } from './dataProviders/sqlValidator';
import { SQLEscaper } from './dataProviders/sqlEscaper';
import { getLogger } from './logger';

export class QueryCompiler
{
	private readonly logger = getLogger('QueryCompiler');

	constructor(private readonly escaper: SQLEscaper) {}

	/**
	 * @throws InvalidArgumentError if validation fails
	 */
	compile(query: Query): PreparedQuery
	{
		this.logger.debug('Compiling query', { type: query.type, table: query.table });

		SQLValidator.validateQuery(query);

		const prepared: PreparedQuery = {
			type: query.type,
			table: query.table
		};

		if (query.fields && query.type === 'SELECT')
		{
			prepared.safeFields = query.fields.map(f => this.compileField(f));
		}

		if (query.values && (query.type === 'INSERT' || query.type === 'UPDATE'))
		{
			prepared.values = { ...query.values };
		}

		if (query.where)
		{
			prepared.where = this.compileCondition(query.where);
		}

		if (query.orderBy && query.orderBy.length > 0)
		{
			prepared.orderBy = query.orderBy.map(o => this.compileOrderBy(o));
		}

		if (query.type === 'INSERT' && query.returning !== undefined)
		{
			prepared.returning = query.returning;
		}

		prepared.limit = query.limit;
		prepared.offset = query.offset;

		return prepared;
	}

	private compileField(field: string | Aggregate): string
	{
		if (field === '*')
		{
			return '*';
		}

		if (isAggregate(field))
		{
			const sql = `${field.type}(${this.escaper.escapeIdentifier(field.field)})`;
			return field.alias ? `${sql} AS ${this.escaper.escapeIdentifier(field.alias)}` : sql;
		}

		return this.escaper.escapeIdentifier(field);
	}

	/**
	 * Renders a condition tree; AND/OR/NOT children are parenthesized.
	 */
	private compileCondition(condition: Condition): PreparedCondition
	{
		if ('and' in condition)
		{
			return this.joinConditions(condition.and, ' AND ', '1 = 1');
		}

		if ('or' in condition)
		{
			return this.joinConditions(condition.or, ' OR ', '1 = 0');
		}

		if ('not' in condition)
		{
			const compiled = this.compileCondition(condition.not);
			return { sql: `NOT (${compiled.sql})`, params: compiled.params };
		}

		const field = this.escaper.escapeIdentifier(condition.field);

		if ('values' in condition)
		{
			// IN () is not portable: an empty list matches nothing, NOT IN () everything
			if (condition.values.length === 0)
			{
				return { sql: condition.op === 'IN' ? '1 = 0' : '1 = 1', params: [] };
			}
			const placeholders = condition.values.map(() => '?').join(', ');
			return { sql: `${field} ${condition.op} (${placeholders})`, params: [...condition.values] };
		}

		if ('value' in condition)
		{
			return { sql: `${field} ${condition.op} ?`, params: [condition.value] };
		}

		return { sql: `${field} ${condition.op}`, params: [] };
	}

	private joinConditions(conditions: Condition[], separator: string, whenEmpty: string): PreparedCondition
	{
		if (conditions.length === 0)
		{
			return { sql: whenEmpty, params: [] };
		}
		const compiled = conditions.map(c => this.compileCondition(c));
		return {
			sql: compiled.map(c => `(${c.sql})`).join(separator),
			params: compiled.flatMap(c => c.params)
		};
	}

	private compileOrderBy(orderBy: OrderBy): PreparedOrderBy
	{
		return {
			field: this.escaper.escapeIdentifier(orderBy.field),
			direction: SQLValidator.validateDirection(orderBy.direction)
		};
	}
}
