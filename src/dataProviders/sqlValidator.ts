import { getLogger } from '../logger';
import { InvalidArgumentError } from '../errors';
import { Query, Condition, Aggregate, isAggregate } from '../queryObject';

const IDENTIFIER_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*(\.[a-zA-Z_][a-zA-Z0-9_]*)?$/;
const ALIAS_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*$/;
const OPERATORS = ['=', '!=', '<', '>', '<=', '>=', 'IN', 'NOT IN', 'IS NULL', 'IS NOT NULL'];
const AGGREGATES = ['COUNT', 'SUM', 'AVG', 'MIN', 'MAX'];

/**
 * Structural checks applied to every query before it is compiled.
 * Only identifiers end up in SQL text; values always travel as parameters.
 */
export class SQLValidator
{
	private static readonly logger = getLogger('SQLValidator');

	private static reject(method: string, message: string, data: Record<string, unknown>): never
	{
		this.logger.error(message, data);
		throw new InvalidArgumentError(message, `SQLValidator.${method}`);
	}

	/**
	 * Accepts `name` or `table.name` made of letters, digits and underscores,
	 * at most 128 characters.
	 */
	static validateIdentifier(identifier: string): string
	{
		if (typeof identifier !== 'string' || !IDENTIFIER_PATTERN.test(identifier) || identifier.length > 128)
		{
			this.reject('validateIdentifier', `Invalid identifier: ${String(identifier)}`, { identifier });
		}
		return identifier;
	}

	static validateAlias(alias: string): string
	{
		if (typeof alias !== 'string' || !ALIAS_PATTERN.test(alias))
		{
			this.reject('validateAlias', `Invalid alias: ${String(alias)}`, { alias });
		}
		return alias;
	}

	/**
	 * @returns the upper-cased direction
	 */
	static validateDirection(direction: string): 'ASC' | 'DESC'
	{
		const upper = String(direction).toUpperCase();
		if (upper === 'ASC' || upper === 'DESC')
		{
			return upper;
		}
		return this.reject('validateDirection', `Invalid ORDER BY direction: ${direction}`, { direction });
	}

	static validateOperator(operator: string): boolean
	{
		return OPERATORS.includes(String(operator).toUpperCase());
	}

	static validateAggregateType(type: string): boolean
	{
		return AGGREGATES.includes(String(type).toUpperCase());
	}

	/**
	 * LIMIT and OFFSET must be non-negative integers when present.
	 */
	static validateLimitOffset(value: number | undefined): void
	{
		if (value !== undefined && (!Number.isInteger(value) || value < 0))
		{
			this.reject('validateLimitOffset', `Invalid LIMIT/OFFSET value: ${value}`, { value });
		}
	}

	static validateQuery(query: Query): void
	{
		this.logger.debug('Validating query structure', { type: query.type, table: query.table });

		this.validateIdentifier(query.table);

		for (const field of query.fields ?? [])
		{
			this.validateField(field);
		}

		if (query.where)
		{
			this.validateCondition(query.where);
		}

		for (const order of query.orderBy ?? [])
		{
			this.validateIdentifier(order.field);
			this.validateDirection(order.direction);
		}

		this.validateLimitOffset(query.limit);
		this.validateLimitOffset(query.offset);

		for (const column of Object.keys(query.values ?? {}))
		{
			this.validateIdentifier(column);
		}

		if (query.returning !== undefined)
		{
			this.validateIdentifier(query.returning);
		}
	}

	private static validateField(field: string | Aggregate): void
	{
		if (isAggregate(field))
		{
			if (!this.validateAggregateType(field.type))
			{
				this.reject('validateField', `Invalid aggregate type: ${field.type}`, { type: field.type });
			}
			this.validateIdentifier(field.field);
			if (field.alias !== undefined)
			{
				this.validateAlias(field.alias);
			}
			return;
		}

		if (field !== '*')
		{
			this.validateIdentifier(field);
		}
	}

	/**
	 * Recursively validates a condition tree.
	 */
	static validateCondition(condition: Condition): void
	{
		if ('and' in condition)
		{
			condition.and.forEach(c => this.validateCondition(c));
			return;
		}
		if ('or' in condition)
		{
			condition.or.forEach(c => this.validateCondition(c));
			return;
		}
		if ('not' in condition)
		{
			this.validateCondition(condition.not);
			return;
		}

		this.validateIdentifier(condition.field);
		if (!this.validateOperator(condition.op))
		{
			this.reject('validateCondition', `Invalid operator: ${condition.op}`, { operator: condition.op });
		}
	}
}
