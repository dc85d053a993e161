/**
 * Comparison operators accepted in a field condition.
 */
export type ComparisonOperator = '=' | '!=' | '>' | '<' | '>=' | '<=';

/**
 * Condition type, describes a WHERE clause over column names.
 * Examples:
 * { field: 'id', op: '=', value: 1 }
 * { field: 'id', op: 'IN', values: [1, 2] }
 * { field: 'deleted_at', op: 'IS NULL' }
 * { and: [ ... ] }
 */
export type Condition =
	| { field: string; op: ComparisonOperator; value: unknown }
	| { field: string; op: 'IN' | 'NOT IN'; values: readonly unknown[] }
	| { field: string; op: 'IS NULL' | 'IS NOT NULL' }
	| { and: Condition[] }
	| { or: Condition[] }
	| { not: Condition };

/**
 * Aggregate projection.
 * Example: { type: 'COUNT', field: 'id', alias: 'result' }
 */
export interface Aggregate
{
	type: 'COUNT' | 'SUM' | 'AVG' | 'MIN' | 'MAX';
	field: string;
	alias?: string;
}

/**
 * One ORDER BY term.
 */
export interface OrderBy
{
	field: string;
	direction: 'ASC' | 'DESC';
}

/**
 * Query main object, describes one SQL statement against a single table.
 * All names are column names; entity attribute names are translated before a
 * query is built.
 */
export interface Query
{
	type: 'SELECT' | 'INSERT' | 'UPDATE' | 'DELETE';
	table: string;
	/** Projection (SELECT only); all columns when omitted */
	fields?: (string | Aggregate)[];
	/** Column values (INSERT/UPDATE) */
	values?: Record<string, unknown>;
	where?: Condition;
	orderBy?: OrderBy[];
	limit?: number;
	offset?: number;
	/** Column whose generated value an INSERT should report back */
	returning?: string;
}

/**
 * Row shape returned by providers.
 */
export type Row = Record<string, unknown>;

/**
 * Query result as reported by a provider.
 * If the statement failed, `error` is set and `cause` holds the driver error.
 */
export interface QueryResult<T = Row>
{
	/** SELECT rows */
	rows?: T[];
	/** Rows touched by INSERT, UPDATE or DELETE */
	affectedRows?: number;
	/** Generated key of an inserted row, where the database reports one */
	insertId?: number | string;
	error?: string;
	cause?: unknown;
}

/**
 * Type guard separating aggregates from plain column projections.
 */
export function isAggregate(field: string | Aggregate): field is Aggregate
{
	return typeof field === 'object' && field !== null && 'type' in field;
}
