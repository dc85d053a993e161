/**
 * PreparedQuery - query whose identifiers are validated and escaped and whose
 * conditions are already rendered as SQL fragments with `?` placeholders.
 * Providers execute these without further checks.
 *
 * @module preparedQuery
 */

export interface PreparedQuery
{
	type: 'SELECT' | 'INSERT' | 'UPDATE' | 'DELETE';

	/** Validated table name (not escaped) */
	table: string;

	/** Escaped projection, including rendered aggregates (SELECT only) */
	safeFields?: string[];

	/** Column values keyed by validated, unescaped column name (INSERT/UPDATE) */
	values?: Record<string, unknown>;

	where?: PreparedCondition;

	orderBy?: PreparedOrderBy[];

	limit?: number;

	offset?: number;

	/** Validated, unescaped column to return from an INSERT */
	returning?: string;
}

/**
 * SQL fragment with `?` placeholders and the values bound to them, in order.
 */
export interface PreparedCondition
{
	sql: string;
	params: unknown[];
}

export interface PreparedOrderBy
{
	/** Escaped column, e.g. "`dummy`.`id`" for MySQL */
	field: string;
	direction: 'ASC' | 'DESC';
}
