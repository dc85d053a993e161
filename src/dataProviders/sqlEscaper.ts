/**
 * Dialect-specific identifier quoting.
 */
export abstract class SQLEscaper
{
	/**
	 * Quotes an identifier; a `table.column` pair is quoted part by part.
	 */
	escapeIdentifier(identifier: string): string
	{
		return identifier.split('.').map(part => this.quote(part)).join('.');
	}

	protected abstract quote(part: string): string;
}

/**
 * MySQL quotes with backticks: `dummy`.`id`
 */
export class MySQLEscaper extends SQLEscaper
{
	protected quote(part: string): string
	{
		return `\`${part.replace(/`/g, '``')}\``;
	}
}

/**
 * PostgreSQL quotes with double quotes: "dummy"."id"
 */
export class PostgreSQLEscaper extends SQLEscaper
{
	protected quote(part: string): string
	{
		return `"${part.replace(/"/g, '""')}"`;
	}
}

/**
 * SQLite accepts the standard double-quote form.
 */
export class SQLiteEscaper extends PostgreSQLEscaper {}
