import { Pool, PoolClient, PoolConfig, Client, ClientConfig } from 'pg';
import { DataProvider, Transaction } from '../dataProvider';
import { QueryResult, Row } from '../queryObject';
import { PreparedQuery } from '../preparedQuery';
import { PersistenceError } from '../errors';
import { getLogger } from '../logger';
import { PostgreSQLEscaper } from './sqlEscaper';
import { renderPreparedQuery, SQLDialect } from './sqlRenderer';

/**
 * Connection pool configuration options for PostgreSQL.
 */
export interface PostgreSQLConnectionPoolConfig
{
	/** Whether to use connection pooling (default: true) */
	usePool?: boolean;
	/** Maximum number of connections in the pool (default: 10) */
	max?: number;
	/** Minimum number of connections to maintain (default: 0) */
	min?: number;
	/** Milliseconds a client can sit idle before being closed (default: 10000) */
	idleTimeoutMillis?: number;
	/** Milliseconds to wait for a connection (default: 30000) */
	connectionTimeoutMillis?: number;
}

/**
 * PostgreSQL connection options, extending `ClientConfig` from `pg` with pool configuration.
 */
export interface PostgreSQLProviderOptions extends ClientConfig
{
	pool?: PostgreSQLConnectionPoolConfig;
}

/**
 * A PostgreSQL data provider with optional pooling.
 * Statements are rendered with `?` and renumbered to `$n` before execution.
 */
export class PostgreSQLProvider implements DataProvider
{
	private client?: Client;
	private pool?: Pool;
	private readonly usePool: boolean;
	private readonly logger = getLogger('PostgreSQLProvider');
	private readonly escaper = new PostgreSQLEscaper();
	private readonly dialect: SQLDialect = { escaper: this.escaper, unlimited: 'ALL', emptyInsert: 'DEFAULT VALUES' };

	constructor(private readonly options: PostgreSQLProviderOptions)
	{
		this.usePool = options.pool?.usePool !== false;
		this.logger.debug('PostgreSQLProvider initialized', {
			host: options.host,
			database: options.database,
			usePool: this.usePool,
			max: options.pool?.max ?? 10
		});
	}

	async connect(): Promise<void>
	{
		const { pool: poolConfig = {}, ...clientConfig } = this.options;

		if (this.usePool)
		{
			const poolOptions: PoolConfig = {
				...clientConfig,
				max: poolConfig.max ?? 10,
				min: poolConfig.min ?? 0,
				idleTimeoutMillis: poolConfig.idleTimeoutMillis ?? 10000,
				connectionTimeoutMillis: poolConfig.connectionTimeoutMillis ?? 30000,
			};
			this.pool = new Pool(poolOptions);

			try
			{
				const probe = await this.pool.connect();
				await probe.query('SELECT 1');
				probe.release();
				this.logger.info('PostgreSQL connection pool created successfully');
			}
			catch (error)
			{
				this.logger.error('Connection pool test failed', { error: error instanceof Error ? error.message : String(error) });
				await this.pool.end();
				this.pool = undefined;
				throw error;
			}
		}
		else
		{
			this.client = new Client(clientConfig);
			await this.client.connect();
			this.logger.info('PostgreSQL single client connected successfully');
		}
	}

	async disconnect(): Promise<void>
	{
		if (this.pool)
		{
			await this.pool.end();
			this.pool = undefined;
			this.logger.info('Connection pool ended successfully');
		}
		else if (this.client)
		{
			await this.client.end();
			this.client = undefined;
			this.logger.info('Client connection ended successfully');
		}
	}

	async beginTransaction(): Promise<Transaction>
	{
		if (this.pool)
		{
			const pooled = await this.pool.connect();
			try
			{
				await pooled.query('BEGIN');
			}
			catch (error)
			{
				pooled.release();
				throw error;
			}
			return new PostgreSQLTransaction(pooled, this.dialect, () => pooled.release());
		}

		if (this.client)
		{
			await this.client.query('BEGIN');
			return new PostgreSQLTransaction(this.client, this.dialect, () => undefined);
		}

		throw new PersistenceError('Not connected', 'PostgreSQLProvider.beginTransaction');
	}

	getEscaper(): PostgreSQLEscaper
	{
		return this.escaper;
	}
}

/**
 * Replaces each `?` placeholder with `$1`, `$2`, ... in order.
 * Identifiers are validated and values are never inlined, so a `?` can only be a placeholder.
 */
export function toPositionalPlaceholders(sql: string): string
{
	let index = 0;
	return sql.replace(/\?/g, () => `$${++index}`);
}

/**
 * Reads a generated key from a `RETURNING` row. `pg` hands int8 (BIGSERIAL)
 * values over as strings; those are converted when they fit a safe integer.
 * Columns read by SELECT keep pg's own parsing, so BIGINT keys come back as
 * strings there unless a type parser is registered (`types.setTypeParser(20, ...)`).
 */
export function toInsertId(value: unknown): number | string | undefined
{
	if (typeof value === 'number')
	{
		return value;
	}
	if (typeof value !== 'string')
	{
		return undefined;
	}
	const parsed = /^-?\d+$/.test(value) ? Number(value) : NaN;
	return Number.isSafeInteger(parsed) ? parsed : value;
}

class PostgreSQLTransaction implements Transaction
{
	private readonly logger = getLogger('PostgreSQLProvider');
	private finished = false;

	constructor(
		private readonly client: PoolClient | Client,
		private readonly dialect: SQLDialect,
		private readonly release: () => void
	) {}

	async executePrepared(preparedQuery: PreparedQuery): Promise<QueryResult>
	{
		if (this.finished)
		{
			return { error: '[PostgreSQLProvider.executePrepared] Transaction already finished' };
		}

		try
		{
			const rendered = renderPreparedQuery(preparedQuery, this.dialect);
			let sql = toPositionalPlaceholders(rendered.sql);
			if (preparedQuery.type === 'INSERT' && preparedQuery.returning !== undefined)
			{
				sql += ` RETURNING ${this.dialect.escaper.escapeIdentifier(preparedQuery.returning)}`;
			}
			this.logger.debug('Executing SQL', { sql, params: rendered.params });

			const result = await this.client.query<Row>(sql, rendered.params);

			if (preparedQuery.type === 'SELECT')
			{
				this.logger.debug('SELECT query completed', { table: preparedQuery.table, rowCount: result.rows.length });
				return { rows: result.rows };
			}

			if (preparedQuery.type === 'INSERT')
			{
				const generated = preparedQuery.returning !== undefined ? result.rows[0]?.[preparedQuery.returning] : undefined;
				const insertId = toInsertId(generated);
				this.logger.debug('INSERT query completed', { table: preparedQuery.table, insertId });
				return { insertId, affectedRows: result.rowCount ?? 0 };
			}

			const affectedRows = result.rowCount ?? 0;
			this.logger.debug(`${preparedQuery.type} query completed`, { table: preparedQuery.table, affectedRows });
			return { affectedRows };
		}
		catch (err)
		{
			const errorMsg = `[PostgreSQLProvider.executePrepared] ${err instanceof Error ? err.message : String(err)}`;
			this.logger.error(errorMsg, { type: preparedQuery.type, table: preparedQuery.table });
			return { error: errorMsg, cause: err };
		}
	}

	async commit(): Promise<void>
	{
		this.assertOpen('commit');
		try
		{
			await this.client.query('COMMIT');
		}
		catch (error)
		{
			// PostgreSQL ends the transaction even when COMMIT fails
			this.finish();
			throw error;
		}
		this.finish();
	}

	async rollback(): Promise<void>
	{
		this.assertOpen('rollback');
		try
		{
			await this.client.query('ROLLBACK');
		}
		finally
		{
			this.finish();
		}
	}

	private assertOpen(method: string): void
	{
		if (this.finished)
		{
			throw new PersistenceError('Transaction already finished', `PostgreSQLProvider.${method}`);
		}
	}

	private finish(): void
	{
		this.finished = true;
		this.release();
	}
}
