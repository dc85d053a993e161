import mysql, { Connection, ConnectionOptions, Pool, PoolConnection, PoolOptions, ResultSetHeader, RowDataPacket } from 'mysql2/promise';
import { DataProvider, Transaction } from '../dataProvider';
import { QueryResult } from '../queryObject';
import { PreparedQuery } from '../preparedQuery';
import { PersistenceError } from '../errors';
import { getLogger } from '../logger';
import { MySQLEscaper } from './sqlEscaper';
import { renderPreparedQuery, SQLDialect } from './sqlRenderer';

/**
 * Connection pool configuration options.
 */
export interface ConnectionPoolConfig
{
	/** Whether to use connection pooling (default: true) */
	usePool?: boolean;
	/** Maximum number of connections in the pool (default: 10) */
	connectionLimit?: number;
	/** Maximum number of queued connection requests (default: 0, no limit) */
	queueLimit?: number;
	/** Milliseconds an idle connection is kept (default: mysql2's) */
	idleTimeout?: number;
	/** Acquire and ping one connection during connect() (default: false) */
	preConnect?: boolean;
}

/**
 * MySQL connection options, extending `ConnectionOptions` from `mysql2/promise` with pool configuration.
 */
export interface MySQLProviderOptions extends ConnectionOptions
{
	pool?: ConnectionPoolConfig;
}

/**
 * A MySQL data provider. Each transaction holds one pooled connection
 * (or the single connection) from BEGIN until COMMIT/ROLLBACK.
 */
export class MySQLProvider implements DataProvider
{
	private connection?: Connection;
	private pool?: Pool;
	private readonly options: MySQLProviderOptions;
	private readonly usePool: boolean;
	private readonly logger = getLogger('MySQLProvider');
	private readonly escaper = new MySQLEscaper();
	private readonly dialect: SQLDialect = { escaper: this.escaper, unlimited: '18446744073709551615', emptyInsert: '() VALUES ()' };

	constructor(options: MySQLProviderOptions)
	{
		// utf8mb4 unless the caller says otherwise
		this.options = { charset: 'utf8mb4', ...options };
		this.usePool = options.pool?.usePool !== false;
		this.logger.debug('MySQLProvider initialized', {
			host: options.host,
			database: options.database,
			usePool: this.usePool,
			connectionLimit: options.pool?.connectionLimit ?? 10
		});
	}

	async connect(): Promise<void>
	{
		const { pool: poolConfig = {}, ...connectionOptions } = this.options;

		if (this.usePool)
		{
			const poolOptions: PoolOptions = {
				...connectionOptions,
				connectionLimit: poolConfig.connectionLimit ?? 10,
				queueLimit: poolConfig.queueLimit ?? 0,
			};
			if (poolConfig.idleTimeout !== undefined)
			{
				poolOptions.idleTimeout = poolConfig.idleTimeout;
			}

			this.pool = mysql.createPool(poolOptions);

			if (poolConfig.preConnect)
			{
				try
				{
					const probe = await this.pool.getConnection();
					await probe.ping();
					probe.release();
				}
				catch (error)
				{
					this.logger.error('Connection pool test failed', { error: error instanceof Error ? error.message : String(error) });
					await this.pool.end();
					this.pool = undefined;
					throw error;
				}
			}

			this.logger.info('MySQL connection pool created successfully');
		}
		else
		{
			this.connection = await mysql.createConnection(connectionOptions);
			this.logger.info('MySQL single connection created successfully');
		}
	}

	async disconnect(): Promise<void>
	{
		if (this.pool)
		{
			await this.pool.end();
			this.pool = undefined;
			this.logger.info('MySQL connection pool closed');
		}
		else if (this.connection)
		{
			await this.connection.end();
			this.connection = undefined;
			this.logger.info('MySQL single connection closed');
		}
	}

	async beginTransaction(): Promise<Transaction>
	{
		if (this.pool)
		{
			const pooled = await this.pool.getConnection();
			try
			{
				await pooled.beginTransaction();
			}
			catch (error)
			{
				pooled.release();
				throw error;
			}
			return new MySQLTransaction(pooled, this.dialect);
		}

		if (this.connection)
		{
			await this.connection.beginTransaction();
			return new MySQLTransaction(this.connection, this.dialect);
		}

		throw new PersistenceError('Not connected', 'MySQLProvider.beginTransaction');
	}

	getEscaper(): MySQLEscaper
	{
		return this.escaper;
	}
}

function isPoolConnection(connection: Connection | PoolConnection): connection is PoolConnection
{
	return 'release' in connection && typeof connection.release === 'function';
}

class MySQLTransaction implements Transaction
{
	private readonly logger = getLogger('MySQLProvider');
	private finished = false;

	constructor(
		private readonly connection: Connection | PoolConnection,
		private readonly dialect: SQLDialect
	) {}

	async executePrepared(preparedQuery: PreparedQuery): Promise<QueryResult>
	{
		if (this.finished)
		{
			return { error: '[MySQLProvider.executePrepared] Transaction already finished' };
		}

		try
		{
			const { sql, params } = renderPreparedQuery(preparedQuery, this.dialect);
			this.logger.debug('Executing SQL', { sql, params });

			if (preparedQuery.type === 'SELECT')
			{
				const [rows] = await this.connection.execute<RowDataPacket[]>(sql, params);
				this.logger.debug('SELECT query completed', { table: preparedQuery.table, rowCount: rows.length });
				return { rows };
			}

			const [header] = await this.connection.execute<ResultSetHeader>(sql, params);
			if (preparedQuery.type === 'INSERT')
			{
				this.logger.debug('INSERT query completed', { table: preparedQuery.table, insertId: header.insertId });
				return { insertId: header.insertId, affectedRows: header.affectedRows };
			}

			this.logger.debug(`${preparedQuery.type} query completed`, { table: preparedQuery.table, affectedRows: header.affectedRows });
			return { affectedRows: header.affectedRows };
		}
		catch (err)
		{
			const errorMsg = `[MySQLProvider.executePrepared] ${err instanceof Error ? err.message : String(err)}`;
			this.logger.error(errorMsg, { type: preparedQuery.type, table: preparedQuery.table });
			return { error: errorMsg, cause: err };
		}
	}

	async commit(): Promise<void>
	{
		this.assertOpen('commit');
		await this.connection.commit();
		this.release();
	}

	async rollback(): Promise<void>
	{
		this.assertOpen('rollback');
		try
		{
			await this.connection.rollback();
		}
		finally
		{
			this.release();
		}
	}

	private assertOpen(method: string): void
	{
		if (this.finished)
		{
			throw new PersistenceError('Transaction already finished', `MySQLProvider.${method}`);
		}
	}

	private release(): void
	{
		this.finished = true;
		if (isPoolConnection(this.connection))
		{
			this.connection.release();
		}
	}
}
