import sqlite3 from 'sqlite3';
import { open, Database } from 'sqlite';
import { DataProvider, Transaction } from '../dataProvider';
import { QueryResult, Row } from '../queryObject';
import { PreparedQuery } from '../preparedQuery';
import { PersistenceError } from '../errors';
import { getLogger } from '../logger';
import { SQLiteEscaper } from './sqlEscaper';
import { renderPreparedQuery, SQLDialect } from './sqlRenderer';

/**
 * Options for connecting to a SQLite database.
 */
export interface SQLiteProviderOptions
{
	/** Database file path, or `:memory:` */
	filename: string;
	/** Switch the journal to WAL mode after connecting (default: false) */
	enableWAL?: boolean;
}

/**
 * A SQLite data provider backed by a single connection.
 * SQLite serializes writers, so only one transaction may be open at a time.
 */
export class SQLiteProvider implements DataProvider
{
	private db?: Database;
	private activeTransaction?: SQLiteTransaction;
	private readonly logger = getLogger('SQLiteProvider');
	private readonly escaper = new SQLiteEscaper();
	private readonly dialect: SQLDialect = { escaper: this.escaper, unlimited: '-1', emptyInsert: 'DEFAULT VALUES' };

	constructor(private readonly options: SQLiteProviderOptions)
	{
		this.logger.debug('SQLiteProvider initialized', { filename: options.filename, enableWAL: options.enableWAL === true });
	}

	async connect(): Promise<void>
	{
		this.logger.debug('Connecting to SQLite database', { filename: this.options.filename });

		this.db = await open({
			filename: this.options.filename,
			driver: sqlite3.Database,
		});

		if (this.options.enableWAL)
		{
			await this.db.exec('PRAGMA journal_mode = WAL;');
			this.logger.debug('WAL mode enabled');
		}

		this.logger.info('SQLite database connected successfully', { filename: this.options.filename });
	}

	async disconnect(): Promise<void>
	{
		if (!this.db)
		{
			return;
		}
		if (this.activeTransaction)
		{
			this.logger.warn('Disconnecting with an open transaction; it will be rolled back');
			await this.activeTransaction.rollback();
		}
		await this.db.close();
		this.db = undefined;
		this.logger.info('SQLite database disconnected successfully');
	}

	/**
	 * Runs raw SQL outside any transaction, e.g. schema setup.
	 */
	async exec(sql: string): Promise<void>
	{
		await this.getConnection().exec(sql);
	}

	async beginTransaction(): Promise<Transaction>
	{
		const db = this.getConnection();
		if (this.activeTransaction)
		{
			throw new PersistenceError('A transaction is already active on this SQLite connection', 'SQLiteProvider.beginTransaction');
		}

		await db.exec('BEGIN');
		const transaction = new SQLiteTransaction(db, this.dialect, () => { this.activeTransaction = undefined; });
		this.activeTransaction = transaction;
		this.logger.debug('Transaction started');
		return transaction;
	}

	getEscaper(): SQLiteEscaper
	{
		return this.escaper;
	}

	private getConnection(): Database
	{
		if (!this.db)
		{
			throw new PersistenceError('Not connected', 'SQLiteProvider.getConnection');
		}
		return this.db;
	}
}

class SQLiteTransaction implements Transaction
{
	private readonly logger = getLogger('SQLiteProvider');
	private finished = false;

	constructor(
		private readonly db: Database,
		private readonly dialect: SQLDialect,
		private readonly onFinish: () => void
	) {}

	async executePrepared(preparedQuery: PreparedQuery): Promise<QueryResult>
	{
		if (this.finished)
		{
			return { error: '[SQLiteProvider.executePrepared] Transaction already finished' };
		}

		try
		{
			const { sql, params } = renderPreparedQuery(preparedQuery, this.dialect);
			this.logger.debug('Executing SQL', { sql, params });

			if (preparedQuery.type === 'SELECT')
			{
				const rows = await this.db.all<Row[]>(sql, params);
				this.logger.debug('SELECT query completed', { table: preparedQuery.table, rowCount: rows.length });
				return { rows };
			}

			const result = await this.db.run(sql, params);
			if (preparedQuery.type === 'INSERT')
			{
				this.logger.debug('INSERT query completed', { table: preparedQuery.table, insertId: result.lastID });
				return { insertId: result.lastID, affectedRows: result.changes ?? 0 };
			}

			const affectedRows = result.changes ?? 0;
			this.logger.debug(`${preparedQuery.type} query completed`, { table: preparedQuery.table, affectedRows });
			return { affectedRows };
		}
		catch (err)
		{
			const errorMsg = `[SQLiteProvider.executePrepared] ${err instanceof Error ? err.message : String(err)}`;
			this.logger.error(errorMsg, { type: preparedQuery.type, table: preparedQuery.table });
			return { error: errorMsg, cause: err };
		}
	}

	async commit(): Promise<void>
	{
		this.assertOpen('commit');
		// a failed COMMIT leaves the transaction open, so it can still be rolled back
		await this.db.exec('COMMIT');
		this.finish();
		this.logger.debug('Transaction committed');
	}

	async rollback(): Promise<void>
	{
		this.assertOpen('rollback');
		try
		{
			await this.db.exec('ROLLBACK');
			this.logger.debug('Transaction rolled back');
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
			throw new PersistenceError('Transaction already finished', `SQLiteProvider.${method}`);
		}
	}

	private finish(): void
	{
		this.finished = true;
		this.onFinish();
	}
}
