import type { DataProvider, Transaction } from './dataProvider';
import type { Condition, Query, QueryResult, Row } from './queryObject';
import type { EntityDescriptor, Attribute } from './entityDescriptor';
import type { SelectStatement, Statement } from './queryBuilder';
import { Middleware, runMiddlewares } from './middleware';
import { QueryCompiler } from './queryCompiler';
import { InvalidArgumentError, PersistenceError, isAbsent } from './errors';
import { getLogger } from './logger';

export interface SessionOptions
{
	/** Run in order before every query is compiled */
	middlewares?: readonly Middleware[];
}

/**
 * Outcome of one executed statement.
 */
export class Result
{
	readonly rows: readonly Row[];
	readonly affectedRows: number;
	readonly insertId?: number | string;

	constructor(result: QueryResult)
	{
		this.rows = result.rows ?? [];
		this.affectedRows = result.affectedRows ?? 0;
		this.insertId = result.insertId;
	}

	first(): Row | null
	{
		return this.rows[0] ?? null;
	}

	/**
	 * First column of the first row, or `null` when there is none.
	 */
	scalar(): unknown
	{
		const row = this.first();
		if (!row)
		{
			return null;
		}
		const [column] = Object.keys(row);
		return column === undefined ? null : row[column];
	}
}

type PendingOperation = () => Promise<void>;

/**
 * Unit of work over one {@link DataProvider}.
 *
 * A transaction is begun on first use and lives until `commit`, `rollback`
 * or `close`. Entities passed to `add` and `delete` are queued and written
 * by `flush`, which every query runs first.
 */
export class Session
{
	private transaction?: Transaction;
	private pending: PendingOperation[] = [];
	private closed = false;
	private readonly compiler: QueryCompiler;
	private readonly middlewares: readonly Middleware[];
	private readonly logger = getLogger('Session');

	constructor(private readonly provider: DataProvider, options: SessionOptions = {})
	{
		this.compiler = new QueryCompiler(provider.getEscaper());
		this.middlewares = options.middlewares ?? [];
	}

	/** True while a transaction is open. */
	get inTransaction(): boolean
	{
		return this.transaction !== undefined;
	}

	/** Number of queued, unflushed operations. */
	get pendingCount(): number
	{
		return this.pending.length;
	}

	/**
	 * Queues `entity` for insert-or-update.
	 */
	add<T extends object>(descriptor: EntityDescriptor<T>, entity: T): void
	{
		this.addAll(descriptor, [entity]);
	}

	/**
	 * Queues every entity, or none of them if one is invalid.
	 * @throws InvalidArgumentError for a null entity, or a null value in a non-nullable attribute
	 */
	addAll<T extends object>(descriptor: EntityDescriptor<T>, entities: readonly T[]): void
	{
		this.assertOpen('add');
		for (const entity of entities)
		{
			this.assertStorable(descriptor, entity);
		}
		for (const entity of entities)
		{
			this.pending.push(() => this.persist(descriptor, entity));
		}
	}

	/**
	 * Queues `entity` for deletion by primary key.
	 * @throws InvalidArgumentError if the entity was never persisted
	 */
	delete<T extends object>(descriptor: EntityDescriptor<T>, entity: T): void
	{
		this.assertOpen('delete');
		if (isAbsent(entity))
		{
			throw new InvalidArgumentError('Entity must not be null', 'Session.delete');
		}
		const keys = this.keyAttributes(descriptor, 'Session.delete');
		if (keys.some(k => isAbsent(k.get(entity))))
		{
			throw new InvalidArgumentError(`Entity '${descriptor.name}' is not persisted`, 'Session.delete');
		}
		const where = keys.map(k => k.eq(k.get(entity)));
		this.pending.push(async () =>
		{
			await this.run({ type: 'DELETE', table: descriptor.table, where: where.length === 1 ? where[0] : { and: where } });
		});
	}

	/**
	 * Writes every queued operation, in the order it was queued.
	 * On failure the queue is dropped and the transaction rolled back.
	 */
	async flush(): Promise<void>
	{
		this.assertOpen('flush');
		if (this.pending.length === 0)
		{
			return;
		}

		this.logger.debug('Flushing pending operations', { count: this.pending.length });
		try
		{
			while (this.pending.length > 0)
			{
				const operation = this.pending.shift();
				if (operation)
				{
					await operation();
				}
			}
		}
		catch (error)
		{
			this.pending = [];
			await this.rollbackQuietly('Session.flush');
			throw error;
		}
	}

	/**
	 * Executes a statement and returns its raw rows and counts.
	 */
	async execute(statement: Statement): Promise<Result>
	{
		this.assertOpen('execute');
		await this.flush();
		return new Result(await this.run(statement.toQuery()));
	}

	/**
	 * Executes a select statement and maps every row to an entity.
	 */
	async scalars<T extends object>(statement: SelectStatement<T>): Promise<T[]>
	{
		const result = await this.execute(statement);
		const { mapper } = statement.descriptor;
		return Promise.all(result.rows.map(row => mapper.fromDb(row)));
	}

	/**
	 * Loads one entity by primary key.
	 * @returns the entity, or `null` if no row has that key
	 */
	async get<T extends object>(descriptor: EntityDescriptor<T>, id: unknown): Promise<T | null>
	{
		this.assertOpen('get');
		const keys = this.keyAttributes(descriptor, 'Session.get');
		const [key] = keys;
		if (keys.length !== 1 || !key)
		{
			throw new InvalidArgumentError(`Entity '${descriptor.name}' does not have a single-column primary key`, 'Session.get');
		}
		await this.flush();

		const row = await this.selectByKey(descriptor, [key.eq(id)]);
		return row ? descriptor.mapper.fromDb(row) : null;
	}

	/**
	 * Reloads every mapped column of `entity` from its row.
	 * @throws PersistenceError if the row no longer exists
	 */
	async refresh<T extends object>(descriptor: EntityDescriptor<T>, entity: T): Promise<T>
	{
		this.assertOpen('refresh');
		await this.flush();

		const keys = this.keyAttributes(descriptor, 'Session.refresh');
		if (keys.some(k => isAbsent(k.get(entity))))
		{
			throw new InvalidArgumentError(`Entity '${descriptor.name}' is not persisted`, 'Session.refresh');
		}

		const row = await this.selectByKey(descriptor, keys.map(k => k.eq(k.get(entity))));
		if (!row)
		{
			throw new PersistenceError(`Could not refresh '${descriptor.name}': row no longer exists`, 'Session.refresh');
		}
		return descriptor.mapper.merge(entity, row);
	}

	/**
	 * Flushes and commits the current transaction.
	 * A failed commit is rolled back and rethrown.
	 */
	async commit(): Promise<void>
	{
		await this.flush();
		const transaction = this.transaction;
		if (!transaction)
		{
			return;
		}

		try
		{
			await transaction.commit();
			this.transaction = undefined;
			this.logger.info('Transaction committed');
		}
		catch (error)
		{
			this.logger.error('Commit failed, rolling back', { error: error instanceof Error ? error.message : String(error) });
			await this.rollbackQuietly('Session.commit');
			throw error;
		}
	}

	/**
	 * Drops queued operations and rolls back the current transaction.
	 */
	async rollback(): Promise<void>
	{
		this.pending = [];
		const transaction = this.transaction;
		if (!transaction)
		{
			return;
		}
		this.transaction = undefined;
		await transaction.rollback();
		this.logger.info('Transaction rolled back');
	}

	/**
	 * Rolls back anything still open. The session cannot be used afterwards.
	 */
	async close(): Promise<void>
	{
		if (this.closed)
		{
			return;
		}
		await this.rollback();
		this.closed = true;
		this.logger.debug('Session closed');
	}

	private async persist<T extends object>(descriptor: EntityDescriptor<T>, entity: T): Promise<void>
	{
		const keys = this.keyAttributes(descriptor, 'Session.flush');
		const values = await descriptor.mapper.toDb(entity);
		const isNew = keys.some(k => isAbsent(k.get(entity)));

		if (!isNew)
		{
			const keyColumns = new Set(keys.map(k => k.column));
			const assignments = Object.fromEntries(Object.entries(values).filter(([column]) => !keyColumns.has(column)));
			if (Object.keys(assignments).length > 0)
			{
				const where = keys.map(k => k.eq(k.get(entity)));
				const result = await this.run({
					type: 'UPDATE',
					table: descriptor.table,
					values: assignments,
					where: where.length === 1 ? where[0] : { and: where }
				});
				if ((result.affectedRows ?? 0) > 0)
				{
					return;
				}
			}
			else
			{
				const where = keys.map(k => k.eq(k.get(entity)));
				if (await this.selectByKey(descriptor, where))
				{
					return;
				}
			}
			// no row with this key yet
			await this.run({ type: 'INSERT', table: descriptor.table, values });
			return;
		}

		for (const key of keys)
		{
			delete values[key.column];
		}
		const [generated] = keys;
		const query: Query = { type: 'INSERT', table: descriptor.table, values };
		if (keys.length === 1 && generated)
		{
			query.returning = generated.column;
		}

		const result = await this.run(query);
		// 0 is what MySQL reports for tables without AUTO_INCREMENT
		if (generated && keys.length === 1 && result.insertId !== undefined && result.insertId !== 0)
		{
			Object.assign(entity, { [generated.name]: result.insertId });
		}
	}

	private assertStorable<T extends object>(descriptor: EntityDescriptor<T>, entity: T): void
	{
		if (isAbsent(entity))
		{
			throw new InvalidArgumentError('Entity must not be null', 'Session.add');
		}
		// a null key marks a new entity
		const invalid = descriptor.attributes.find(a => !a.nullable && !a.primaryKey && a.get(entity) === null);
		if (invalid)
		{
			const message = `Attribute '${invalid.name}' of '${descriptor.name}' must not be null`;
			this.logger.error(`[Session.add] ${message}`);
			throw new InvalidArgumentError(message, 'Session.add');
		}
	}

	private async selectByKey<T extends object>(descriptor: EntityDescriptor<T>, where: Condition[]): Promise<Row | undefined>
	{
		const result = await this.run({
			type: 'SELECT',
			table: descriptor.table,
			fields: descriptor.columns(),
			where: where.length === 1 ? where[0] : { and: where },
			limit: 1
		});
		return result.rows?.[0];
	}

	private async run(query: Query): Promise<QueryResult>
	{
		const transaction = await this.begin();
		const result = await runMiddlewares(this.middlewares, query, async (q) => transaction.executePrepared(this.compiler.compile(q)));
		if (result.error)
		{
			await this.rollbackQuietly('Session.execute');
			throw new PersistenceError(result.error, undefined, { cause: result.cause });
		}
		return result;
	}

	private async begin(): Promise<Transaction>
	{
		if (!this.transaction)
		{
			this.transaction = await this.provider.beginTransaction();
			this.logger.debug('Transaction started');
		}
		return this.transaction;
	}

	private keyAttributes<T extends object>(descriptor: EntityDescriptor<T>, origin: string): Attribute<T>[]
	{
		const keys = descriptor.primaryKey();
		if (keys.length === 0)
		{
			throw new InvalidArgumentError(`Entity '${descriptor.name}' has no primary key`, origin);
		}
		return keys;
	}

	private async rollbackQuietly(origin: string): Promise<void>
	{
		try
		{
			await this.rollback();
		}
		catch (rollbackError)
		{
			this.transaction = undefined;
			this.logger.error(`[${origin}] Rollback failed`, { error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError) });
		}
	}

	private assertOpen(method: string): void
	{
		if (this.closed)
		{
			throw new PersistenceError('Session is closed', `Session.${method}`);
		}
	}
}
