import type { Attribute, EntityDescriptor } from './entityDescriptor';
import { EntityInformation } from './entityInformation';
import { Session } from './session';
import { SelectStatement, select, deleteFrom } from './queryBuilder';
import { Direction, Sort } from './domain/sort';
import { ConfigurationError, InvalidArgumentError, isAbsent } from './errors';
import { getLogger } from './logger';

/**
 * Generic CRUD repository over one mapped entity type.
 *
 * Statements run through the injected {@link Session}; every mutating
 * operation commits before it resolves. The entity must have exactly one
 * primary-key attribute.
 *
 * @typeParam T Entity type
 * @typeParam ID Primary-key type
 */
export class CrudRepository<T extends object, ID = unknown>
{
	protected readonly information: EntityInformation<T>;
	protected readonly primaryKey: Attribute<T>;
	protected readonly logger = getLogger('CrudRepository');

	/**
	 * @throws ConfigurationError if the entity has no attributes, or not exactly one primary-key attribute
	 */
	constructor(protected readonly session: Session, protected readonly descriptor: EntityDescriptor<T>)
	{
		this.information = new EntityInformation(descriptor);
		const [primaryKey] = this.information.idAttributes;
		if (this.information.idAttributes.length !== 1 || !primaryKey)
		{
			const message = 'Object Relational Mapper must have one and only one primary key';
			this.logger.error(message, { entity: descriptor.name, idAttributes: this.information.idAttributeNames });
			throw new ConfigurationError(message, `${new.target.name}.constructor`);
		}
		this.primaryKey = primaryKey;
		this.logger.debug('Repository initialized', { entity: descriptor.name, table: descriptor.table });
	}

	getEntityInformation(): EntityInformation<T>
	{
		return this.information;
	}

	/**
	 * Deletes every row of the entity's table.
	 */
	async clear(): Promise<void>
	{
		await this.session.execute(deleteFrom(this.descriptor));
		await this.session.commit();
	}

	async count(): Promise<number>
	{
		return this.read(() => this.executeCount(select(this.descriptor)));
	}

	async delete(entity: T): Promise<void>
	{
		if (isAbsent(entity))
		{
			throw this.createError('delete', 'Entity must not be null');
		}
		this.session.delete(this.descriptor, entity);
		await this.session.commit();
	}

	/**
	 * Deletes every given entity and commits once.
	 */
	async deleteAll(entities: readonly T[]): Promise<void>
	{
		this.assertAllPresent('deleteAll', entities, 'Entities');
		for (const entity of entities)
		{
			this.session.delete(this.descriptor, entity);
		}
		await this.session.commit();
	}

	/**
	 * Deletes the rows with the given keys in one statement. Unknown keys are ignored.
	 */
	async deleteAllById(ids: readonly ID[]): Promise<void>
	{
		this.assertAllPresent('deleteAllById', ids, 'Ids');
		await this.session.execute(deleteFrom(this.descriptor).where(this.primaryKey.in(ids)));
		await this.session.commit();
	}

	async deleteById(id: ID): Promise<void>
	{
		if (isAbsent(id))
		{
			throw this.createError('deleteById', 'Id must not be null');
		}
		await this.session.execute(deleteFrom(this.descriptor).where(this.primaryKey.eq(id)));
		await this.session.commit();
	}

	async existsById(id: ID): Promise<boolean>
	{
		if (isAbsent(id))
		{
			throw this.createError('existsById', 'Id must not be null');
		}
		const count = await this.read(() => this.executeCount(select(this.descriptor).where(this.primaryKey.eq(id))));
		return count > 0;
	}

	/**
	 * @param sort Ordering; storage order when omitted
	 */
	async findAll(sort?: Sort): Promise<T[]>
	{
		const statement = this.withOrdering(select(this.descriptor), sort);
		return this.read(() => this.session.scalars(statement));
	}

	/**
	 * Finds the entities with the given keys. Unknown keys produce no entry.
	 */
	async findAllById(ids: readonly ID[], sort?: Sort): Promise<T[]>
	{
		this.assertAllPresent('findAllById', ids, 'Ids');
		if (ids.length === 0)
		{
			return [];
		}
		const statement = this.withOrdering(select(this.descriptor).where(this.primaryKey.in(ids)), sort);
		return this.read(() => this.session.scalars(statement));
	}

	/**
	 * @returns the entity, or `null` when no row has this key
	 */
	async findById(id: ID): Promise<T | null>
	{
		if (isAbsent(id))
		{
			throw this.createError('findById', 'Id must not be null');
		}
		return this.read(() => this.session.get(this.descriptor, id));
	}

	/**
	 * Inserts or updates `entity`, commits and reloads it from storage.
	 * Use the returned instance afterwards.
	 */
	async save(entity: T): Promise<T>
	{
		if (isAbsent(entity))
		{
			throw this.createError('save', 'Entity must not be null');
		}
		this.session.add(this.descriptor, entity);
		await this.session.commit();
		return this.read(() => this.session.refresh(this.descriptor, entity));
	}

	/**
	 * Saves every entity and commits once.
	 * @returns the refreshed entities, in input order
	 */
	async saveAll(entities: readonly T[]): Promise<T[]>
	{
		this.assertAllPresent('saveAll', entities, 'Entities');
		this.session.addAll(this.descriptor, entities);
		await this.session.commit();

		return this.read(async () =>
		{
			const saved: T[] = [];
			for (const entity of entities)
			{
				saved.push(await this.session.refresh(this.descriptor, entity));
			}
			return saved;
		});
	}

	/**
	 * Counts the rows `statement` would return: the projection becomes
	 * `COUNT(pk)` and ordering is dropped.
	 */
	protected async executeCount(statement: SelectStatement<T>): Promise<number>
	{
		const counted = statement.withOnlyColumns(this.primaryKey.count('result')).clearOrderBy();
		const result = await this.session.execute(counted);
		return Number(result.scalar() ?? 0);
	}

	/**
	 * Runs read-only `work`. On an idle session the transaction it opened is
	 * ended afterwards; an already open transaction, or queued work, keeps it open.
	 */
	protected async read<R>(work: () => Promise<R>): Promise<R>
	{
		const idle = !this.session.inTransaction && this.session.pendingCount === 0;
		const result = await work();
		if (idle && this.session.inTransaction && this.session.pendingCount === 0)
		{
			await this.session.rollback();
		}
		return result;
	}

	/**
	 * Appends one ordering term per order of `sort`, in order.
	 * @throws AttributeResolutionError if a property is not an attribute of the entity
	 */
	protected withOrdering(statement: SelectStatement<T>, sort?: Sort): SelectStatement<T>
	{
		if (!sort)
		{
			return statement;
		}

		let ordered = statement;
		for (const order of sort)
		{
			const attribute = this.descriptor.attribute(order.property);
			ordered = ordered.orderBy(order.direction === Direction.DESC ? attribute.desc() : attribute.asc());
		}
		return ordered;
	}

	protected createError(method: string, message: string, context?: Record<string, unknown>): InvalidArgumentError
	{
		const origin = `${this.constructor.name}.${method}`;
		this.logger.error(`[${origin}] ${message}`, { entity: this.descriptor.name, ...context });
		return new InvalidArgumentError(message, origin);
	}

	private assertAllPresent(method: string, values: readonly unknown[], label: string): void
	{
		if (isAbsent(values))
		{
			throw this.createError(method, `${label} must not be null`);
		}
		const index = values.findIndex(v => isAbsent(v));
		if (index !== -1)
		{
			throw this.createError(method, `${label} must not contain null elements`, { index });
		}
	}
}
