import type { Aggregate, Condition, OrderBy } from './queryObject';
import { AttributeFieldMapper, EntityFieldMapper } from './entityFieldMapper';
import { AttributeResolutionError, ConfigurationError } from './errors';
import { getLogger } from './logger';

const logger = getLogger('EntityDescriptor');

/**
 * Per-attribute mapping options.
 */
export interface AttributeOptions
{
	/** Column name; defaults to the attribute name */
	column?: string;
	/** Part of the primary key (default: false) */
	primaryKey?: boolean;
	/** Column accepts NULL (default: false for key attributes, true otherwise) */
	nullable?: boolean;
}

/**
 * Names of the data properties of `T`; methods are left out.
 */
export type AttributeName<T> = Extract<
	{ [K in keyof T & string]: T[K] extends (...args: never[]) => unknown ? never : K }[keyof T & string],
	keyof T & string
>;

/**
 * One entry per data property of `T`. Object literal order is declaration order.
 */
export type AttributeDefinitions<T> = { [K in AttributeName<T>]: AttributeOptions };

export interface EntityDefinition<T>
{
	/** Entity name used in error messages; defaults to the table name */
	name?: string;
	table: string;
	attributes: AttributeDefinitions<T>;
	/** Creates an empty instance that rows are mapped onto */
	create: () => T;
}

/**
 * Typed handle on one mapped attribute. Produces the column-level
 * conditions, orderings and aggregates statements are built from.
 */
export class Attribute<T>
{
	constructor(
		readonly name: keyof T & string,
		readonly column: string,
		readonly primaryKey: boolean,
		readonly nullable: boolean
	) {}

	get(entity: T): T[keyof T & string]
	{
		return entity[this.name];
	}

	eq(value: unknown): Condition
	{
		return { field: this.column, op: '=', value };
	}

	in(values: readonly unknown[]): Condition
	{
		return { field: this.column, op: 'IN', values: [...values] };
	}

	isNull(): Condition
	{
		return { field: this.column, op: 'IS NULL' };
	}

	asc(): OrderBy
	{
		return { field: this.column, direction: 'ASC' };
	}

	desc(): OrderBy
	{
		return { field: this.column, direction: 'DESC' };
	}

	count(alias?: string): Aggregate
	{
		return alias === undefined
			? { type: 'COUNT', field: this.column }
			: { type: 'COUNT', field: this.column, alias };
	}
}

/**
 * Mapping metadata for one entity type: its table and its attributes in
 * declaration order.
 */
export class EntityDescriptor<T extends object>
{
	readonly name: string;
	readonly table: string;
	readonly attributes: readonly Attribute<T>[];
	readonly mapper: EntityFieldMapper<T>;
	private readonly byName: ReadonlyMap<string, Attribute<T>>;

	constructor(definition: EntityDefinition<T>)
	{
		this.name = definition.name ?? definition.table;
		this.table = definition.table;

		const attributes: Attribute<T>[] = [];
		const names = Object.keys(definition.attributes);
		for (const name of names)
		{
			if (!isAttributeName(definition.attributes, name))
			{
				continue;
			}
			const options = definition.attributes[name];
			const primaryKey = options.primaryKey === true;
			attributes.push(new Attribute<T>(name, options.column ?? name, primaryKey, options.nullable ?? !primaryKey));
		}

		const columns = new Set<string>();
		for (const attribute of attributes)
		{
			if (columns.has(attribute.column))
			{
				const message = `Column '${attribute.column}' is mapped more than once on entity '${this.name}'`;
				logger.error(message);
				throw new ConfigurationError(message, 'EntityDescriptor.constructor');
			}
			columns.add(attribute.column);
		}

		this.attributes = attributes;
		this.byName = new Map<string, Attribute<T>>(attributes.map(a => [a.name, a]));
		this.mapper = new AttributeFieldMapper(attributes, definition.create);
	}

	/**
	 * Resolves an attribute by its property name.
	 * @throws AttributeResolutionError for names the entity does not declare
	 */
	attribute(name: string): Attribute<T>
	{
		const attribute = this.byName.get(name);
		if (!attribute)
		{
			throw new AttributeResolutionError(this.name, name, 'EntityDescriptor.attribute');
		}
		return attribute;
	}

	hasAttribute(name: string): boolean
	{
		return this.byName.has(name);
	}

	/** Attributes flagged as primary key, in declaration order. */
	primaryKey(): Attribute<T>[]
	{
		return this.attributes.filter(a => a.primaryKey);
	}

	columns(): string[]
	{
		return this.attributes.map(a => a.column);
	}
}

function isAttributeName<T>(attributes: AttributeDefinitions<T>, name: string): name is AttributeName<T>
{
	return Object.prototype.hasOwnProperty.call(attributes, name);
}

/**
 * Declares how an entity type maps onto a table.
 *
 * @example
 * class Dummy { id: number | null = null; data = ''; }
 * const DummyEntity = defineEntity<Dummy>({
 *   table: 'dummy',
 *   attributes: { id: { primaryKey: true }, data: {} },
 *   create: () => new Dummy(),
 * });
 */
export function defineEntity<T extends object>(definition: EntityDefinition<T>): EntityDescriptor<T>
{
	return new EntityDescriptor(definition);
}
