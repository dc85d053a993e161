import type { Row } from './queryObject';
import type { Attribute } from './entityDescriptor';

/**
 * Data converter interface, responsible for converting between database rows and entities.
 */
export interface EntityFieldMapper<T>
{
	/**
	 * Convert an entity attribute name to a database column name.
	 * Unknown names are returned unchanged.
	 */
	toDbField(field: string): string;

	/**
	 * Convert a database column name to an entity attribute name.
	 * Unknown columns are returned unchanged.
	 */
	fromDbField(column: string): string;

	/**
	 * Build a new entity from a database row.
	 */
	fromDb(dbRow: Row): Promise<T>;

	/**
	 * Copy the mapped columns of a row onto an existing entity.
	 * Columns missing from the row leave the attribute untouched.
	 */
	merge(entity: T, dbRow: Row): Promise<T>;

	/**
	 * Convert an entity to column values. Attributes that are `undefined`
	 * are left out, so partial entities produce partial rows.
	 */
	toDb(entity: Partial<T>): Promise<Row>;
}

/**
 * EntityFieldMapper driven by an entity's declared attributes.
 */
export class AttributeFieldMapper<T extends object> implements EntityFieldMapper<T>
{
	private readonly fieldToColumnMap: Map<string, string>;
	private readonly columnToAttributeMap: Map<string, Attribute<T>>;

	/**
	 * @param attributes Declared attributes, in declaration order
	 * @param create Factory for empty instances, used by `fromDb`
	 */
	constructor(private readonly attributes: readonly Attribute<T>[], private readonly create: () => T)
	{
		this.fieldToColumnMap = new Map<string, string>(attributes.map(a => [a.name, a.column]));
		this.columnToAttributeMap = new Map<string, Attribute<T>>(attributes.map(a => [a.column, a]));
	}

	toDbField(field: string): string
	{
		return this.fieldToColumnMap.get(field) ?? field;
	}

	fromDbField(column: string): string
	{
		return this.columnToAttributeMap.get(column)?.name ?? column;
	}

	async fromDb(dbRow: Row): Promise<T>
	{
		return this.merge(this.create(), dbRow);
	}

	async merge(entity: T, dbRow: Row): Promise<T>
	{
		const values: Row = {};
		for (const column of Object.keys(dbRow))
		{
			const attribute = this.columnToAttributeMap.get(column);
			if (attribute)
			{
				values[attribute.name] = dbRow[column];
			}
		}
		return Object.assign(entity, values);
	}

	async toDb(entity: Partial<T>): Promise<Row>
	{
		const dbRow: Row = {};
		for (const attribute of this.attributes)
		{
			const value = entity[attribute.name];
			if (value !== undefined)
			{
				dbRow[attribute.column] = value;
			}
		}
		return dbRow;
	}
}
