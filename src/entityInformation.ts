import type { Attribute, EntityDescriptor } from './entityDescriptor';
import { ConfigurationError, isAbsent } from './errors';
import { getLogger } from './logger';

/**
 * Identity metadata for one mapped entity type, read from its descriptor once
 * and never changed afterwards.
 */
export class EntityInformation<T extends object>
{
	/** All attribute names, in declaration order */
	readonly attributeNames: readonly string[];
	/** Names of the primary-key attributes, in declaration order */
	readonly idAttributeNames: readonly string[];
	/** Accessors for the primary-key attributes */
	readonly idAttributes: readonly Attribute<T>[];

	private readonly logger = getLogger('EntityInformation');

	constructor(readonly descriptor: EntityDescriptor<T>)
	{
		if (descriptor.attributes.length === 0)
		{
			const message = `Entity '${descriptor.name}' has no mapped attributes`;
			this.logger.error(message);
			throw new ConfigurationError(message, 'EntityInformation.constructor');
		}

		this.attributeNames = Object.freeze(descriptor.attributes.map(a => a.name));
		this.idAttributes = Object.freeze(descriptor.primaryKey());
		this.idAttributeNames = Object.freeze(this.idAttributes.map(a => a.name));
	}

	hasCompositeId(): boolean
	{
		return this.idAttributeNames.length > 1;
	}

	/**
	 * Reads the primary-key value of `entity`.
	 * Only meaningful for single-column keys; with a composite key the first
	 * key attribute is read.
	 */
	getId(entity: T): T[keyof T & string]
	{
		const [idAttribute] = this.idAttributes;
		if (!idAttribute)
		{
			throw new ConfigurationError(`Entity '${this.descriptor.name}' has no primary key`, 'EntityInformation.getId');
		}
		return idAttribute.get(entity);
	}

	/**
	 * An entity is new while any of its key attributes is null or undefined.
	 */
	isNew(entity: T): boolean
	{
		return this.idAttributes.some(a => isAbsent(a.get(entity)));
	}
}
