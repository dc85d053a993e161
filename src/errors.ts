/**
 * Error taxonomy for repositories, sessions and providers.
 *
 * Messages follow the `[Component.method] message` layout so a failure can be
 * traced back to the call that raised it.
 */
export class RepositoryError extends Error
{
	/** Where the error was raised, e.g. `CrudRepository.save` */
	readonly origin?: string;

	constructor(message: string, origin?: string, options?: { cause?: unknown })
	{
		super(origin ? `[${origin}] ${message}` : message, options);
		this.name = new.target.name;
		this.origin = origin;
	}
}

/**
 * A repository, entity descriptor or data source was set up with metadata it
 * cannot work with. Raised once, at construction.
 */
export class ConfigurationError extends RepositoryError {}

/**
 * A public method received a null or otherwise unusable argument.
 * Raised before any statement is executed.
 */
export class InvalidArgumentError extends RepositoryError {}

/**
 * A property name (typically from a {@link Sort}) does not name an attribute
 * of the mapped entity.
 */
export class AttributeResolutionError extends RepositoryError
{
	constructor(readonly entity: string, readonly property: string, origin?: string)
	{
		super(`No attribute '${property}' on entity '${entity}'`, origin);
	}
}

/**
 * The data provider or its driver failed. The driver's own error, when there
 * is one, is kept as `cause`.
 */
export class PersistenceError extends RepositoryError {}

/**
 * True when `value` is `null` or `undefined`.
 */
export function isAbsent(value: unknown): value is null | undefined
{
	return value === null || value === undefined;
}
