import type { Query, Condition, Aggregate, OrderBy } from './queryObject';
import type { EntityDescriptor } from './entityDescriptor';

/**
 * Anything a session can execute.
 */
export interface Statement
{
	toQuery(): Query;
}

interface SelectState
{
	fields?: readonly (string | Aggregate)[];
	where: readonly Condition[];
	orderBy: readonly OrderBy[];
	limit?: number;
	offset?: number;
}

function combine(conditions: readonly Condition[]): Condition | undefined
{
	if (conditions.length === 0)
	{
		return undefined;
	}
	return conditions.length === 1 ? conditions[0] : { and: [...conditions] };
}

/**
 * Immutable SELECT over one entity's table. Every method returns a new
 * statement, so a base statement can be reused for counting and paging.
 */
export class SelectStatement<T extends object> implements Statement
{
	constructor(
		readonly descriptor: EntityDescriptor<T>,
		private readonly state: SelectState = { where: [], orderBy: [] }
	) {}

	/**
	 * Adds conditions; all of them must hold.
	 */
	where(...conditions: Condition[]): SelectStatement<T>
	{
		return this.copy({ where: [...this.state.where, ...conditions] });
	}

	/**
	 * Appends ordering terms after the existing ones.
	 */
	orderBy(...orders: OrderBy[]): SelectStatement<T>
	{
		return this.copy({ orderBy: [...this.state.orderBy, ...orders] });
	}

	clearOrderBy(): SelectStatement<T>
	{
		return this.copy({ orderBy: [] });
	}

	limit(limit: number): SelectStatement<T>
	{
		return this.copy({ limit });
	}

	offset(offset: number): SelectStatement<T>
	{
		return this.copy({ offset });
	}

	/**
	 * Replaces the projection. Rows no longer map to entities afterwards.
	 */
	withOnlyColumns(...fields: (string | Aggregate)[]): SelectStatement<T>
	{
		return this.copy({ fields });
	}

	toQuery(): Query
	{
		const query: Query = {
			type: 'SELECT',
			table: this.descriptor.table,
			fields: this.state.fields ? [...this.state.fields] : this.descriptor.columns()
		};

		const where = combine(this.state.where);
		if (where)
		{
			query.where = where;
		}
		if (this.state.orderBy.length > 0)
		{
			query.orderBy = [...this.state.orderBy];
		}
		if (this.state.limit !== undefined)
		{
			query.limit = this.state.limit;
		}
		if (this.state.offset !== undefined)
		{
			query.offset = this.state.offset;
		}
		return query;
	}

	private copy(changes: Partial<SelectState>): SelectStatement<T>
	{
		return new SelectStatement(this.descriptor, { ...this.state, ...changes });
	}
}

/**
 * Immutable DELETE over one entity's table. Without conditions every row is deleted.
 */
export class DeleteStatement<T extends object> implements Statement
{
	constructor(
		readonly descriptor: EntityDescriptor<T>,
		private readonly conditions: readonly Condition[] = []
	) {}

	where(...conditions: Condition[]): DeleteStatement<T>
	{
		return new DeleteStatement(this.descriptor, [...this.conditions, ...conditions]);
	}

	toQuery(): Query
	{
		const query: Query = { type: 'DELETE', table: this.descriptor.table };
		const where = combine(this.conditions);
		if (where)
		{
			query.where = where;
		}
		return query;
	}
}

export function select<T extends object>(descriptor: EntityDescriptor<T>): SelectStatement<T>
{
	return new SelectStatement(descriptor);
}

export function deleteFrom<T extends object>(descriptor: EntityDescriptor<T>): DeleteStatement<T>
{
	return new DeleteStatement(descriptor);
}
