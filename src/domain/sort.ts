/**
 * Sort direction of one ordering term.
 */
export enum Direction
{
	ASC = 'ASC',
	DESC = 'DESC'
}

/**
 * One `(property, direction)` pair. `property` is an entity attribute name,
 * not a column name.
 */
export class Order
{
	constructor(readonly property: string, readonly direction: Direction = Direction.ASC) {}

	static asc(property: string): Order
	{
		return new Order(property, Direction.ASC);
	}

	static desc(property: string): Order
	{
		return new Order(property, Direction.DESC);
	}

	isAscending(): boolean
	{
		return this.direction === Direction.ASC;
	}

	isDescending(): boolean
	{
		return this.direction === Direction.DESC;
	}

	with(direction: Direction): Order
	{
		return new Order(this.property, direction);
	}
}

/**
 * Ordered sequence of {@link Order}s; the first one is the primary sort key.
 */
export class Sort implements Iterable<Order>
{
	private static readonly UNSORTED = new Sort([]);

	private constructor(readonly orders: readonly Order[]) {}

	static by(property: string, direction?: Direction): Sort;
	static by(...orders: Order[]): Sort;
	static by(propertyOrOrder?: string | Order, ...rest: Array<Order | Direction | undefined>): Sort
	{
		if (typeof propertyOrOrder === 'string')
		{
			const direction = rest[0];
			return new Sort([new Order(propertyOrOrder, direction instanceof Order || direction === undefined ? Direction.ASC : direction)]);
		}
		const orders = [propertyOrOrder, ...rest].filter((o): o is Order => o instanceof Order);
		return new Sort(orders);
	}

	static unsorted(): Sort
	{
		return Sort.UNSORTED;
	}

	isSorted(): boolean
	{
		return this.orders.length > 0;
	}

	isUnsorted(): boolean
	{
		return !this.isSorted();
	}

	/**
	 * Appends the orders of `other` after this sort's own.
	 */
	and(other: Sort): Sort
	{
		return new Sort([...this.orders, ...other.orders]);
	}

	ascending(): Sort
	{
		return new Sort(this.orders.map(o => o.with(Direction.ASC)));
	}

	descending(): Sort
	{
		return new Sort(this.orders.map(o => o.with(Direction.DESC)));
	}

	getOrderFor(property: string): Order | undefined
	{
		return this.orders.find(o => o.property === property);
	}

	[Symbol.iterator](): Iterator<Order>
	{
		return this.orders[Symbol.iterator]();
	}

	toString(): string
	{
		return this.isSorted() ? this.orders.map(o => `${o.property}: ${o.direction}`).join(', ') : 'UNSORTED';
	}
}
