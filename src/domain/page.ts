import type { Pageable } from './pageable';

/**
 * One slice of a result plus the total number of matching rows.
 */
export class Page<T>
{
	constructor(
		readonly content: readonly T[],
		readonly pageable: Pageable,
		readonly totalElements: number
	) {}

	get number(): number
	{
		return this.pageable.pageNumber;
	}

	get size(): number
	{
		return this.pageable.pageSize;
	}

	get numberOfElements(): number
	{
		return this.content.length;
	}

	get totalPages(): number
	{
		return Math.ceil(this.totalElements / this.size);
	}

	hasContent(): boolean
	{
		return this.content.length > 0;
	}

	hasNext(): boolean
	{
		return this.number + 1 < this.totalPages;
	}

	hasPrevious(): boolean
	{
		return this.number > 0;
	}

	isFirst(): boolean
	{
		return !this.hasPrevious();
	}

	isLast(): boolean
	{
		return !this.hasNext();
	}

	nextPageable(): Pageable | null
	{
		return this.hasNext() ? this.pageable.next() : null;
	}

	previousPageable(): Pageable | null
	{
		return this.hasPrevious() ? this.pageable.previousOrFirst() : null;
	}

	map<U>(converter: (item: T) => U): Page<U>
	{
		return new Page(this.content.map(converter), this.pageable, this.totalElements);
	}
}
