import { InvalidArgumentError } from '../errors';
import { Sort } from './sort';

/**
 * Pagination request: a zero-based page number, a page size and an optional sort.
 */
export interface Pageable
{
	readonly pageNumber: number;
	readonly pageSize: number;
	/** Rows to skip, `pageNumber * pageSize` */
	readonly offset: number;
	readonly sort: Sort;

	next(): Pageable;
	previousOrFirst(): Pageable;
	first(): Pageable;
	hasPrevious(): boolean;
}

/**
 * Default {@link Pageable} implementation.
 */
export class PageRequest implements Pageable
{
	private constructor(readonly pageNumber: number, readonly pageSize: number, readonly sort: Sort)
	{
		if (!Number.isInteger(pageNumber) || pageNumber < 0)
		{
			throw new InvalidArgumentError('Page index must be a non-negative integer', 'PageRequest.of');
		}
		if (!Number.isInteger(pageSize) || pageSize < 1)
		{
			throw new InvalidArgumentError('Page size must be a positive integer', 'PageRequest.of');
		}
	}

	static of(page: number, size: number, sort: Sort = Sort.unsorted()): PageRequest
	{
		return new PageRequest(page, size, sort);
	}

	/**
	 * First page of the given size.
	 */
	static ofSize(size: number): PageRequest
	{
		return new PageRequest(0, size, Sort.unsorted());
	}

	get offset(): number
	{
		return this.pageNumber * this.pageSize;
	}

	next(): PageRequest
	{
		return this.withPage(this.pageNumber + 1);
	}

	previousOrFirst(): PageRequest
	{
		return this.hasPrevious() ? this.withPage(this.pageNumber - 1) : this.first();
	}

	first(): PageRequest
	{
		return this.withPage(0);
	}

	hasPrevious(): boolean
	{
		return this.pageNumber > 0;
	}

	withPage(pageNumber: number): PageRequest
	{
		return new PageRequest(pageNumber, this.pageSize, this.sort);
	}

	withSort(sort: Sort): PageRequest
	{
		return new PageRequest(this.pageNumber, this.pageSize, sort);
	}
}
