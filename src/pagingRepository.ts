import { CrudRepository } from './repository';
import { select } from './queryBuilder';
import { Page } from './domain/page';
import type { Pageable } from './domain/pageable';
import type { Sort } from './domain/sort';
import { isAbsent } from './errors';

/**
 * {@link CrudRepository} with offset/limit pagination.
 */
export class PagingRepository<T extends object, ID = unknown> extends CrudRepository<T, ID>
{
	/**
	 * Loads one page and the total row count.
	 *
	 * Count and fetch are two statements in the session's current transaction;
	 * they agree only as far as the database's isolation level makes them.
	 *
	 * @param sort Ordering; falls back to `pageable.sort`
	 */
	async findPage(pageable: Pageable, sort?: Sort): Promise<Page<T>>
	{
		if (isAbsent(pageable))
		{
			throw this.createError('findPage', 'Pageable must not be null');
		}

		const base = select(this.descriptor);
		const paged = this.withOrdering(base.offset(pageable.offset).limit(pageable.pageSize), sort ?? pageable.sort);
		const { total, content } = await this.read(async () =>
		{
			const counted = await this.executeCount(base);
			return { total: counted, content: await this.session.scalars(paged) };
		});

		this.logger.debug('Page loaded', { entity: this.descriptor.name, page: pageable.pageNumber, size: pageable.pageSize, total });
		return new Page(content, pageable, total);
	}
}
