import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { CrudRepository } from './repository';
import { PagingRepository } from './pagingRepository';
import { Session } from './session';
import { defineEntity } from './entityDescriptor';
import { deleteFrom } from './queryBuilder';
import { MySQLEscaper } from './dataProviders/sqlEscaper';
import { Direction, Order, Sort } from './domain/sort';
import { PageRequest } from './domain/pageable';
import { AttributeResolutionError, ConfigurationError, InvalidArgumentError } from './errors';
import type { DataProvider } from './dataProvider';
import type { PreparedQuery } from './preparedQuery';
import type { QueryResult } from './queryObject';

class Dummy
{
	id: number | null = null;
	data = '';
}

const DummyEntity = defineEntity<Dummy>({
	table: 'dummy',
	attributes: { id: { primaryKey: true }, data: {} },
	create: () => new Dummy()
});

function dummy(id: number | null, data: string): Dummy
{
	return Object.assign(new Dummy(), { id, data });
}

describe('CrudRepository', () =>
{
	let executePrepared: Mock<(query: PreparedQuery) => Promise<QueryResult>>;
	let commit: Mock<() => Promise<void>>;
	let rollback: Mock<() => Promise<void>>;
	let session: Session;

	beforeEach(() =>
	{
		executePrepared = vi.fn(async (query: PreparedQuery): Promise<QueryResult> =>
			query.type === 'SELECT' ? { rows: [] } : { affectedRows: 1 });
		commit = vi.fn(async (): Promise<void> => undefined);
		rollback = vi.fn(async (): Promise<void> => undefined);
		const provider: DataProvider = {
			connect: vi.fn(async () => undefined),
			disconnect: vi.fn(async () => undefined),
			beginTransaction: vi.fn(async () => ({ executePrepared, commit, rollback })),
			getEscaper: () => new MySQLEscaper()
		};
		session = new Session(provider);
	});

	function executed(): PreparedQuery[]
	{
		return executePrepared.mock.calls.map(call => call[0]);
	}

	describe('Construction', () =>
	{
		it('should accept an entity with exactly one primary key', () =>
		{
			const repository = new CrudRepository<Dummy, number>(session, DummyEntity);

			expect(repository.getEntityInformation().idAttributeNames).toEqual(['id']);
		});

		it('should refuse an entity without primary key', () =>
		{
			const Keyless = defineEntity<Dummy>({
				table: 'keyless',
				attributes: { id: {}, data: {} },
				create: () => new Dummy()
			});

			expect(() => new CrudRepository(session, Keyless)).toThrow(ConfigurationError);
			expect(() => new CrudRepository(session, Keyless)).toThrow('Object Relational Mapper must have one and only one primary key');
		});

		it('should refuse an entity with a composite primary key', () =>
		{
			const Composite = defineEntity<Dummy>({
				table: 'composite',
				attributes: { id: { primaryKey: true }, data: { primaryKey: true } },
				create: () => new Dummy()
			});

			expect(() => new PagingRepository(session, Composite))
				.toThrow('[PagingRepository.constructor] Object Relational Mapper must have one and only one primary key');
		});
	});

	describe('Statements', () =>
	{
		it('should count with COUNT over the primary key', async () =>
		{
			executePrepared.mockResolvedValueOnce({ rows: [{ result: 3 }] });
			const repository = new CrudRepository<Dummy, number>(session, DummyEntity);

			expect(await repository.count()).toBe(3);
			expect(executed()[0]).toMatchObject({ type: 'SELECT', table: 'dummy', safeFields: ['COUNT(`id`) AS `result`'] });
			expect(executed()[0]?.where).toBeUndefined();
		});

		it('should convert driver counts to numbers', async () =>
		{
			executePrepared.mockResolvedValueOnce({ rows: [{ result: '2' }] });
			const repository = new CrudRepository<Dummy, number>(session, DummyEntity);

			expect(await repository.count()).toBe(2);
		});

		it('should check existence with a filtered count', async () =>
		{
			executePrepared
				.mockResolvedValueOnce({ rows: [{ result: 1 }] })
				.mockResolvedValueOnce({ rows: [{ result: 0 }] });
			const repository = new CrudRepository<Dummy, number>(session, DummyEntity);

			expect(await repository.existsById(1)).toBe(true);
			expect(await repository.existsById(4)).toBe(false);
			expect(executed()[1]).toMatchObject({ where: { sql: '`id` = ?', params: [4] } });
		});

		it('should delete all rows and commit on clear', async () =>
		{
			const repository = new CrudRepository<Dummy, number>(session, DummyEntity);
			await repository.clear();

			expect(executed()).toEqual([{ type: 'DELETE', table: 'dummy' }]);
			expect(commit).toHaveBeenCalledTimes(1);
		});

		it('should delete by ids in one statement', async () =>
		{
			const repository = new CrudRepository<Dummy, number>(session, DummyEntity);
			await repository.deleteAllById([1, 2, 4]);

			expect(executed()).toEqual([{ type: 'DELETE', table: 'dummy', where: { sql: '`id` IN (?, ?, ?)', params: [1, 2, 4] } }]);
			expect(commit).toHaveBeenCalledTimes(1);
		});

		it('should delete every entity and commit once', async () =>
		{
			const repository = new CrudRepository<Dummy, number>(session, DummyEntity);
			await repository.deleteAll([dummy(1, 'a'), dummy(2, 'b')]);

			expect(executed().map(q => q.where?.params)).toEqual([[1], [2]]);
			expect(commit).toHaveBeenCalledTimes(1);
		});

		it('should not run a statement for an empty id list', async () =>
		{
			const repository = new CrudRepository<Dummy, number>(session, DummyEntity);

			expect(await repository.findAllById([])).toEqual([]);
			expect(executePrepared).not.toHaveBeenCalled();
		});
	});

	describe('Read transactions', () =>
	{
		it('should end the transaction a read opened on an idle session', async () =>
		{
			executePrepared.mockResolvedValueOnce({ rows: [{ result: 3 }] });
			const repository = new CrudRepository<Dummy, number>(session, DummyEntity);

			await repository.count();

			expect(rollback).toHaveBeenCalledTimes(1);
			expect(session.inTransaction).toBe(false);
		});

		it('should leave an already open transaction open', async () =>
		{
			const repository = new CrudRepository<Dummy, number>(session, DummyEntity);
			await session.execute(deleteFrom(DummyEntity));

			await repository.findAll();

			expect(rollback).not.toHaveBeenCalled();
			expect(session.inTransaction).toBe(true);
		});

		it('should keep the transaction when queued work was flushed by the read', async () =>
		{
			const repository = new CrudRepository<Dummy, number>(session, DummyEntity);
			session.add(DummyEntity, dummy(1, 'a'));

			await repository.findById(1);

			expect(executed().map(q => q.type)).toEqual(['UPDATE', 'SELECT']);
			expect(rollback).not.toHaveBeenCalled();
			expect(session.inTransaction).toBe(true);
		});
	});

	describe('Ordering', () =>
	{
		it('should leave the statement unordered without sort', async () =>
		{
			const repository = new CrudRepository<Dummy, number>(session, DummyEntity);
			await repository.findAll();

			expect(executed()[0]?.orderBy).toBeUndefined();
		});

		it('should add one ORDER BY term per order, in order', async () =>
		{
			const repository = new CrudRepository<Dummy, number>(session, DummyEntity);
			await repository.findAll(Sort.by(Order.desc('data'), Order.asc('id')));

			expect(executed()[0]?.orderBy).toEqual([
				{ field: '`data`', direction: 'DESC' },
				{ field: '`id`', direction: 'ASC' }
			]);
		});

		it('should order findAllById results', async () =>
		{
			const repository = new CrudRepository<Dummy, number>(session, DummyEntity);
			await repository.findAllById([1, 2], Sort.by('id', Direction.DESC));

			expect(executed()[0]).toMatchObject({
				where: { sql: '`id` IN (?, ?)', params: [1, 2] },
				orderBy: [{ field: '`id`', direction: 'DESC' }]
			});
		});

		it('should fail on a property the entity does not have', async () =>
		{
			const repository = new CrudRepository<Dummy, number>(session, DummyEntity);

			await expect(repository.findAll(Sort.by('missing'))).rejects.toThrow(AttributeResolutionError);
			expect(executePrepared).not.toHaveBeenCalled();
		});
	});

	describe('Argument checks', () =>
	{
		const absent = null as unknown as Dummy;
		const absentId = null as unknown as number;

		it('should reject null entities and ids before running anything', async () =>
		{
			const repository = new CrudRepository<Dummy, number>(session, DummyEntity);

			await expect(repository.save(absent)).rejects.toThrow(InvalidArgumentError);
			await expect(repository.delete(absent)).rejects.toThrow('[CrudRepository.delete] Entity must not be null');
			await expect(repository.findById(absentId)).rejects.toThrow('[CrudRepository.findById] Id must not be null');
			await expect(repository.existsById(absentId)).rejects.toThrow(InvalidArgumentError);
			await expect(repository.deleteById(absentId)).rejects.toThrow(InvalidArgumentError);
			expect(executePrepared).not.toHaveBeenCalled();
			expect(commit).not.toHaveBeenCalled();
		});

		it('should reject null collections and null elements', async () =>
		{
			const repository = new CrudRepository<Dummy, number>(session, DummyEntity);

			await expect(repository.saveAll(null as unknown as Dummy[])).rejects.toThrow('[CrudRepository.saveAll] Entities must not be null');
			await expect(repository.saveAll([dummy(1, 'a'), absent])).rejects.toThrow('[CrudRepository.saveAll] Entities must not contain null elements');
			await expect(repository.deleteAll([absent])).rejects.toThrow(InvalidArgumentError);
			await expect(repository.findAllById([1, absentId])).rejects.toThrow('[CrudRepository.findAllById] Ids must not contain null elements');
			await expect(repository.deleteAllById(null as unknown as number[])).rejects.toThrow(InvalidArgumentError);
			expect(executePrepared).not.toHaveBeenCalled();
		});

		it('should reject a null non-nullable attribute on save before running anything', async () =>
		{
			const Strict = defineEntity<Dummy>({
				table: 'strict_dummy',
				attributes: { id: { primaryKey: true }, data: { nullable: false } },
				create: () => new Dummy()
			});
			const repository = new CrudRepository<Dummy, number>(session, Strict);
			const invalid = dummy(1, 'a');
			Object.assign(invalid, { data: null });

			await expect(repository.save(invalid)).rejects.toThrow(InvalidArgumentError);
			await expect(repository.saveAll([dummy(2, 'b'), invalid])).rejects.toThrow("Attribute 'data' of 'strict_dummy' must not be null");
			expect(executePrepared).not.toHaveBeenCalled();
			expect(commit).not.toHaveBeenCalled();
		});

		it('should reject a null pageable', async () =>
		{
			const repository = new PagingRepository<Dummy, number>(session, DummyEntity);

			await expect(repository.findPage(null as unknown as PageRequest)).rejects.toThrow('[PagingRepository.findPage] Pageable must not be null');
		});
	});

	describe('Saving', () =>
	{
		it('should commit once and refresh every entity for saveAll', async () =>
		{
			executePrepared.mockImplementation(async (query: PreparedQuery): Promise<QueryResult> =>
				query.type === 'SELECT'
					? { rows: [{ id: query.where?.params[0], data: `stored-${String(query.where?.params[0])}` }] }
					: { affectedRows: 1 });
			const repository = new CrudRepository<Dummy, number>(session, DummyEntity);

			const entities = [dummy(2, 'b'), dummy(1, 'a')];
			const saved = await repository.saveAll(entities);

			expect(commit).toHaveBeenCalledTimes(1);
			expect(saved).toEqual([dummy(2, 'stored-2'), dummy(1, 'stored-1')]);
			expect(saved[0]).toBe(entities[0]);
			expect(executed().map(q => q.type)).toEqual(['UPDATE', 'UPDATE', 'SELECT', 'SELECT']);
		});
	});

	describe('Paging', () =>
	{
		it('should count first, then fetch the ordered slice', async () =>
		{
			executePrepared
				.mockResolvedValueOnce({ rows: [{ result: 3 }] })
				.mockResolvedValueOnce({ rows: [{ id: 3, data: 'c' }] });
			const repository = new PagingRepository<Dummy, number>(session, DummyEntity);

			const page = await repository.findPage(PageRequest.of(1, 2, Sort.by('id')));

			expect(page.content).toEqual([dummy(3, 'c')]);
			expect(page.totalElements).toBe(3);
			expect(executed()[0]).toMatchObject({ safeFields: ['COUNT(`id`) AS `result`'] });
			expect(executed()[0]?.limit).toBeUndefined();
			expect(executed()[1]).toMatchObject({
				safeFields: ['`id`', '`data`'],
				orderBy: [{ field: '`id`', direction: 'ASC' }],
				limit: 2,
				offset: 2
			});
		});

		it('should prefer an explicit sort over the pageable\'s', async () =>
		{
			const repository = new PagingRepository<Dummy, number>(session, DummyEntity);

			await repository.findPage(PageRequest.of(0, 2, Sort.by('id')), Sort.by('data', Direction.DESC));

			expect(executed()[1]?.orderBy).toEqual([{ field: '`data`', direction: 'DESC' }]);
		});
	});
});
