import type { Query, QueryResult } from './queryObject';
import { RepositoryError } from './errors';

/**
 * Middlewares see every query a session executes, before it is compiled.
 * They may rewrite the query, inspect or replace the result, or short-circuit
 * by not calling `next`.
 */
export type Middleware = (query: Query, next: (query: Query) => Promise<QueryResult>) => Promise<QueryResult>;

/**
 * Runs `query` through the middleware chain, ending in `final`.
 * @throws RepositoryError if a middleware calls `next` more than once
 */
export async function runMiddlewares(middlewares: readonly Middleware[], query: Query, final: (query: Query) => Promise<QueryResult>): Promise<QueryResult>
{
	if (middlewares.length === 0) { return final(query); }

	let idx = -1;
	async function dispatch(i: number, q: Query): Promise<QueryResult>
	{
		if (i <= idx)
		{
			throw new RepositoryError('next() called multiple times', 'runMiddlewares');
		}
		idx = i;
		const mw = middlewares[i];
		if (!mw)
			return final(q);

		return mw(q, (nextQuery) => dispatch(i + 1, nextQuery));
	}

	return dispatch(0, query);
}
