import { QueryResult } from './queryObject';
import { PreparedQuery } from './preparedQuery';
import { SQLEscaper } from './dataProviders/sqlEscaper';

/**
 * A database transaction opened by a {@link DataProvider}.
 * Every statement of a session's unit of work runs through one of these.
 */
export interface Transaction
{
	/**
	 * Executes a compiled query inside the transaction.
	 * Driver failures are reported through `error`/`cause` on the result, not thrown.
	 */
	executePrepared(preparedQuery: PreparedQuery): Promise<QueryResult>;

	commit(): Promise<void>;

	rollback(): Promise<void>;
}

/**
 * Abstract interface for a database behind the session layer.
 */
export interface DataProvider
{
	connect(): Promise<void>;

	disconnect(): Promise<void>;

	/**
	 * Starts a transaction. Fails if the provider is not connected.
	 */
	beginTransaction(): Promise<Transaction>;

	/**
	 * Dialect-specific escaper, used by QueryCompiler to quote identifiers.
	 */
	getEscaper(): SQLEscaper;
}
