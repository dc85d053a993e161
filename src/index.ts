/**
 * @file Main entry point: repositories, the mapping layer they build on,
 * data providers, sessions and the `DataSource` bootstrap.
 */
export type { Query, Condition, Aggregate, OrderBy, ComparisonOperator, QueryResult, Row } from './queryObject';
export type { PreparedQuery, PreparedCondition, PreparedOrderBy } from './preparedQuery';
export type { DataProvider, Transaction } from './dataProvider';
export type { Middleware } from './middleware';
export { runMiddlewares } from './middleware';

export { defineEntity, EntityDescriptor, Attribute } from './entityDescriptor';
export type { AttributeOptions, AttributeDefinitions, AttributeName, EntityDefinition } from './entityDescriptor';
export { AttributeFieldMapper } from './entityFieldMapper';
export type { EntityFieldMapper } from './entityFieldMapper';
export { EntityInformation } from './entityInformation';
export { SelectStatement, DeleteStatement, select, deleteFrom } from './queryBuilder';
export type { Statement } from './queryBuilder';
export { QueryCompiler } from './queryCompiler';

export { Session, Result } from './session';
export type { SessionOptions } from './session';
export { CrudRepository } from './repository';
export { PagingRepository } from './pagingRepository';
export { Direction, Order, Sort, PageRequest, Page } from './domain';
export type { Pageable } from './domain';

export { SQLiteProvider } from './dataProviders/SQLiteProvider';
export type { SQLiteProviderOptions } from './dataProviders/SQLiteProvider';
export { MySQLProvider } from './dataProviders/MySQLProvider';
export type { MySQLProviderOptions, ConnectionPoolConfig } from './dataProviders/MySQLProvider';
export { PostgreSQLProvider } from './dataProviders/PostgreSQLProvider';
export type { PostgreSQLProviderOptions, PostgreSQLConnectionPoolConfig } from './dataProviders/PostgreSQLProvider';
export { SQLEscaper, MySQLEscaper, PostgreSQLEscaper, SQLiteEscaper } from './dataProviders/sqlEscaper';

export { DataSource } from './dataSource';
export type { DataSourceConfig, ProviderConfig } from './dataSource';

export { RepositoryError, ConfigurationError, InvalidArgumentError, AttributeResolutionError, PersistenceError } from './errors';
export { Logger, LogLevel, globalLogger, getLogger, parseLogLevel } from './logger';
export type { LoggerConfig, LogEntry, ContextLogger } from './logger';
