import type { DataProvider } from './dataProvider';
import type { Middleware } from './middleware';
import { MySQLProvider, MySQLProviderOptions } from './dataProviders/MySQLProvider';
import { SQLiteProvider, SQLiteProviderOptions } from './dataProviders/SQLiteProvider';
import { PostgreSQLProvider, PostgreSQLProviderOptions } from './dataProviders/PostgreSQLProvider';
import { Session } from './session';
import { ConfigurationError } from './errors';
import { LoggerConfig, LogLevel, globalLogger, getLogger, parseLogLevel } from './logger';

export type ProviderConfig =
	| { type: 'sqlite'; options: SQLiteProviderOptions }
	| { type: 'mysql'; options: MySQLProviderOptions }
	| { type: 'postgresql'; options: PostgreSQLProviderOptions }
	| { type: 'custom'; options: { provider: DataProvider } };

export interface DataSourceConfig
{
	/** Providers keyed by the name sessions are opened with */
	providers: Record<string, ProviderConfig>;
	/** Provider used when `openSession` gets no name; defaults to the first one */
	defaultProvider?: string;
	/** Middlewares applied to every session */
	middlewares?: Middleware[];
	logging?: Omit<LoggerConfig, 'level'> & { level?: LogLevel | string };
}

/**
 * Builds and connects the configured providers and opens sessions on them.
 */
export class DataSource
{
	private readonly logger = getLogger('DataSource');

	private constructor(
		private readonly providers: ReadonlyMap<string, DataProvider>,
		private readonly defaultProvider: string,
		private readonly middlewares: readonly Middleware[]
	) {}

	/**
	 * Connects every configured provider.
	 * @throws ConfigurationError for an invalid configuration; providers connected
	 * before a failing one are disconnected again
	 */
	static async build(config: DataSourceConfig): Promise<DataSource>
	{
		if (config.logging)
		{
			DataSource.configureLogging(config.logging);
		}
		const logger = getLogger('DataSource');

		const names = Object.keys(config.providers);
		if (names.length === 0)
		{
			throw new ConfigurationError('At least one provider must be configured', 'DataSource.build');
		}
		const defaultProvider = config.defaultProvider ?? names[0];
		if (defaultProvider === undefined || !names.includes(defaultProvider))
		{
			throw new ConfigurationError(`Default provider '${config.defaultProvider}' is not configured`, 'DataSource.build');
		}

		const providers = new Map<string, DataProvider>();
		try
		{
			for (const name of names)
			{
				const provider = DataSource.createProvider(name, config.providers[name]);
				await provider.connect();
				providers.set(name, provider);
				logger.info('Provider connected', { name });
			}
		}
		catch (error)
		{
			logger.error('Failed to build data source', { error: error instanceof Error ? error.message : String(error) });
			await Promise.allSettled([...providers.values()].map(p => p.disconnect()));
			throw error;
		}

		return new DataSource(providers, defaultProvider, config.middlewares ?? []);
	}

	private static createProvider(name: string, config: ProviderConfig | undefined): DataProvider
	{
		switch (config?.type)
		{
			case 'sqlite':
				return new SQLiteProvider(config.options);
			case 'mysql':
				return new MySQLProvider(config.options);
			case 'postgresql':
				return new PostgreSQLProvider(config.options);
			case 'custom':
				return config.options.provider;
			default:
				throw new ConfigurationError(`Unknown provider type for '${name}'`, 'DataSource.build');
		}
	}

	private static configureLogging(logging: NonNullable<DataSourceConfig['logging']>): void
	{
		const { level, ...rest } = logging;
		const config: LoggerConfig = { ...rest };
		if (typeof level === 'string')
		{
			const parsed = parseLogLevel(level);
			if (parsed === undefined)
			{
				throw new ConfigurationError(`Unknown log level '${level}'`, 'DataSource.build');
			}
			config.level = parsed;
		}
		else if (level !== undefined)
		{
			config.level = level;
		}
		globalLogger.configure(config);
	}

	/**
	 * @throws ConfigurationError if no provider has this name
	 */
	getProvider(name: string = this.defaultProvider): DataProvider
	{
		const provider = this.providers.get(name);
		if (!provider)
		{
			throw new ConfigurationError(`Provider '${name}' is not configured`, 'DataSource.getProvider');
		}
		return provider;
	}

	providerNames(): string[]
	{
		return [...this.providers.keys()];
	}

	openSession(name?: string): Session
	{
		return new Session(this.getProvider(name), { middlewares: this.middlewares });
	}

	/**
	 * Runs `work` with a fresh session and closes the session afterwards,
	 * rolling back whatever `work` left uncommitted.
	 */
	async withSession<R>(work: (session: Session) => Promise<R>, name?: string): Promise<R>
	{
		const session = this.openSession(name);
		try
		{
			return await work(session);
		}
		finally
		{
			await session.close();
		}
	}

	async disconnectAll(): Promise<void>
	{
		const results = await Promise.allSettled(
			[...this.providers.entries()].map(async ([name, provider]) =>
			{
				await provider.disconnect();
				this.logger.info('Provider disconnected', { name });
			})
		);
		const failures = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
		if (failures.length > 0)
		{
			this.logger.error('Some providers failed to disconnect', { count: failures.length });
			throw new AggregateError(failures.map(f => f.reason), '[DataSource.disconnectAll] Failed to disconnect providers');
		}
	}
}
