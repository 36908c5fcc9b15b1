import { Config, Options, QueryOptions, QueryTypes, Sequelize, Transaction } from 'sequelize';
import { v4 as uuidv4 } from 'uuid';
import { DatabaseProvider, providerFromDialect } from './executionPlan';
import { QueryPerformanceInterceptor } from './interceptor';
import { AnalyzerLogger, consoleLogger } from './logger';
import {
  ConnectionStringAccessor,
  DataContextHandle,
  OwnedPlanConnection,
  PlanConnectionFactory,
  PlanRow,
  PlanSession,
} from './types';

export type QuerySql = string | { query: string; values: unknown[] };

export type QueryFunction = (sql: QuerySql, options?: QueryOptions) => Promise<unknown>;

export type SequelizeConfig = Pick<Config, 'database' | 'host' | 'port' | 'username' | 'password'>;

/**
 * The parts of a Sequelize instance the analyzer hooks into
 */
export interface InstrumentableSequelize {
  readonly config: SequelizeConfig;
  query(sql: QuerySql, options?: QueryOptions): Promise<unknown>;
  transaction<T>(autoCallback: (transaction: Transaction) => PromiseLike<T>): Promise<T>;
  getDialect(): string;
  close(): Promise<void>;
}

export type PlanSequelize = Pick<InstrumentableSequelize, 'query' | 'transaction' | 'getDialect' | 'close'>;

// commands the analyzer issues itself or that only manage the session
const SKIPPED_PREFIXES = ['EXPLAIN', 'START', 'ROLLBACK', 'COMMIT', 'SET SHOWPLAN'];

export function shouldSkipCommand(commandText: string): boolean {
  const normalized = commandText.trimStart().toUpperCase();
  return SKIPPED_PREFIXES.some(prefix => normalized.startsWith(prefix));
}

/**
 * Collects the parameter values of a query call under the placeholder
 * names used in the query text
 */
export function extractParameters(sql: QuerySql, options?: QueryOptions): Record<string, unknown> {
  const parameters: Record<string, unknown> = {};

  if (typeof sql !== 'string' && Array.isArray(sql.values)) {
    sql.values.forEach((value, index) => {
      parameters[`?${index + 1}`] = value;
    });
  }

  const replacements = options?.replacements;
  if (Array.isArray(replacements)) {
    replacements.forEach((value, index) => {
      parameters[`?${index + 1}`] = value;
    });
  } else if (replacements) {
    for (const [name, value] of Object.entries(replacements)) {
      parameters[`:${name}`] = value;
    }
  }

  const bind = options?.bind;
  if (Array.isArray(bind)) {
    bind.forEach((value, index) => {
      parameters[`$${index + 1}`] = value;
    });
  } else if (bind) {
    for (const [name, value] of Object.entries(bind)) {
      parameters[`$${name}`] = value;
    }
  }

  return parameters;
}

/**
 * Builds a connection URI from the instance configuration. SQLite has no
 * URI a second connection could share, so it yields undefined.
 */
export function buildConnectionString(dialect: string, config: SequelizeConfig): string | undefined {
  if (dialect === 'sqlite' || !config.host || !config.database) {
    return undefined;
  }

  const credentials = config.username
    ? `${encodeURIComponent(config.username)}${config.password ? `:${encodeURIComponent(config.password)}` : ''}@`
    : '';
  const port = config.port ? `:${config.port}` : '';
  return `${dialect}://${credentials}${config.host}${port}/${encodeURIComponent(config.database)}`;
}

export interface SequelizePlanConnectionOptions {
  query?: QueryFunction;
  isOpen?: () => boolean;
  owned?: boolean;
}

/**
 * Plan connection over a Sequelize instance. A session is a managed
 * transaction, which keeps every statement on one pooled connection.
 */
export class SequelizePlanConnection implements OwnedPlanConnection {
  private readonly runQuery: QueryFunction;
  private closed = false;

  constructor(
    private readonly sequelize: PlanSequelize,
    private readonly options: SequelizePlanConnectionOptions = {}
  ) {
    this.runQuery = options.query ?? ((sql, queryOptions) => sequelize.query(sql, queryOptions));
  }

  get provider(): DatabaseProvider {
    return providerFromDialect(this.sequelize.getDialect());
  }

  isOpen(): boolean {
    return !this.closed && (this.options.isOpen?.() ?? true);
  }

  withSession<T>(work: (session: PlanSession) => Promise<T>): Promise<T> {
    return this.sequelize.transaction(transaction =>
      work({
        execute: async sql => toRows(await this.runQuery(sql, { transaction, type: QueryTypes.SELECT, raw: true })),
      })
    );
  }

  /**
   * Closes the underlying instance only when this connection opened it
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.options.owned) {
      await this.sequelize.close();
    }
  }
}

function toRows(result: unknown): PlanRow[] {
  if (!Array.isArray(result)) {
    return [];
  }
  return result.filter(isRow);
}

function isRow(value: unknown): value is PlanRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Opens single-connection Sequelize instances for plan capture
 */
export interface SequelizeConnectionFactoryOptions {
  // server-side bound for plan statements on SQL Server, which has no per-transaction timeout
  requestTimeoutMs?: number;
}

export class SequelizeConnectionFactory implements PlanConnectionFactory {
  constructor(private readonly options: SequelizeConnectionFactoryOptions = {}) {}

  async open(connectionString: string): Promise<OwnedPlanConnection> {
    const sequelize = new Sequelize(connectionString, this.connectionOptions(connectionString));
    try {
      await sequelize.authenticate();
    } catch (e: unknown) {
      await sequelize.close();
      throw e;
    }
    return new SequelizePlanConnection(sequelize, { owned: true });
  }

  private connectionOptions(connectionString: string): Options {
    const options: Options = { logging: false, pool: { max: 1, min: 0 } };
    const { requestTimeoutMs } = this.options;
    if (requestTimeoutMs !== undefined && connectionString.toLowerCase().startsWith('mssql:')) {
      options.dialectOptions = { options: { requestTimeout: Math.ceil(requestTimeoutMs) } };
    }
    return options;
  }
}

export interface InstrumentOptions {
  contextTag?: string;
  logger?: AnalyzerLogger;
}

export interface SequelizeInstrumentation {
  readonly connectionId: string;
  readonly connection: SequelizePlanConnection;
  readonly dataContext: DataContextHandle;
  restore(): void;
}

const instrumented = new WeakMap<InstrumentableSequelize, SequelizeInstrumentation>();

/**
 * Wraps sequelize.query so that every command is reported to the
 * interceptor, and sequelize.close so the instance's connection is known
 * to be gone. Errors of the wrapped call are rethrown unchanged.
 */
export function instrumentSequelize(
  sequelize: InstrumentableSequelize,
  interceptor: QueryPerformanceInterceptor,
  options: InstrumentOptions = {}
): SequelizeInstrumentation {
  const existing = instrumented.get(sequelize);
  if (existing) {
    (options.logger ?? consoleLogger).warn('Sequelize instance is already instrumented');
    return existing;
  }

  const originalQuery = sequelize.query;
  const originalClose = sequelize.close;
  const runQuery: QueryFunction = (sql, queryOptions) => originalQuery.call(sequelize, sql, queryOptions);

  let open = true;
  const connectionId = uuidv4();
  const contextTag = options.contextTag ?? 'Sequelize';
  const connection = new SequelizePlanConnection(sequelize, { query: runQuery, isOpen: () => open });
  const connectionString: ConnectionStringAccessor = {
    getConnectionString: () => buildConnectionString(sequelize.getDialect(), sequelize.config),
  };
  const dataContext: DataContextHandle = { name: contextTag, connectionString };

  sequelize.query = async function (sql: QuerySql, queryOptions?: QueryOptions): Promise<unknown> {
    const commandText = typeof sql === 'string' ? sql : sql.query;
    if (shouldSkipCommand(commandText)) {
      return runQuery(sql, queryOptions);
    }

    const key = { connectionId, commandId: uuidv4() };
    interceptor.onCommandStarting({
      ...key,
      commandText,
      parameters: extractParameters(sql, queryOptions),
      contextTag,
      connection,
      dataContext,
    });
    try {
      return await runQuery(sql, queryOptions);
    } finally {
      interceptor.onCommandCompleted(key);
    }
  };

  sequelize.close = async function (): Promise<void> {
    open = false;
    await originalClose.call(sequelize);
  };

  const instrumentation: SequelizeInstrumentation = {
    connectionId,
    connection,
    dataContext,
    restore: () => {
      sequelize.query = originalQuery;
      sequelize.close = originalClose;
      instrumented.delete(sequelize);
    },
  };
  instrumented.set(sequelize, instrumentation);
  return instrumentation;
}
