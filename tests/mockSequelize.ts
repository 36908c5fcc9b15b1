import type { QueryOptions, Transaction } from 'sequelize';
import { InstrumentableSequelize, QuerySql, SequelizeConfig } from '../src/sequelizeAdapter';

export interface ExecutedQuery {
  sql: QuerySql;
  options?: QueryOptions;
}

/**
 * In-process stand-in for a Sequelize instance; records every query it is given
 */
export class MockSequelize implements InstrumentableSequelize {
  readonly config: SequelizeConfig = {
    database: 'shop',
    host: 'db.internal',
    port: '5432',
    username: 'app',
    password: 'test-secret',
  };
  readonly executed: ExecutedQuery[] = [];
  transactionCount = 0;
  closed = false;
  respond: (text: string, options?: QueryOptions) => unknown = () => [[{ id: 1, name: 'test' }], 1];

  constructor(
    private readonly transactionHandle: Transaction,
    private readonly dialect: string = 'postgres'
  ) {}

  async query(sql: QuerySql, options?: QueryOptions): Promise<unknown> {
    this.executed.push({ sql, options });
    return this.respond(typeof sql === 'string' ? sql : sql.query, options);
  }

  async transaction<T>(autoCallback: (transaction: Transaction) => PromiseLike<T>): Promise<T> {
    this.transactionCount++;
    return autoCallback(this.transactionHandle);
  }

  getDialect(): string {
    return this.dialect;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
