import { AnalyzerLogger } from '../src/logger';
import { Clock, SlowQueryReport } from '../src/types';

export interface MockLogger extends AnalyzerLogger {
  debug: jest.Mock;
  info: jest.Mock;
  warn: jest.Mock;
  error: jest.Mock;
}

export function createMockLogger(): MockLogger {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

/**
 * Clock under test control; both readings only move when advanced
 */
export class FakeClock implements Clock {
  constructor(
    private wall: number = Date.UTC(2024, 0, 15, 10, 30, 0),
    private mark: number = 1000
  ) {}

  now(): number {
    return this.wall;
  }

  monotonic(): number {
    return this.mark;
  }

  advance(ms: number): void {
    this.wall += ms;
    this.mark += ms;
  }
}

export function createReport(overrides: Partial<SlowQueryReport> = {}): SlowQueryReport {
  return {
    queryId: 'query-1',
    rawQuery: 'SELECT * FROM users WHERE id = @id',
    parameters: { '@id': 42 },
    executionTimeMs: 1500,
    timestamp: Date.UTC(2024, 0, 15, 10, 30, 0),
    contextType: 'Sequelize',
    environment: 'development',
    ...overrides,
  };
}
