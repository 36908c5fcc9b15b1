import { Sequelize, Transaction } from 'sequelize';
import { enableAnalyzer } from '../src/analyzer';
import { ReportingError } from '../src/errors';
import { InMemoryReportingSink, ReportingSink } from '../src/reportingSink';
import { AnalyzerOptions } from '../src/types';
import { MockSequelize } from './mockSequelize';
import { createMockLogger } from './support';

jest.mock('sequelize', () => ({
  QueryTypes: { SELECT: 'SELECT' },
  Sequelize: jest.fn().mockImplementation(() => ({})),
  Transaction: jest.fn(),
}));

describe('enableAnalyzer', () => {
  let sequelize: MockSequelize;
  let memory: InMemoryReportingSink;
  let logger: ReturnType<typeof createMockLogger>;

  function analyzerOptions(overrides: AnalyzerOptions = {}): AnalyzerOptions {
    return {
      thresholdMs: 0,
      environment: 'development',
      captureStackTrace: false,
      sinks: [memory],
      logger,
      ...overrides,
    };
  }

  beforeEach(() => {
    sequelize = new MockSequelize(new Transaction(new Sequelize(), {}));
    memory = new InMemoryReportingSink();
    logger = createMockLogger();
  });

  describe('Query Interception', () => {
    it('should report slow queries once the analyzer stops', async () => {
      const analyzer = enableAnalyzer(sequelize, analyzerOptions());

      await sequelize.query('SELECT * FROM users WHERE id = ?', { replacements: [3] });
      await analyzer.stop();

      const reports = memory.getReports();
      expect(reports).toHaveLength(1);
      expect(reports[0].rawQuery).toBe('SELECT * FROM users WHERE id = ?');
      expect(reports[0].parameters).toEqual({ '?1': 3 });
      expect(reports[0].environment).toBe('development');
      expect(reports[0].executionPlan).toBeUndefined();
      expect(logger.info).toHaveBeenCalledWith('Query analyzer enabled (threshold: 0ms, environment: development)');
    });

    it('should return query results unchanged', async () => {
      const analyzer = enableAnalyzer(sequelize, analyzerOptions());

      await expect(sequelize.query('SELECT * FROM users')).resolves.toEqual([[{ id: 1, name: 'test' }], 1]);
      await analyzer.stop();
    });

    it('should not report fast queries', async () => {
      const analyzer = enableAnalyzer(sequelize, analyzerOptions({ thresholdMs: 60_000 }));

      await sequelize.query('SELECT 1');
      await analyzer.stop();

      expect(memory.getReports()).toEqual([]);
    });

    it('should pass queries straight through when disabled', async () => {
      const analyzer = enableAnalyzer(sequelize, analyzerOptions({ enabled: false }));

      await sequelize.query('SELECT 1');

      expect(sequelize.executed).toHaveLength(1);
      expect(analyzer.worker.isRunning).toBe(false);
      await analyzer.stop();
      expect(memory.getReports()).toEqual([]);
    });

    it('should unwrap the instance on stop', async () => {
      const originalQuery = sequelize.query;
      const analyzer = enableAnalyzer(sequelize, analyzerOptions());

      await analyzer.stop();

      expect(sequelize.query).toBe(originalQuery);
    });
  });

  describe('Execution plans', () => {
    it('should attach the plan captured on the query connection', async () => {
      sequelize.respond = text =>
        text.startsWith('EXPLAIN') ? [{ 'QUERY PLAN': [{ Plan: { 'Node Type': 'Index Scan' } }] }] : [[], 0];
      const analyzer = enableAnalyzer(sequelize, analyzerOptions({ captureExecutionPlan: true }));

      await sequelize.query('SELECT * FROM users WHERE id = :id', { replacements: { id: 3 } });
      await analyzer.stop();

      const [report] = memory.getReports();
      expect(report.executionPlan).toEqual({
        databaseProvider: 'PostgreSQL',
        planFormat: 'json',
        content: JSON.stringify([{ Plan: { 'Node Type': 'Index Scan' } }], null, 2),
      });
      expect(sequelize.executed.map(query => query.sql)).toEqual([
        'SELECT * FROM users WHERE id = :id',
        'SET LOCAL statement_timeout = 30000',
        'EXPLAIN (FORMAT JSON) SELECT * FROM users WHERE id = 3',
      ]);
    });

    it('should still report when plan capture fails', async () => {
      sequelize.respond = text => {
        if (text.startsWith('EXPLAIN')) throw new Error('permission denied for table users');
        return [[], 0];
      };
      const onError = jest.fn();
      const analyzer = enableAnalyzer(sequelize, analyzerOptions({ captureExecutionPlan: true, onError }));

      await sequelize.query('SELECT * FROM users');
      await analyzer.stop();

      expect(memory.getReports()).toHaveLength(1);
      expect(memory.getReports()[0].executionPlan).toBeUndefined();
      expect(onError.mock.calls[0][0].code).toBe('PLAN_CAPTURE_FAILED');
    });
  });

  describe('Reporting', () => {
    let fetchSpy: jest.SpyInstance;

    beforeEach(() => {
      fetchSpy = jest.spyOn(global, 'fetch').mockResolvedValue(new Response('ok', { status: 201 }));
    });

    afterEach(() => {
      fetchSpy.mockRestore();
    });

    it('should post to the configured endpoint', async () => {
      const analyzer = enableAnalyzer(
        sequelize,
        analyzerOptions({ apiEndpoint: 'https://reports.example.test/slow', apiKey: 'test-secret' })
      );

      await sequelize.query('SELECT 1');
      await analyzer.stop();

      expect(fetchSpy).toHaveBeenCalledTimes(1);
      expect(fetchSpy.mock.calls[0][0]).toBe('https://reports.example.test/slow');
      expect(memory.getReports()).toHaveLength(1);
    });

    it('should keep other sinks going when one fails', async () => {
      const failing: ReportingSink = {
        name: 'flaky',
        report: async () => {
          throw new Error('sink offline');
        },
      };
      const onError = jest.fn();
      const analyzer = enableAnalyzer(sequelize, analyzerOptions({ sinks: [failing, memory], onError }));

      await sequelize.query('SELECT 1');
      await analyzer.stop();

      expect(memory.getReports()).toHaveLength(1);
      expect(onError.mock.calls[0][0]).toBeInstanceOf(ReportingError);
    });

    it('should fall back to an in-memory sink', async () => {
      const analyzer = enableAnalyzer(sequelize, analyzerOptions({ sinks: [] }));

      await sequelize.query('SELECT 1');
      await analyzer.stop();

      expect(analyzer.worker.processedCount).toBe(1);
      expect(fetchSpy).not.toHaveBeenCalled();
    });
  });
});
