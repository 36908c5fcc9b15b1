import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { appendCsv, toCsvLine } from '../src/csvUtil';

// Test directory for CSV files
const TEST_DIR = path.join(os.tmpdir(), `query-analyzer-csv-${process.pid}`);

describe('csvUtil', () => {
  beforeEach(async () => {
    await fs.rm(TEST_DIR, { recursive: true, force: true });
  });

  afterAll(async () => {
    await fs.rm(TEST_DIR, { recursive: true, force: true });
  });

  describe('toCsvLine', () => {
    it('should quote every value and double embedded quotes', () => {
      expect(toCsvLine(['a', 'say "hi"', 12])).toBe('"a","say ""hi""","12"');
    });

    it('should write undefined as an empty value', () => {
      expect(toCsvLine([undefined, 'x'])).toBe('"","x"');
    });

    it('should keep newlines inside the quotes', () => {
      expect(toCsvLine(['line one\nline two'])).toBe('"line one\nline two"');
    });
  });

  describe('appendCsv', () => {
    it('should create CSV file with headers and data', async () => {
      const testFile = path.join(TEST_DIR, 'basic.csv');

      await appendCsv(testFile, { query: 'SELECT * FROM users', executionTimeMs: '100.00' });

      const content = await fs.readFile(testFile, 'utf-8');
      expect(content).toBe('query,executionTimeMs\n"SELECT * FROM users","100.00"\n');
    });

    it('should append without repeating the header', async () => {
      const testFile = path.join(TEST_DIR, 'append.csv');

      await appendCsv(testFile, { query: 'SELECT 1' });
      await appendCsv(testFile, { query: 'SELECT 2' });

      const content = await fs.readFile(testFile, 'utf-8');
      expect(content.split('\n')).toEqual(['query', '"SELECT 1"', '"SELECT 2"', '']);
    });

    it('should create nested directories', async () => {
      const testFile = path.join(TEST_DIR, 'nested', 'deeper', 'report.csv');

      await appendCsv(testFile, { query: 'SELECT 1' });

      await expect(fs.access(testFile)).resolves.toBeUndefined();
    });
  });
});
