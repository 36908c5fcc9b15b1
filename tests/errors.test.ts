import {
  AnalyzerError,
  CsvError,
  PlanCaptureError,
  PlanCaptureTimeoutError,
  QueueProcessingError,
  ReportDeliveryError,
  ReportingError,
  TrackingError,
  toError,
} from '../src/errors';

describe('Error Classes', () => {
  describe('AnalyzerError', () => {
    it('should create error with all properties', () => {
      const originalError = new Error('Original error');
      const error = new AnalyzerError(
        'Test error',
        'TEST_CODE',
        'SELECT * FROM users',
        originalError
      );

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(AnalyzerError);
      expect(error.name).toBe('AnalyzerError');
      expect(error.message).toBe('Test error');
      expect(error.code).toBe('TEST_CODE');
      expect(error.query).toBe('SELECT * FROM users');
      expect(error.originalError).toBe(originalError);
      expect(error.timestamp).toBeInstanceOf(Date);
    });

    it('should generate formatted error message', () => {
      const error = new AnalyzerError('Test error', 'TEST_CODE', 'SELECT * FROM users');

      expect(error.getFormattedMessage()).toBe(
        `[TEST_CODE] Test error\n\tQuery: SELECT * FROM users\n\tTime: ${error.timestamp.toISOString()}`
      );
    });

    it('should include the cause in the formatted message', () => {
      const error = new AnalyzerError('Test error', 'TEST_CODE', 'SELECT 1', new Error('socket hang up'));

      expect(error.getFormattedMessage()).toBe(
        `[TEST_CODE] Test error\n\tQuery: SELECT 1\n\tCause: socket hang up\n\tTime: ${error.timestamp.toISOString()}`
      );
    });

    it('should convert to JSON', () => {
      const error = new AnalyzerError('Test error', 'TEST_CODE', 'SELECT 1', new Error('Original'));

      const json = error.toJSON();

      expect(json.name).toBe('AnalyzerError');
      expect(json.code).toBe('TEST_CODE');
      expect(json.message).toBe('Test error');
      expect(json.query).toBe('SELECT 1');
      expect(json.timestamp).toBe(error.timestamp.toISOString());
      expect(json.originalError).toBe('Original');
      expect(json.stack).toBeDefined();
    });

    it('should handle missing original error', () => {
      const error = new AnalyzerError('Test error', 'TEST_CODE', 'SELECT 1');

      expect(error.originalError).toBeUndefined();
      expect(error.toJSON().originalError).toBeUndefined();
    });
  });

  describe('TrackingError', () => {
    it('should create TrackingError with correct properties', () => {
      const originalError = new Error('clock failed');
      const error = new TrackingError('SELECT 1', originalError);

      expect(error).toBeInstanceOf(AnalyzerError);
      expect(error.name).toBe('TrackingError');
      expect(error.code).toBe('TRACKING_FAILED');
      expect(error.message).toBe('Failed to track query execution');
      expect(error.originalError).toBe(originalError);
    });
  });

  describe('PlanCaptureError', () => {
    it('should carry the failing stage', () => {
      const error = new PlanCaptureError('SELECT * FROM orders', 'disable', new Error('connection reset'));

      expect(error).toBeInstanceOf(AnalyzerError);
      expect(error.name).toBe('PlanCaptureError');
      expect(error.code).toBe('PLAN_CAPTURE_FAILED');
      expect(error.stage).toBe('disable');
      expect(error.message).toBe('Failed to capture execution plan (disable)');
    });
  });

  describe('PlanCaptureTimeoutError', () => {
    it('should carry the timeout', () => {
      const error = new PlanCaptureTimeoutError('SELECT 1', 30000);

      expect(error.name).toBe('PlanCaptureTimeoutError');
      expect(error.code).toBe('PLAN_CAPTURE_TIMEOUT');
      expect(error.timeoutMs).toBe(30000);
      expect(error.message).toBe('Execution plan capture timed out after 30000ms');
    });
  });

  describe('ReportingError', () => {
    it('should name the failing sink', () => {
      const error = new ReportingError('SELECT 1', 'http', new Error('ECONNREFUSED'));

      expect(error.name).toBe('ReportingError');
      expect(error.code).toBe('REPORTING_FAILED');
      expect(error.sink).toBe('http');
      expect(error.message).toBe('Reporting sink http failed');
    });
  });

  describe('ReportDeliveryError', () => {
    it('should carry status and response body', () => {
      const error = new ReportDeliveryError('SELECT 1', 503, 'unavailable');

      expect(error.name).toBe('ReportDeliveryError');
      expect(error.code).toBe('REPORT_DELIVERY_FAILED');
      expect(error.status).toBe(503);
      expect(error.responseBody).toBe('unavailable');
      expect(error.message).toBe('Report endpoint answered with status 503');
    });
  });

  describe('QueueProcessingError', () => {
    it('should create QueueProcessingError with correct properties', () => {
      const error = new QueueProcessingError('SELECT 1');

      expect(error.name).toBe('QueueProcessingError');
      expect(error.code).toBe('QUEUE_PROCESSING_FAILED');
      expect(error.message).toBe('Failed to process queued query analysis');
    });
  });

  describe('CsvError', () => {
    it('should create CsvError with correct properties', () => {
      const originalError = new Error('Disk full');
      const error = new CsvError('SELECT * FROM users', originalError);

      expect(error).toBeInstanceOf(AnalyzerError);
      expect(error.name).toBe('CsvError');
      expect(error.code).toBe('CSV_WRITE_FAILED');
      expect(error.message).toBe('Failed to log query analysis to CSV');
      expect(error.query).toBe('SELECT * FROM users');
    });
  });

  describe('toError', () => {
    it('should keep Error instances', () => {
      const original = new TypeError('bad');
      expect(toError(original)).toBe(original);
    });

    it('should wrap thrown non-errors', () => {
      const error = toError('plain string');
      expect(error).toBeInstanceOf(Error);
      expect(error.message).toBe('plain string');
    });
  });

  describe('Error Stack Traces', () => {
    it('should capture stack trace', () => {
      const error = new AnalyzerError('Test', 'CODE', 'SELECT 1');

      expect(error.stack).toBeDefined();
      expect(error.stack).toContain('AnalyzerError');
    });
  });
});
