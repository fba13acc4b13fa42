/**
 * Tests for aggregator module
 */

import { createRunContext, recordOutcome, recordPass } from './aggregator';

describe('aggregator', () => {
  describe('createRunContext', () => {
    it('should start with empty tables and zero counters', () => {
      const context = createRunContext();

      expect(context.counters.processed).toBe(0);
      expect(context.counters.passed).toBe(0);
      expect(context.counters.failed).toBe(0);
      expect(Object.values(context.counters.rejections).every(count => count === 0)).toBe(true);
      expect(context.clients.size).toBe(0);
      expect(context.paths.size).toBe(0);
    });

    it('should give each run its own state', () => {
      const first = createRunContext();
      const second = createRunContext();

      recordPass(first, '10.0.0.1', '/', 10);
      first.counters.rejections['size-invalid']++;

      expect(second.clients.size).toBe(0);
      expect(second.counters.rejections['size-invalid']).toBe(0);
    });
  });

  describe('recordPass', () => {
    it('should count every hit from the same client', () => {
      const context = createRunContext();
      for (let i = 0; i < 5; i++) {
        recordPass(context, '10.0.0.1', `/page/${i}`, 100);
      }

      expect(context.clients.get('10.0.0.1')).toBe(5);
    });

    it('should track hit count and byte total per path', () => {
      const context = createRunContext();
      recordPass(context, '10.0.0.1', '/a', 1024);
      recordPass(context, '10.0.0.2', '/a', 3072);
      recordPass(context, '10.0.0.2', '/b', 0);

      expect(context.paths.get('/a')).toEqual({ count: 2, totalSize: 4096 });
      expect(context.paths.get('/b')).toEqual({ count: 1, totalSize: 0 });
      expect(context.clients.get('10.0.0.2')).toBe(2);
    });
  });

  describe('recordOutcome', () => {
    it('should keep processed equal to passed plus failed', () => {
      const context = createRunContext();
      recordOutcome(context, { passed: true, line: { address: '10.0.0.1', path: '/', size: 1 } });
      recordOutcome(context, { passed: false, reason: 'status-invalid', message: 'bad status' });
      recordOutcome(context, { passed: false, reason: 'status-invalid', message: 'bad status' });
      recordOutcome(context, { passed: false, reason: 'field-count', message: 'short line' });

      expect(context.counters.processed).toBe(4);
      expect(context.counters.passed).toBe(1);
      expect(context.counters.failed).toBe(3);
      expect(context.counters.rejections['status-invalid']).toBe(2);
      expect(context.counters.rejections['field-count']).toBe(1);
    });

    it('should not touch the client and path tables', () => {
      const context = createRunContext();
      recordOutcome(context, { passed: true, line: { address: '10.0.0.1', path: '/', size: 1 } });

      expect(context.clients.size).toBe(0);
      expect(context.paths.size).toBe(0);
    });
  });
});
