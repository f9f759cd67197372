import { describe, it, beforeEach } from 'mocha';
import { strict as assert } from 'assert';
import { GateLogger, getGateLogger, resetGateLogger, type GateLogEntry } from '../../../src/logging';

describe('GateLogger', () => {
  let logger: GateLogger;

  beforeEach(() => {
    logger = new GateLogger({ maxEntries: 5 });
  });

  it('should record structured entries', () => {
    const entry = logger.log('info', 'JOB', 'Created job', { documentId: 'doc-1', jobId: 'job-1' });
    assert.equal(entry.level, 'info');
    assert.equal(entry.category, 'JOB');
    assert.equal(entry.documentId, 'doc-1');
    assert.equal(entry.jobId, 'job-1');
    assert.deepEqual(logger.getRecent(), [entry]);
  });

  it('should keep only the newest maxEntries entries', () => {
    for (let i = 0; i < 7; i++) {
      logger.info('CONFIG', `entry ${i}`);
    }
    assert.deepEqual(logger.getRecent().map(e => e.message), ['entry 2', 'entry 3', 'entry 4', 'entry 5', 'entry 6']);
  });

  it('should filter by minimum level, category and document', () => {
    logger.debug('EVALUATION', 'debug');
    logger.warn('RETRY', 'warn');
    logger.error('ERROR', 'error');
    logger.log('info', 'EVALUATION', 'scoped', { documentId: 'doc-2' });

    assert.deepEqual(logger.getEntries({ level: 'warn' }).map(e => e.message), ['warn', 'error']);
    assert.deepEqual(logger.getEntries({ category: 'EVALUATION' }).map(e => e.message), ['debug', 'scoped']);
    assert.deepEqual(logger.getEntries({ documentId: 'doc-2' }).map(e => e.message), ['scoped']);
  });

  it('should phrase evaluation, routing and retry decisions', () => {
    assert.equal(
      logger.logEvaluation('doc-1', 2, 8.4, false, 3).message,
      'Revision 2 scored 8.4/10 (FAIL, 3 issue(s))'
    );
    assert.equal(logger.logRouting('doc-1', 'REVISE', 1, 3).message, 'Route: REVISE (1/3 revisions used)');
    assert.equal(
      logger.logRetry('verifier', 1, 1000, 'socket hang up').message,
      'RETRY verifier after attempt 1 in 1000ms: socket hang up'
    );
  });

  it('should log failed evaluations as warnings', () => {
    assert.equal(logger.logEvaluation('doc-1', 0, 4, false, 1).level, 'warn');
    assert.equal(logger.logEvaluation('doc-1', 1, 9.5, true, 0).level, 'info');
  });

  it('should capture the message of a logged error', () => {
    const entry = logger.logError('Run failed', new Error('boom'), { jobId: 'job-9' });
    assert.equal(entry.category, 'ERROR');
    assert.equal(entry.details?.error, 'boom');
    assert.equal(entry.jobId, 'job-9');
  });

  it('should stream entries to subscribers until they unsubscribe', () => {
    const seen: GateLogEntry[] = [];
    const unsubscribe = logger.subscribe({ onLog: entry => seen.push(entry) });

    logger.info('JOB', 'first');
    unsubscribe();
    logger.info('JOB', 'second');

    assert.deepEqual(seen.map(e => e.message), ['first']);
  });

  it('should clear entries', () => {
    logger.info('JOB', 'x');
    logger.clear();
    assert.equal(logger.getRecent().length, 0);
  });

  it('should share one instance until reset', () => {
    const shared = getGateLogger();
    assert.equal(getGateLogger(), shared);
    resetGateLogger();
    assert.notEqual(getGateLogger(), shared);
    resetGateLogger();
  });
});
