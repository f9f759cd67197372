/**
 * Quality Gate Routes
 *
 * - POST /api/word-count  count words of a Markdown body
 * - POST /api/jobs        start a quality gate run (202)
 * - GET  /api/jobs        list jobs, newest first
 * - GET  /api/jobs/:id    one job with its LoopResult once finished
 */

import { Router, Request, Response } from 'express';
import { countWords } from '../../document/word-counter';
import { countSections } from '../../document/sections';
import { InputValidationError, serializeError } from '../../errors/gate-error';
import { resolveGateConfig, type QualityGateConfig } from '../../config/gate-config';
import { validateDocument } from '../../models/document';
import type { JobService } from '../../jobs/job-service';
import { isRecord } from '../../utils/type-guards';

const NUMERIC_OPTIONS = ['maxIterations', 'passThreshold', 'minWordCount', 'claimShortfallThreshold'] as const;

/**
 * Pick the per-request options a client may set, validated against the
 * server's base configuration
 *
 * @throws InputValidationError
 */
export function parseRequestConfig(value: unknown, base: QualityGateConfig): Partial<QualityGateConfig> {
  if (value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw new InputValidationError('config must be an object', 'config');
  }

  const overrides: Partial<QualityGateConfig> = {};
  for (const key of NUMERIC_OPTIONS) {
    const option = value[key];
    if (option === undefined) {
      continue;
    }
    if (typeof option !== 'number') {
      throw new InputValidationError(`config.${key} must be a number`, key);
    }
    overrides[key] = option;
  }

  if (value.rubricWeights !== undefined) {
    if (!isRecord(value.rubricWeights)) {
      throw new InputValidationError('config.rubricWeights must be an object', 'rubricWeights');
    }
    const weights: Record<string, number> = {};
    for (const [category, weight] of Object.entries(value.rubricWeights)) {
      if (typeof weight !== 'number') {
        throw new InputValidationError(`config.rubricWeights.${category} must be a number`, 'rubricWeights');
      }
      weights[category] = weight;
    }
    overrides.rubricWeights = weights;
  }

  resolveGateConfig(overrides, base);
  return overrides;
}

export interface QualityGateRoutesConfig {
  jobService: JobService;
  baseConfig: QualityGateConfig;
}

export function createQualityGateRoutes(config: QualityGateRoutesConfig): Router {
  const router = Router();
  const { jobService, baseConfig } = config;

  // ===================
  // POST /api/word-count
  // ===================
  router.post('/word-count', (req: Request, res: Response) => {
    const body: unknown = isRecord(req.body) ? req.body.body : undefined;
    if (typeof body !== 'string') {
      res.status(400).json({ error: 'INVALID_INPUT', message: 'body must be a string' });
      return;
    }

    res.json({
      word_count: countWords(body),
      section_count: countSections(body),
    });
  });

  // ===================
  // POST /api/jobs
  // { document: { body, id?, title?, revisionNumber? }, config?: {...} }
  // ===================
  router.post('/jobs', (req: Request, res: Response) => {
    const payload: unknown = req.body;
    try {
      if (!isRecord(payload)) {
        throw new InputValidationError('request body must be a JSON object');
      }
      const document = validateDocument(payload.document);
      const overrides = parseRequestConfig(payload.config, baseConfig);

      const job = jobService.submit(document, { ...baseConfig, ...overrides });
      res.status(202).json(job);
    } catch (error) {
      if (error instanceof InputValidationError) {
        res.status(400).json({ error: 'INVALID_INPUT', ...serializeError(error) });
        return;
      }
      throw error;
    }
  });

  // ===================
  // GET /api/jobs
  // ===================
  router.get('/jobs', (_req: Request, res: Response) => {
    const jobs = jobService.listJobs().map(job => ({
      job_id: job.job_id,
      status: job.status,
      document_id: job.document_id,
      created_at: job.created_at,
      completed_at: job.completed_at,
      terminal_reason: job.result?.terminalReason,
    }));

    res.json({ count: jobs.length, jobs });
  });

  // ===================
  // GET /api/jobs/:id
  // ===================
  router.get('/jobs/:id', (req: Request, res: Response) => {
    const job = jobService.getJob(req.params.id);
    if (!job) {
      res.status(404).json({ error: 'NOT_FOUND', message: `Job not found: ${req.params.id}` });
      return;
    }
    res.json(job);
  });

  return router;
}
