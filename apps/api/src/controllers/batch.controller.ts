import express, { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { ParseError } from '@simval/domain';
import type {
  BatchIndexingPort,
  RunEvaluationPort,
  RunStorePort,
  RunSummary,
  StoredRun,
} from '@simval/domain';

const ZIP_CONTENT_TYPES = [
  'application/zip',
  'application/x-zip-compressed',
  'application/octet-stream',
];

const evaluateBodySchema = z.object({
  testCaseId: z.string().min(1),
  runId: z.string().min(1),
});

function toRunSummary(run: StoredRun): RunSummary {
  return { id: run.runId, hasActors: run.actorBytes !== null, validation: run.validation };
}

export interface BatchRouterDeps {
  store: RunStorePort;
  indexer: BatchIndexingPort;
  evaluator: RunEvaluationPort;
  uploadLimitMb: number;
}

export function createBatchRouter({ store, indexer, evaluator, uploadLimitMb }: BatchRouterDeps): Router {
  const batchRouter = Router();

  /** POST /api/batch/upload — raw ZIP body; replaces every stored run */
  batchRouter.post(
    '/upload',
    express.raw({ type: ZIP_CONTENT_TYPES, limit: `${uploadLimitMb}mb` }),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const body: unknown = req.body;
        if (!Buffer.isBuffer(body) || body.length === 0) {
          return res.status(400).json({ error: 'request body must be a ZIP archive' });
        }
        const summary = await indexer.upload(body);
        return res.json(summary);
      } catch (err) {
        if (err instanceof ParseError) return res.status(400).json({ error: err.message });
        return next(err);
      }
    },
  );

  /** DELETE /api/batch/clear */
  batchRouter.delete('/clear', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      await store.clear();
      res.json({ cleared: true });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/batch/test-cases */
  batchRouter.get('/test-cases', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ testCases: await store.listTestCases() });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/batch/runs/:testCaseId — run ids with their upload-time validation */
  batchRouter.get('/runs/:testCaseId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const testCaseId = req.params['testCaseId'] ?? '';
      const runs = await store.listRuns(testCaseId);
      if (!runs) return res.status(404).json({ error: `Test case '${testCaseId}' not found` });
      return res.json({ runs: runs.map(toRunSummary) });
    } catch (err) {
      return next(err);
    }
  });

  /** POST /api/batch/evaluate — validation plus trajectories of one stored run */
  batchRouter.post('/evaluate', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { testCaseId, runId } = evaluateBodySchema.parse(req.body);
      const run = await store.findRun(testCaseId, runId);
      if (!run && !(await store.listRuns(testCaseId))) {
        return res.status(404).json({ error: `Test case '${testCaseId}' not found` });
      }
      if (!run) {
        return res
          .status(404)
          .json({ error: `Run '${runId}' not found in test case '${testCaseId}'` });
      }

      const result = await evaluator.evaluate({
        vehicleBytes: run.vehicleBytes,
        actorBytes: run.actorBytes,
        testCaseId,
        runId,
      });
      return res.json(result);
    } catch (err) {
      return next(err);
    }
  });

  return batchRouter;
}
