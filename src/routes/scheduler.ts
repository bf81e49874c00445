import { Router } from 'express';
import type { Request, Response } from 'express';
import { validate, jobSpecSchema } from '../middleware/validation.js';
import type { JobSpecInput } from '../middleware/validation.js';
import { getScheduler } from '../scheduler/index.js';
import { runHistory } from '../services/run-history.service.js';

const router = Router();

const START_MESSAGES = {
  started: 'Scheduled posting started!',
  already_running: 'Scheduled posting is already running; the new topic applies from the next run.',
  restart_queued: 'Scheduled posting is stopping; it will restart with the new topic.',
} as const;

// GET /scheduler
router.get('/', (_req: Request, res: Response) => {
  res.json(getScheduler().getStatus());
});

// POST /scheduler/start
router.post('/start', validate(jobSpecSchema), (req: Request, res: Response) => {
  const spec: JobSpecInput = req.body;
  const scheduler = getScheduler();

  const result = scheduler.start(spec);

  res.status(202).json({
    result,
    message: START_MESSAGES[result],
    status: scheduler.getStatus(),
  });
});

// POST /scheduler/stop
router.post('/stop', (_req: Request, res: Response) => {
  const scheduler = getScheduler();
  const stopped = scheduler.stop();

  res.json({
    stopped,
    message: stopped ? 'Scheduled posting stopped.' : 'Scheduled posting was not running.',
    status: scheduler.getStatus(),
  });
});

// GET /scheduler/runs
router.get('/runs', (req: Request, res: Response) => {
  const limit = Math.min(Math.max(Number(req.query.limit) || 20, 1), 100);
  res.json({ runs: runHistory.listRecent(limit) });
});

export default router;
