import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { validate, weeklyPlanSchema } from '../middleware/validation.js';
import type { WeeklyPlanBody } from '../middleware/validation.js';
import { createWeeklyPlan } from '../services/blog.service.js';
import { getWeeklyPlan } from '../services/artifact.service.js';
import { sendTextDownload } from './download.js';

const router = Router();

// POST /plans/weekly
router.post('/weekly', validate(weeklyPlanSchema), async (req: Request, res: Response, next: NextFunction) => {
  const { business_plan }: WeeklyPlanBody = req.body;

  try {
    const result = await createWeeklyPlan(business_plan);

    if (result.outcome === 'failed') {
      return res.status(502).json({ error: result.message });
    }
    res.status(201).json({ plan: result.plan });
  } catch (error) {
    next(error);
  }
});

// GET /plans/weekly
router.get('/weekly', (_req: Request, res: Response) => {
  const cached = getWeeklyPlan();

  if (!cached) {
    return res.status(404).json({ error: 'No weekly content plan has been generated yet' });
  }
  res.json(cached);
});

// GET /plans/weekly/download
router.get('/weekly/download', (_req: Request, res: Response) => {
  const cached = getWeeklyPlan();

  if (!cached) {
    return res.status(404).json({ error: 'No weekly content plan has been generated yet' });
  }
  sendTextDownload(res, 'weekly_content_plan.txt', cached.plan);
});

export default router;
