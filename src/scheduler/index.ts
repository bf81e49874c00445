import { ScheduledJobController } from './controller.js';
import { getContentGenerator } from '../content/generator.js';
import { getPublisher } from '../publishing/index.js';
import { runHistory } from '../services/run-history.service.js';
import { getConfig } from '../config.js';

let scheduler: ScheduledJobController | null = null;

// One controller per process; every route and the shutdown hook share it.
export function getScheduler(): ScheduledJobController {
  if (!scheduler) {
    scheduler = new ScheduledJobController(
      {
        generator: getContentGenerator(),
        publisher: getPublisher(),
        history: runHistory,
      },
      { intervalMs: getConfig().schedulerIntervalMs }
    );
  }
  return scheduler;
}

export * from './controller.js';
