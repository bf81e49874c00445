import express from 'express';
import dotenv from 'dotenv';
import blogRouter from './routes/blog.js';
import plansRouter from './routes/plans.js';
import socialRouter from './routes/social.js';
import schedulerRouter from './routes/scheduler.js';
import { errorHandler } from './middleware/error-handler.js';
import { globalLimiter, generationLimiter, schedulerLimiter } from './middleware/rate-limit.js';
import { getScheduler } from './scheduler/index.js';
import { loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import { errorMessage } from './errors.js';

dotenv.config();

let config: AppConfig;
try {
  config = loadConfig();
} catch (error) {
  // Missing secrets are fatal
  console.error(`[Server] ${errorMessage(error)}`);
  process.exit(1);
}

const app = express();

// Global rate limiter, applied before all routes
app.use(globalLimiter);

// Middleware to parse JSON bodies
app.use(express.json({ limit: '1mb' }));

// Health check endpoint
app.get('/', (_req, res) => {
  res.json({ message: 'Content Autopilot API' });
});

// Generation routes share the stricter limiter
app.post(['/blog/title', '/blog/publish', '/plans/weekly', '/social/generate'], generationLimiter);
app.use('/blog', blogRouter);
app.use('/plans', plansRouter);
app.use('/social', socialRouter);

app.use('/scheduler', schedulerLimiter);
app.use('/scheduler', schedulerRouter);

// Global error handler (must be last)
app.use(errorHandler);

const server = app.listen(config.port, () => {
  console.log(`[Server] Listening on http://localhost:${config.port}`);
});

function shutdown(signal: string): void {
  console.log(`[Server] ${signal} received, shutting down`);

  // A scheduled run still in flight is abandoned, not drained.
  getScheduler().stop();

  server.close(() => {
    console.log('[Server] HTTP server closed');
    process.exit(0);
  });
  // Force exit if server hasn't closed within 10 seconds
  setTimeout(() => {
    console.error('[Server] Forced exit after shutdown timeout');
    process.exit(1);
  }, 10_000).unref();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT',  () => shutdown('SIGINT'));
