import rateLimit from 'express-rate-limit';

// Global limiter, applied to all routes.
// Broad safety net: 100 requests per minute per IP.
export const globalLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: 100,
  standardHeaders: 'draft-7',
  legacyHeaders: false,
  message: { error: 'Too many requests, please try again later.' },
});

// Every generation route calls the text backend; a blog body or a full set of
// social drafts is several calls, so cap at 5 per minute per IP.
export const generationLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: 5,
  standardHeaders: 'draft-7',
  legacyHeaders: false,
  message: { error: 'Generation rate limit exceeded. Please wait before generating more content.' },
});

// Start/stop are cheap but should not be hammered.
export const schedulerLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: 20,
  standardHeaders: 'draft-7',
  legacyHeaders: false,
  message: { error: 'Scheduler rate limit exceeded.' },
});
