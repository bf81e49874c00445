import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { ZodSchema } from 'zod';
import { ValidationError } from '../errors.js';
import { CHANNELS } from '../types.js';

// Parses req.body and replaces it with the parsed value, so route handlers see
// trimmed and normalised input.
export function validate(schema: ZodSchema) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body ?? {});

    if (!result.success) {
      next(new ValidationError(
        result.error.issues.map(issue => ({
          path: issue.path.join('.'),
          message: issue.message,
        }))
      ));
      return;
    }

    req.body = result.data;
    next();
  };
}

// Accepts ["a", "b"] or "a, b"; blank entries are dropped.
const keywordsField = z
  .union([z.string(), z.array(z.string())], {
    errorMap: () => ({ message: 'Keywords must be a list or a comma-separated string' }),
  })
  .transform(value => (Array.isArray(value) ? value : value.split(',')))
  .transform(values => values.map(word => word.trim()).filter(word => word.length > 0))
  .pipe(z.array(z.string()).min(1, 'At least one keyword is required'));

const topicField = z.string({ required_error: 'Topic is required' }).trim().min(1, 'Topic is required').max(500);

const titleField = z.string({ required_error: 'Title is required' }).trim().min(1, 'Title is required').max(500);

export const jobSpecSchema = z.object({
  topic: topicField,
  keywords: keywordsField,
});

export const suggestTitleSchema = jobSpecSchema;

export const publishBlogSchema = z.object({
  title: titleField,
  topic: topicField,
  keywords: keywordsField,
});

export const socialPostsSchema = z.object({
  title: titleField,
  topic: topicField,
  keywords: keywordsField,
  channels: z
    .array(z.enum(CHANNELS))
    .min(1, 'Select at least one social media channel')
    .default(['Facebook', 'X']),
});

export const weeklyPlanSchema = z.object({
  business_plan: z
    .string({ required_error: 'Business plan is required' })
    .trim()
    .min(1, 'Please enter a valid business plan')
    .max(20_000, 'Business plan must be less than 20000 characters'),
});

export type JobSpecInput = z.infer<typeof jobSpecSchema>;
export type PublishBlogBody = z.infer<typeof publishBlogSchema>;
export type SocialPostsBody = z.infer<typeof socialPostsSchema>;
export type WeeklyPlanBody = z.infer<typeof weeklyPlanSchema>;
