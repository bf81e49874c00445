import { getContentGenerator, isWeeklyPlanError } from '../content/generator.js';
import { getPublisher } from '../publishing/index.js';
import { saveBlogPost, saveWeeklyPlan } from './artifact.service.js';
import type { GeneratedPost } from '../types.js';

// Service result types; not domain types, so they live here rather than in types.ts

export interface PublishBlogInput {
  title: string;
  topic: string;
  keywords: string[];
}

export type PublishBlogResult =
  | { outcome: 'published'; post: GeneratedPost }
  | { outcome: 'generation_failed'; message: string }
  | { outcome: 'publish_failed'; post: GeneratedPost; message: string };

export async function suggestTitle(topic: string, keywords: string[]): Promise<string> {
  return getContentGenerator().generateTitle(topic, keywords);
}

// One shot, no retries: failures go straight back to the operator.
export async function generateAndPublish(input: PublishBlogInput): Promise<PublishBlogResult> {
  const bodyResult = await getContentGenerator().generateBody(input.title, input.topic, input.keywords);

  if (bodyResult.outcome === 'failed') {
    return { outcome: 'generation_failed', message: 'Failed to generate blog content.' };
  }

  const post: GeneratedPost = { title: input.title, body: bodyResult.body };
  const published = await getPublisher().publish(post.title, post.body);

  if (!published) {
    return {
      outcome: 'publish_failed',
      post,
      message: 'Failed to publish blog post. Check logs for details.',
    };
  }

  saveBlogPost(post);
  return { outcome: 'published', post };
}

export type WeeklyPlanResult =
  | { outcome: 'generated'; plan: string }
  | { outcome: 'failed'; message: string };

// The generator reports failure as display text; that text is returned to the
// operator but never replaces a cached plan.
export async function createWeeklyPlan(businessPlan: string): Promise<WeeklyPlanResult> {
  const plan = await getContentGenerator().generateWeeklyPlan(businessPlan);

  if (isWeeklyPlanError(plan)) {
    return { outcome: 'failed', message: plan };
  }

  saveWeeklyPlan(plan);
  return { outcome: 'generated', plan };
}
