import { getLLMAdapter } from '../llm/index.js';
import type { LLMAdapter } from '../llm/adapter.js';
import { getConfig } from '../config.js';
import { BackendError, errorMessage } from '../errors.js';
import { blogBodyPrompt, blogTitlePrompt, socialDraftPrompt, weeklyPlanPrompt } from './prompts.js';

export const FALLBACK_TITLE = 'Untitled Blog Post';
export const WEEKLY_PLAN_ERROR_PREFIX = 'Error generating weekly content plan: ';

export type BodyResult =
  | { outcome: 'generated'; body: string }
  | { outcome: 'failed'; error: string };

export interface GeneratorModels {
  blog: string;
  social: string;
}

/**
 * Each operation keeps its own failure policy:
 * - title: falls back to FALLBACK_TITLE
 * - body: returns a 'failed' result that callers must not publish
 * - weekly plan: returns the error text for display
 * - social draft: throws, the caller owns the retries
 */
export class ContentGenerator {
  constructor(
    private readonly llm: LLMAdapter,
    private readonly models: GeneratorModels
  ) {}

  async generateTitle(topic: string, keywords: string[]): Promise<string> {
    try {
      const response = await this.llm.generate(blogTitlePrompt(topic, keywords), { model: this.models.blog });
      const title = response.content.trim().replace(/^"+|"+$/g, '').trim();

      if (!title) {
        console.error('[Content] Blog title came back empty, using fallback');
        return FALLBACK_TITLE;
      }

      console.log(`[Content] Generated blog title: ${title}`);
      return title;
    } catch (error) {
      console.error(`[Content] Failed to generate blog title: ${errorMessage(error)}`);
      return FALLBACK_TITLE;
    }
  }

  async generateBody(title: string, topic: string, keywords: string[]): Promise<BodyResult> {
    try {
      const response = await this.llm.generate(blogBodyPrompt(title, topic, keywords), { model: this.models.blog });
      console.log(`[Content] Generated blog content for title: ${title}`);
      return { outcome: 'generated', body: response.content };
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[Content] Failed to generate blog content: ${message}`);
      return { outcome: 'failed', error: message };
    }
  }

  async generateWeeklyPlan(businessPlan: string): Promise<string> {
    try {
      const response = await this.llm.generate(weeklyPlanPrompt(businessPlan), { model: this.models.blog });
      console.log('[Content] Generated weekly content plan');
      return response.content;
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[Content] Failed to generate weekly content plan: ${message}`);
      return `${WEEKLY_PLAN_ERROR_PREFIX}${message}`;
    }
  }

  async generateSocialDraft(channel: string, mainContent: string): Promise<string> {
    try {
      const response = await this.llm.generate(socialDraftPrompt(channel, mainContent), {
        model: this.models.social,
        temperature: 0,
      });
      return response.content;
    } catch (error) {
      if (error instanceof BackendError) throw error;
      throw new BackendError(errorMessage(error));
    }
  }
}

export function isWeeklyPlanError(plan: string): boolean {
  return plan.startsWith(WEEKLY_PLAN_ERROR_PREFIX);
}

let generator: ContentGenerator | null = null;

export function getContentGenerator(): ContentGenerator {
  if (!generator) {
    const config = getConfig();
    generator = new ContentGenerator(getLLMAdapter(), {
      blog: config.llm.blogModel,
      social: config.llm.socialModel,
    });
  }
  return generator;
}
