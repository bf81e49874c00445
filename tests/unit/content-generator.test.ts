import { describe, it, expect } from 'vitest';
import { ContentGenerator, FALLBACK_TITLE, isWeeklyPlanError } from '@/content/generator.js';
import { BackendError } from '@/errors.js';
import { fakeLLM } from '../fixtures/llm.js';

const models = { blog: 'blog-model', social: 'social-model' };
const topic = 'AI in healthcare';
const keywords = ['diagnosis', 'automation'];

describe('ContentGenerator.generateTitle', () => {
  it('returns the generated title without surrounding quotes or whitespace', async () => {
    const { adapter, generate } = fakeLLM('  "AI Diagnosis Tools Are Transforming Modern Healthcare"  ');
    const generator = new ContentGenerator(adapter, models);

    const title = await generator.generateTitle(topic, keywords);

    expect(title).toBe('AI Diagnosis Tools Are Transforming Modern Healthcare');
    const [prompt, options] = generate.mock.calls[0];
    expect(prompt).toContain("for the topic 'AI in healthcare'");
    expect(prompt).toContain('incorporating the keywords: diagnosis, automation.');
    expect(options).toEqual({ model: 'blog-model' });
  });

  it('falls back to the fixed title when the backend fails', async () => {
    const { adapter } = fakeLLM(new BackendError('OpenAI request failed: timeout'));
    const generator = new ContentGenerator(adapter, models);

    await expect(generator.generateTitle(topic, keywords)).resolves.toBe('Untitled Blog Post');
    expect(FALLBACK_TITLE).toBe('Untitled Blog Post');
  });

  it('falls back when the title is nothing but quotes', async () => {
    const { adapter } = fakeLLM('""');
    const generator = new ContentGenerator(adapter, models);

    await expect(generator.generateTitle(topic, keywords)).resolves.toBe(FALLBACK_TITLE);
  });
});

describe('ContentGenerator.generateBody', () => {
  it('returns the generated body', async () => {
    const { adapter, generate } = fakeLLM('<h1>Diagnosis</h1><p>Automation helps.</p>');
    const generator = new ContentGenerator(adapter, models);

    const result = await generator.generateBody('A Title', topic, keywords);

    expect(result).toEqual({ outcome: 'generated', body: '<h1>Diagnosis</h1><p>Automation helps.</p>' });
    expect(generate.mock.calls[0][0]).toContain("blog post titled 'A Title'");
  });

  it('reports a failure instead of substituting content', async () => {
    const { adapter } = fakeLLM(new BackendError('OpenAI request failed: timeout'));
    const generator = new ContentGenerator(adapter, models);

    const result = await generator.generateBody('A Title', topic, keywords);

    expect(result).toEqual({ outcome: 'failed', error: 'OpenAI request failed: timeout' });
  });
});

describe('ContentGenerator.generateWeeklyPlan', () => {
  it('returns the plan', async () => {
    const { adapter, generate } = fakeLLM('Monday: ...');
    const generator = new ContentGenerator(adapter, models);

    await expect(generator.generateWeeklyPlan('We sell bikes')).resolves.toBe('Monday: ...');
    expect(generate.mock.calls[0][0]).toContain('Business Plan: We sell bikes');
  });

  it('returns the error text when the backend fails', async () => {
    const { adapter } = fakeLLM(new Error('quota exceeded'));
    const generator = new ContentGenerator(adapter, models);

    const plan = await generator.generateWeeklyPlan('We sell bikes');

    expect(plan).toBe('Error generating weekly content plan: quota exceeded');
    expect(isWeeklyPlanError(plan)).toBe(true);
    expect(isWeeklyPlanError('Monday: ...')).toBe(false);
  });
});

describe('ContentGenerator.generateSocialDraft', () => {
  it('uses the social model at temperature 0', async () => {
    const { adapter, generate } = fakeLLM('Read our new post on AI diagnosis.');
    const generator = new ContentGenerator(adapter, models);

    await expect(generator.generateSocialDraft('LinkedIn', 'Blog Title: T')).resolves.toBe(
      'Read our new post on AI diagnosis.'
    );
    const [prompt, options] = generate.mock.calls[0];
    expect(prompt).toContain('Generate a LinkedIn post based on this content:');
    expect(prompt).toContain('Blog Title: T');
    expect(options).toEqual({ model: 'social-model', temperature: 0 });
  });

  it('throws a BackendError when the backend fails', async () => {
    const { adapter } = fakeLLM(new Error('socket hang up'));
    const generator = new ContentGenerator(adapter, models);

    const draft = generator.generateSocialDraft('X', 'Blog Title: T');

    await expect(draft).rejects.toBeInstanceOf(BackendError);
    await expect(draft).rejects.toThrow('socket hang up');
  });
});
