import { getContentGenerator } from '../content/generator.js';
import type { ContentGenerator } from '../content/generator.js';
import { getChannelLimit, limitPostLength } from '../content/channel-limiter.js';
import { DEFAULT_SOCIAL_RETRY_POLICY, withRetry } from '../content/retry.js';
import type { RetryPolicy } from '../content/retry.js';
import { socialSourceText } from '../content/prompts.js';
import { replaceSocialPosts } from './artifact.service.js';
import { errorMessage } from '../errors.js';
import type { ChannelPost } from '../types.js';

export const CHANNEL_ERROR_PREFIX = 'Error generating content: ';

export type DraftSource = Pick<ContentGenerator, 'generateSocialDraft'>;

export interface GenerateSocialPostsInput {
  title: string;
  topic: string;
  keywords: string[];
  channels: string[];
}

export function isChannelError(content: string): boolean {
  return content.startsWith(CHANNEL_ERROR_PREFIX);
}

/**
 * Drafts one post per channel. Channels run one after another, each with its
 * own retry budget; a channel that exhausts it gets an error string instead of
 * content, so the result always has exactly one entry per requested channel.
 */
export async function generateForChannels(
  generator: DraftSource,
  mainContent: string,
  channels: Iterable<string>,
  policy: RetryPolicy = DEFAULT_SOCIAL_RETRY_POLICY
): Promise<Map<string, string>> {
  // Keyed by whatever name the caller passed, in request order
  const results = new Map<string, string>();

  for (const channel of new Set(channels)) {
    try {
      const draft = await withRetry(
        () => generator.generateSocialDraft(channel, mainContent),
        policy,
        (attempt, error) => {
          console.warn(`[Social] ${channel} attempt ${attempt} failed: ${errorMessage(error)}, retrying`);
        }
      );
      results.set(channel, limitPostLength(draft.trim(), channel));
      console.log(`[Social] Generated ${channel} post`);
    } catch (error) {
      console.error(`[Social] Giving up on ${channel}: ${errorMessage(error)}`);
      results.set(channel, limitPostLength(`${CHANNEL_ERROR_PREFIX}${errorMessage(error)}`, channel));
    }
  }

  return results;
}

export async function generateSocialPosts(
  input: GenerateSocialPostsInput,
  policy: RetryPolicy = DEFAULT_SOCIAL_RETRY_POLICY
): Promise<ChannelPost[]> {
  const mainContent = socialSourceText(input.title, input.topic, input.keywords);
  const drafts = await generateForChannels(getContentGenerator(), mainContent, input.channels, policy);

  const posts: ChannelPost[] = [...drafts].map(([channel, content]) => ({
    channel,
    content,
    limit: getChannelLimit(channel),
    failed: isChannelError(content),
  }));

  replaceSocialPosts(posts);
  return posts;
}
