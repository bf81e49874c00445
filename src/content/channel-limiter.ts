import type { Channel } from '../types.js';
import { isChannel } from '../types.js';

export const CHANNEL_LIMITS: Record<Channel, number> = {
  X: 280,
  Facebook: 2000,
  LinkedIn: 3000,
  Instagram: 2200,
  TikTok: 150,
  Youtube: 1000,
};

// Applied to channel names outside the known set
export const DEFAULT_CHANNEL_LIMIT = 2000;

const SENTENCE_ENDINGS = ['.', '!', '?'];

export function getChannelLimit(channel: string): number {
  return isChannel(channel) ? CHANNEL_LIMITS[channel] : DEFAULT_CHANNEL_LIMIT;
}

/**
 * Bounds `content` to the channel's character limit, cutting after the last
 * sentence ending inside the limit. Without a sentence ending the hard cut is
 * kept, even mid-word. Lengths are counted in code points so a cut never splits
 * an emoji.
 */
export function limitPostLength(content: string, channel: string): string {
  const maxLength = getChannelLimit(channel);
  const chars = Array.from(content);

  if (chars.length <= maxLength) {
    return content;
  }

  const truncated = chars.slice(0, maxLength).join('');
  const lastDelimiter = Math.max(...SENTENCE_ENDINGS.map(mark => truncated.lastIndexOf(mark)));

  return lastDelimiter === -1 ? truncated : truncated.slice(0, lastDelimiter + 1);
}
