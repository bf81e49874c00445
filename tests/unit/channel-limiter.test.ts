import { describe, it, expect } from 'vitest';
import {
  CHANNEL_LIMITS,
  DEFAULT_CHANNEL_LIMIT,
  getChannelLimit,
  limitPostLength,
} from '@/content/channel-limiter.js';
import { CHANNELS } from '@/types.js';

const samples = [
  '',
  'Short post.',
  'No punctuation at all '.repeat(40),
  'First sentence. Second one! Third? '.repeat(120),
  'Ends without a stop. ' + 'x'.repeat(4000),
];

describe('getChannelLimit', () => {
  it('returns the fixed limit for every known channel', () => {
    expect(getChannelLimit('X')).toBe(280);
    expect(getChannelLimit('Facebook')).toBe(2000);
    expect(getChannelLimit('LinkedIn')).toBe(3000);
    expect(getChannelLimit('Instagram')).toBe(2200);
    expect(getChannelLimit('TikTok')).toBe(150);
    expect(getChannelLimit('Youtube')).toBe(1000);
  });

  it('falls back to the default for an unknown channel', () => {
    expect(getChannelLimit('Mastodon')).toBe(DEFAULT_CHANNEL_LIMIT);
    expect(DEFAULT_CHANNEL_LIMIT).toBe(2000);
  });
});

describe('limitPostLength', () => {
  it('returns content within the limit unchanged', () => {
    expect(limitPostLength('Short post.', 'X')).toBe('Short post.');
  });

  it('returns content exactly at the limit unchanged', () => {
    const content = 'a'.repeat(280);
    expect(limitPostLength(content, 'X')).toBe(content);
  });

  it('hard-cuts content without sentence punctuation', () => {
    const content = 'a'.repeat(400);
    const result = limitPostLength(content, 'TikTok');
    expect(result).toBe('a'.repeat(150));
  });

  it('cuts after the last full stop inside the limit', () => {
    const content = 'First sentence. ' + 'b'.repeat(300);
    expect(limitPostLength(content, 'X')).toBe('First sentence.');
  });

  it('treats ! and ? as sentence endings', () => {
    const content = 'Wow! Really? ' + 'x'.repeat(300);
    expect(limitPostLength(content, 'X')).toBe('Wow! Really?');
  });

  it('ignores punctuation beyond the limit', () => {
    const content = 'Intro. ' + 'y'.repeat(300) + ' end. ' + 'z'.repeat(100);
    expect(limitPostLength(content, 'X')).toBe('Intro.');
  });

  it('uses the default limit for an unknown channel', () => {
    const result = limitPostLength('a'.repeat(2500), 'Mastodon');
    expect(result).toHaveLength(2000);
  });

  it('counts emoji as single characters and never splits them', () => {
    const content = '😀'.repeat(200);
    const result = limitPostLength(content, 'TikTok');
    expect(Array.from(result)).toHaveLength(150);
    expect(result).toBe('😀'.repeat(150));
  });

  it('never exceeds the channel limit', () => {
    for (const channel of CHANNELS) {
      for (const sample of samples) {
        expect(Array.from(limitPostLength(sample, channel)).length).toBeLessThanOrEqual(CHANNEL_LIMITS[channel]);
      }
    }
  });

  it('is idempotent', () => {
    for (const channel of CHANNELS) {
      for (const sample of samples) {
        const once = limitPostLength(sample, channel);
        expect(limitPostLength(once, channel)).toBe(once);
      }
    }
  });
});
