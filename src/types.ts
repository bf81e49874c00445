export const CHANNELS = ['Facebook', 'X', 'LinkedIn', 'Instagram', 'TikTok', 'Youtube'] as const;

export type Channel = (typeof CHANNELS)[number];

export function isChannel(value: string): value is Channel {
  return CHANNELS.some(channel => channel === value);
}

export interface JobSpec {
  topic: string;
  keywords: string[];
}

export interface GeneratedPost {
  title: string;
  body: string;
}

export interface ChannelPost {
  channel: string;
  content: string;
  limit: number;
  failed: boolean;
}

export interface LLMResponse {
  content: string;
  provider: string;
  model: string;
}

export type JobRunStatus = 'running' | 'published' | 'publish_failed' | 'generation_failed' | 'crashed';

export interface JobRun {
  id: string;
  topic: string;
  keywords: string[];
  title: string | null;
  status: JobRunStatus;
  error: string | null;
  started_at: string;
  finished_at: string | null;
}
