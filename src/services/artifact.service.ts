import { getDb } from '../db.js';
import type { ChannelPost, GeneratedPost } from '../types.js';
import { getChannelLimit } from '../content/channel-limiter.js';

// Display cache for the operator: only the latest of each artifact is kept.

interface ArtifactRow {
  kind: string;
  key: string;
  title: string | null;
  content: string;
  failed: number;
  position: number;
  created_at: string;
}

export interface CachedBlogPost extends GeneratedPost {
  created_at: string;
}

export interface CachedWeeklyPlan {
  plan: string;
  created_at: string;
}

const LATEST = 'latest';

export function saveBlogPost(post: GeneratedPost): void {
  getDb().prepare(`
    INSERT OR REPLACE INTO artifacts (kind, key, title, content, created_at)
    VALUES ('blog_post', ?, ?, ?, ?)
  `).run(LATEST, post.title, post.body, new Date().toISOString());
}

export function getBlogPost(): CachedBlogPost | null {
  const row = getDb()
    .prepare("SELECT * FROM artifacts WHERE kind = 'blog_post' AND key = ?")
    .get(LATEST) as ArtifactRow | undefined;

  if (!row) return null;

  return {
    title: row.title ?? '',
    body: row.content,
    created_at: row.created_at,
  };
}

export function saveWeeklyPlan(plan: string): void {
  getDb().prepare(`
    INSERT OR REPLACE INTO artifacts (kind, key, content, created_at)
    VALUES ('weekly_plan', ?, ?, ?)
  `).run(LATEST, plan, new Date().toISOString());
}

export function getWeeklyPlan(): CachedWeeklyPlan | null {
  const row = getDb()
    .prepare("SELECT * FROM artifacts WHERE kind = 'weekly_plan' AND key = ?")
    .get(LATEST) as ArtifactRow | undefined;

  return row ? { plan: row.content, created_at: row.created_at } : null;
}

// The channel set is rebuilt in full on every generation, never merged.
export function replaceSocialPosts(posts: ChannelPost[]): void {
  const db = getDb();

  db.transaction(() => {
    db.prepare("DELETE FROM artifacts WHERE kind = 'social_post'").run();

    const insert = db.prepare(`
      INSERT INTO artifacts (kind, key, content, failed, position, created_at)
      VALUES ('social_post', ?, ?, ?, ?, ?)
    `);
    const now = new Date().toISOString();

    posts.forEach((post, index) => {
      insert.run(post.channel, post.content, post.failed ? 1 : 0, index, now);
    });
  })();
}

export function getSocialPosts(): ChannelPost[] {
  const rows = getDb()
    .prepare("SELECT * FROM artifacts WHERE kind = 'social_post' ORDER BY position ASC")
    .all() as ArtifactRow[];

  return rows.map(row => ({
    channel: row.key,
    content: row.content,
    limit: getChannelLimit(row.key),
    failed: row.failed === 1,
  }));
}
