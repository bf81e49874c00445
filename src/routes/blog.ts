import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { validate, publishBlogSchema, suggestTitleSchema } from '../middleware/validation.js';
import type { JobSpecInput, PublishBlogBody } from '../middleware/validation.js';
import { generateAndPublish, suggestTitle } from '../services/blog.service.js';
import { getBlogPost } from '../services/artifact.service.js';
import { sendTextDownload } from './download.js';

const router = Router();

// POST /blog/title
router.post('/title', validate(suggestTitleSchema), async (req: Request, res: Response, next: NextFunction) => {
  const { topic, keywords }: JobSpecInput = req.body;

  try {
    const title = await suggestTitle(topic, keywords);
    res.json({ title });
  } catch (error) {
    next(error);
  }
});

// POST /blog/publish
router.post('/publish', validate(publishBlogSchema), async (req: Request, res: Response, next: NextFunction) => {
  const input: PublishBlogBody = req.body;

  try {
    const result = await generateAndPublish(input);

    switch (result.outcome) {
      case 'published':
        return res.status(201).json({
          message: 'Blog post published successfully!',
          title: result.post.title,
        });

      case 'generation_failed':
        return res.status(502).json({ error: result.message });

      case 'publish_failed':
        return res.status(502).json({ error: result.message, title: result.post.title });
    }
  } catch (error) {
    next(error);
  }
});

// GET /blog
router.get('/', (_req: Request, res: Response) => {
  const post = getBlogPost();

  if (!post) {
    return res.status(404).json({ error: 'No blog post has been published yet' });
  }
  res.json(post);
});

// GET /blog/download
router.get('/download', (_req: Request, res: Response) => {
  const post = getBlogPost();

  if (!post) {
    return res.status(404).json({ error: 'No blog post has been published yet' });
  }
  sendTextDownload(res, 'blog_post.txt', `${post.title}\n\n${post.body}`);
});

export default router;
