import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { validate, socialPostsSchema } from '../middleware/validation.js';
import type { SocialPostsBody } from '../middleware/validation.js';
import { generateSocialPosts } from '../services/social.service.js';
import { getSocialPosts } from '../services/artifact.service.js';
import { sendTextDownload } from './download.js';

const router = Router();

// POST /social/generate
// Always 201 once validation passes: channels that failed every attempt carry
// an error string and failed: true instead of failing the request.
router.post('/generate', validate(socialPostsSchema), async (req: Request, res: Response, next: NextFunction) => {
  const input: SocialPostsBody = req.body;

  try {
    const posts = await generateSocialPosts(input);
    res.status(201).json({ posts });
  } catch (error) {
    next(error);
  }
});

// GET /social
router.get('/', (_req: Request, res: Response) => {
  res.json({ posts: getSocialPosts() });
});

// GET /social/:channel/download
router.get('/:channel/download', (req: Request, res: Response) => {
  const { channel } = req.params;
  const post = getSocialPosts().find(p => p.channel === channel);

  if (!post) {
    return res.status(404).json({ error: `No ${channel} post has been generated yet` });
  }
  sendTextDownload(res, `${post.channel}_post.txt`, post.content);
});

export default router;
