import axios from 'axios';
import type { Publisher } from './publisher.js';
import { WordPressPublisher } from './wordpress.js';
import { getConfig } from '../config.js';

let publisher: Publisher | null = null;

export function getPublisher(): Publisher {
  if (publisher) {
    return publisher;
  }

  const config = getConfig();
  publisher = new WordPressPublisher(
    config.wordpress,
    axios.create({ timeout: config.requestTimeoutMs })
  );
  return publisher;
}

export * from './publisher.js';
