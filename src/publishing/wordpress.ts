import axios from 'axios';
import type { AxiosInstance, AxiosResponse } from 'axios';
import type { Publisher } from './publisher.js';
import { PublishError, errorMessage } from '../errors.js';

export const POSTS_ENDPOINT = '/wp-json/wp/v2/posts/';

export interface WordPressCredentials {
  domain: string;
  username: string;
  /** WordPress application password, not the account password */
  appPassword: string;
}

export class WordPressPublisher implements Publisher {
  private readonly url: string;

  constructor(
    private readonly credentials: WordPressCredentials,
    private readonly http: AxiosInstance = axios.create({ timeout: 60_000 })
  ) {
    if (!credentials.domain.trim()) {
      throw new PublishError('WordPress domain is required');
    }
    this.url = `${credentials.domain.replace(/\/+$/, '')}${POSTS_ENDPOINT}`;
  }

  async publish(title: string, body: string): Promise<boolean> {
    try {
      const postId = await this.createPost(title, body);
      console.log(`[WordPress] Post created successfully! Post ID: ${postId ?? 'unknown'}`);
      return true;
    } catch (error) {
      console.error(`[WordPress] Failed to publish "${title}": ${errorMessage(error)}`);
      return false;
    }
  }

  private async createPost(title: string, body: string): Promise<string | null> {
    let response: AxiosResponse<unknown>;

    try {
      response = await this.http.post<unknown>(
        this.url,
        { title, content: body, status: 'publish' },
        {
          auth: {
            username: this.credentials.username,
            password: this.credentials.appPassword,
          },
          headers: { 'Content-Type': 'application/json' },
          // Status codes are judged below, not by axios
          validateStatus: () => true,
        }
      );
    } catch (error) {
      throw new PublishError(`Request to ${this.url} failed: ${errorMessage(error)}`);
    }

    if (response.status !== 201) {
      throw new PublishError(
        `Failed to create post. Status Code: ${response.status}, Response: ${describeBody(response.data)}`,
        response.status
      );
    }

    return extractPostId(response.data);
  }
}

function extractPostId(data: unknown): string | null {
  if (typeof data === 'object' && data !== null && 'id' in data) {
    const id = data.id;
    if (typeof id === 'number' || typeof id === 'string') {
      return String(id);
    }
  }
  return null;
}

function describeBody(data: unknown): string {
  if (typeof data === 'string') return data;
  try {
    return JSON.stringify(data) ?? '';
  } catch {
    return String(data);
  }
}
