/**
 * In-memory Post Source
 *
 * Holds posts pushed in by an ingestion endpoint or an external collector.
 * Keeps the newest posts per token up to a fixed cap.
 */

import type { SocialPost } from '@tokenpulse/core';
import type { ConnectorStatus, PostSource } from '../types.js';

export interface MemoryPostSourceConfig {
  maxPostsPerToken?: number;
}

export class MemoryPostSource implements PostSource {
  readonly id = 'memory';
  readonly name = 'In-memory posts';

  private posts = new Map<string, SocialPost[]>();
  private maxPostsPerToken: number;

  constructor(config: MemoryPostSourceConfig = {}) {
    this.maxPostsPerToken = config.maxPostsPerToken ?? 500;
  }

  isEnabled(): boolean {
    return true;
  }

  async getStatus(): Promise<ConnectorStatus> {
    return { connected: true, latencyMs: 0 };
  }

  /**
   * Add posts for a token. Returns the number stored after trimming.
   */
  ingest(token: string, posts: SocialPost[]): number {
    const key = token.toUpperCase();
    const merged = [...(this.posts.get(key) ?? []), ...posts]
      .sort((a, b) => a.postedAt.getTime() - b.postedAt.getTime())
      .slice(-this.maxPostsPerToken);
    this.posts.set(key, merged);
    return merged.length;
  }

  /**
   * Newest posts first
   */
  async fetchPosts(token: string, limit = 100): Promise<SocialPost[]> {
    const stored = this.posts.get(token.toUpperCase()) ?? [];
    return stored.slice(-limit).reverse();
  }

  clear(token?: string): void {
    if (token) this.posts.delete(token.toUpperCase());
    else this.posts.clear();
  }
}
