import { describe, it, expect } from 'vitest';
import type { SocialPost } from '@tokenpulse/core';
import { MemoryPostSource } from './memory.js';

function post(id: string, minute: number): SocialPost {
  return {
    id,
    text: `post ${id}`,
    likes: 0,
    retweets: 0,
    replies: 0,
    postedAt: new Date(Date.UTC(2026, 0, 1, 12, minute)),
  };
}

describe('MemoryPostSource', () => {
  it('should return newest posts first, case-insensitive by token', async () => {
    const source = new MemoryPostSource();
    source.ingest('pepe', [post('a', 1), post('c', 3), post('b', 2)]);

    const posts = await source.fetchPosts('PEPE');

    expect(posts.map((p) => p.id)).toEqual(['c', 'b', 'a']);
  });

  it('should honor the fetch limit', async () => {
    const source = new MemoryPostSource();
    source.ingest('DOGE', [post('a', 1), post('b', 2), post('c', 3)]);

    const posts = await source.fetchPosts('DOGE', 2);

    expect(posts.map((p) => p.id)).toEqual(['c', 'b']);
  });

  it('should keep only the newest posts beyond the cap', async () => {
    const source = new MemoryPostSource({ maxPostsPerToken: 2 });

    expect(source.ingest('SHIB', [post('a', 1), post('b', 2), post('c', 3)])).toBe(2);
    expect((await source.fetchPosts('SHIB')).map((p) => p.id)).toEqual(['c', 'b']);
  });

  it('should return nothing for an unknown token', async () => {
    const source = new MemoryPostSource();
    expect(await source.fetchPosts('NONE')).toEqual([]);
  });
});
