import { describe, expect, it, vi } from 'vitest';
import { JinaSearch, publishedBy } from './search';

describe('publishedBy', () => {
  it('drops hits dated after the session date', () => {
    expect(publishedBy({ url: 'u', date: '2025-01-04T09:00:00Z' }, '2025-01-03')).toBe(false);
    expect(publishedBy({ url: 'u', date: '2025-01-03T09:00:00Z' }, '2025-01-03')).toBe(true);
  });

  it('keeps hits without a usable date', () => {
    expect(publishedBy({ url: 'u' }, '2025-01-03')).toBe(true);
    expect(publishedBy({ url: 'u', date: 'last week' }, '2025-01-03')).toBe(true);
  });
});

describe('JinaSearch', () => {
  it('scrapes the first hit published by the session date', async () => {
    const get = vi
      .fn()
      .mockResolvedValueOnce({
        data: {
          data: [
            { url: 'https://news.example.com/late', date: '2025-01-05T10:00:00Z' },
            { url: 'https://news.example.com/early', date: '2025-01-02T08:00:00Z' },
          ],
        },
      })
      .mockResolvedValueOnce({
        data: { data: { title: 'Chips rally', content: 'Semis up.', publishedTime: '2025-01-02T08:00:00Z' } },
      });
    const search = new JinaSearch('test-secret', { get });
    expect(await search.search('chips', '2025-01-03')).toBe(
      'Title: Chips rally\nURL: https://news.example.com/early\nPublished: 2025-01-02T08:00:00Z\nContent: Semis up.',
    );
    expect(get.mock.calls[0][1]).toMatchObject({ params: { q: 'chips', n: 5 } });
    expect(get.mock.calls[1][0]).toBe('https://r.jina.ai/https://news.example.com/early');
  });

  it('truncates long pages', async () => {
    const get = vi
      .fn()
      .mockResolvedValueOnce({ data: { data: [{ url: 'https://news.example.com/a' }] } })
      .mockResolvedValueOnce({ data: { data: { title: 'T', content: 'x'.repeat(4005) } } });
    const out = await new JinaSearch('test-secret', { get }).search('q', '2025-01-03');
    expect(out.split('\n')[3]).toBe(`Content: ${'x'.repeat(4000)}...`);
    expect(out.split('\n')[2]).toBe('Published: unknown');
  });

  it('says so when nothing qualifies', async () => {
    const get = vi.fn().mockResolvedValue({ data: { data: [{ url: 'https://news.example.com/late', date: '2025-02-01' }] } });
    const out = await new JinaSearch('test-secret', { get }).search('chips', '2025-01-03');
    expect(out).toBe('No results published on or before 2025-01-03 for "chips".');
    expect(get).toHaveBeenCalledTimes(1);
  });
});
