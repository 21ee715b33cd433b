/**
 * Tests for the Data API metadata client
 */

import { parseIsoDuration, YouTubeDataApiClient } from '../src/metadata/YouTubeDataApiClient';
import { UpstreamUnavailableError } from '../src/utils/errors';

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

const videoBody = {
  items: [
    {
      id: 'abc_DEF-123',
      snippet: {
        title: 'API Title',
        description: 'API description',
        channelId: 'UC123',
        channelTitle: 'API Channel',
        thumbnails: {
          default: { url: 'https://i.ytimg.test/default.jpg' },
          high: { url: 'https://i.ytimg.test/high.jpg' },
          medium: { url: 'https://i.ytimg.test/medium.jpg' },
        },
      },
      statistics: { viewCount: '1500', likeCount: '42' },
      contentDetails: { duration: 'PT1H2M3S' },
    },
  ],
};

const channelBody = {
  items: [
    {
      snippet: { thumbnails: { default: { url: 'https://yt3.test/logo.jpg' } } },
      statistics: { subscriberCount: '9000' },
    },
  ],
};

describe('parseIsoDuration', () => {
  it.each([
    ['PT1H2M3S', 3723],
    ['PT4M', 240],
    ['PT59S', 59],
    ['P1DT1S', 86401],
    ['P0D', 0],
  ])('should parse %s as %d seconds', (value, seconds) => {
    expect(parseIsoDuration(value)).toBe(seconds);
  });

  it('should reject missing and malformed values', () => {
    expect(parseIsoDuration(undefined)).toBeUndefined();
    expect(parseIsoDuration('1:02:03')).toBeUndefined();
  });
});

describe('YouTubeDataApiClient', () => {
  it('should combine video and channel details', async () => {
    const fetchFn = jest.fn(async (input: string | URL | Request) =>
      String(input).includes('/videos?') ? json(videoBody) : json(channelBody),
    );
    const client = new YouTubeDataApiClient('test-secret', fetchFn);

    await expect(client.getVideo('abc_DEF-123')).resolves.toEqual({
      title: 'API Title',
      uploader: 'API Channel',
      description: 'API description',
      thumbnailUrl: 'https://i.ytimg.test/high.jpg',
      viewCount: 1500,
      likeCount: 42,
      durationSeconds: 3723,
      channelLogoUrl: 'https://yt3.test/logo.jpg',
      subscriberCount: 9000,
    });

    const videoUrl = new URL(String(fetchFn.mock.calls[0][0]));
    expect(videoUrl.pathname).toBe('/youtube/v3/videos');
    expect(videoUrl.searchParams.get('id')).toBe('abc_DEF-123');
    expect(videoUrl.searchParams.get('part')).toBe('snippet,statistics,contentDetails');
    expect(videoUrl.searchParams.get('key')).toBe('test-secret');

    const channelUrl = new URL(String(fetchFn.mock.calls[1][0]));
    expect(channelUrl.pathname).toBe('/youtube/v3/channels');
    expect(channelUrl.searchParams.get('id')).toBe('UC123');
  });

  it('should return null when the video is unknown', async () => {
    const client = new YouTubeDataApiClient('test-secret', async () => json({ items: [] }));
    await expect(client.getVideo('abc_DEF-123')).resolves.toBeNull();
  });

  it('should keep video data when the channel lookup fails', async () => {
    const client = new YouTubeDataApiClient('test-secret', async (input: string | URL | Request) =>
      String(input).includes('/videos?') ? json(videoBody) : json({ error: 'x' }, 500),
    );

    const result = await client.getVideo('abc_DEF-123');
    expect(result?.title).toBe('API Title');
    expect(result?.channelLogoUrl).toBeUndefined();
    expect(result?.subscriberCount).toBeUndefined();
  });

  it('should raise an upstream error with the HTTP status', async () => {
    const client = new YouTubeDataApiClient('test-secret', async () =>
      json({ error: { errors: [{ reason: 'quotaExceeded' }] } }, 403),
    );

    const lookup = client.getVideo('abc_DEF-123');
    await expect(lookup).rejects.toBeInstanceOf(UpstreamUnavailableError);
    await expect(lookup).rejects.toMatchObject({
      status: 403,
      message: 'Data API videos request failed with HTTP 403',
    });
  });

  it('should skip the channel lookup when no channel id is given', async () => {
    const fetchFn = jest.fn(async () =>
      json({ items: [{ id: 'abc_DEF-123', snippet: { title: 'Only video' } }] }),
    );
    const client = new YouTubeDataApiClient('test-secret', fetchFn);

    const result = await client.getVideo('abc_DEF-123');
    expect(result?.title).toBe('Only video');
    expect(result?.thumbnailUrl).toBeUndefined();
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });
});
