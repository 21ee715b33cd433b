/**
 * Tests for video identifier extraction
 */

import fc from 'fast-check';
import { canonicalWatchUrl, extractVideoId, isSupportedVideoUrl, toWatchUrl } from '../src/utils/VideoIdExtractor';
import { UserInputError } from '../src/utils/errors';

const ID_CHARS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789_-'.split('');
const videoIdArb = fc
  .array(fc.constantFrom(...ID_CHARS), { minLength: 11, maxLength: 11 })
  .map((chars) => chars.join(''));

describe('VideoIdExtractor', () => {
  describe('Accepted URL shapes', () => {
    it.each([
      ['https://www.youtube.com/watch?v=dQw4w9WgXcQ', 'dQw4w9WgXcQ'],
      ['https://youtube.com/watch?v=dQw4w9WgXcQ&t=42s', 'dQw4w9WgXcQ'],
      ['https://m.youtube.com/watch?feature=share&v=abc_DEF-123', 'abc_DEF-123'],
      ['https://music.youtube.com/watch?v=abc_DEF-123&list=RD1', 'abc_DEF-123'],
      ['https://youtu.be/abc_DEF-123', 'abc_DEF-123'],
      ['https://youtu.be/abc_DEF-123?si=share', 'abc_DEF-123'],
      ['https://www.youtube.com/embed/abc_DEF-123', 'abc_DEF-123'],
      ['https://www.youtube-nocookie.com/embed/abc_DEF-123', 'abc_DEF-123'],
      ['https://www.youtube.com/v/abc_DEF-123', 'abc_DEF-123'],
      ['https://www.youtube.com/shorts/abc_DEF-123', 'abc_DEF-123'],
      ['https://www.youtube.com/live/abc_DEF-123?feature=share', 'abc_DEF-123'],
      ['youtube.com/watch?v=abc_DEF-123', 'abc_DEF-123'],
      ['  https://youtu.be/abc_DEF-123  ', 'abc_DEF-123'],
    ])('should extract the id from %s', (url, expected) => {
      expect(extractVideoId(url)).toBe(expected);
    });

    it('should extract any 11-character token from a watch URL', () => {
      fc.assert(
        fc.property(videoIdArb, (id) => {
          expect(extractVideoId(`https://www.youtube.com/watch?v=${id}`)).toBe(id);
          expect(extractVideoId(`https://youtu.be/${id}`)).toBe(id);
        }),
        { numRuns: 100 },
      );
    });
  });

  describe('Rejected input', () => {
    it.each([
      [''],
      ['   '],
      ['not a url'],
      ['https://vimeo.com/123456789'],
      ['https://www.youtube.com/watch?v=short'],
      // 12-character run is not an 11-character id
      ['https://www.youtube.com/watch?v=abc_DEF-1234'],
      ['https://www.youtube.com/channel/UC1234567890'],
      ['https://example.com/watch?v=abc_DEF-123'],
    ])('should return null for %p', (url) => {
      expect(extractVideoId(url)).toBeNull();
      expect(isSupportedVideoUrl(url)).toBe(false);
    });
  });

  it('should build a canonical watch URL that extracts back to the same id', () => {
    expect(canonicalWatchUrl('abc_DEF-123')).toBe('https://www.youtube.com/watch?v=abc_DEF-123');
    expect(extractVideoId(canonicalWatchUrl('abc_DEF-123'))).toBe('abc_DEF-123');
  });

  it('should turn scheme-less URLs into the canonical watch URL', () => {
    expect(toWatchUrl('youtu.be/abc_DEF-123')).toBe('https://www.youtube.com/watch?v=abc_DEF-123');
    expect(toWatchUrl('www.youtube.com/watch?list=PL1&v=abc_DEF-123')).toBe('https://www.youtube.com/watch?v=abc_DEF-123');
    expect(() => toWatchUrl('example.com/abc_DEF-123')).toThrow(UserInputError);
  });
});
