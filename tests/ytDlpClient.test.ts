/**
 * Tests for the yt-dlp process wrapper and format conversion
 */

import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import {
  bestThumbnailUrl,
  EngineProcess,
  EngineTimeoutError,
  toFormatDescriptors,
  YtDlpClient,
  YtDlpFormat,
} from '../src/extractor/YtDlpClient';
import { CancellationRequestedError, ExtractionFailureError, UserInputError } from '../src/utils/errors';

class FakeProcess extends EventEmitter implements EngineProcess {
  stdout = new PassThrough();
  stderr = new PassThrough();
  signals: string[] = [];

  kill(signal?: NodeJS.Signals): boolean {
    this.signals.push(signal ?? 'SIGTERM');
    return true;
  }

  exit(code: number | null): void {
    this.emit('close', code);
  }
}

function createClient(config: Partial<ConstructorParameters<typeof YtDlpClient>[0]> = {}) {
  const spawned: Array<{ command: string; args: readonly string[]; proc: FakeProcess }> = [];
  const client = new YtDlpClient({ ytDlpPath: 'yt-dlp', ...config }, (command, args) => {
    const proc = new FakeProcess();
    spawned.push({ command, args, proc });
    return proc;
  });
  return { client, spawned };
}

// Let queued stream 'data' events reach the client
const flushStreams = () => new Promise((resolve) => setImmediate(resolve));

describe('YtDlpClient', () => {
  describe('run()', () => {
    it('should resolve with stdout and forward every line', async () => {
      const { client, spawned } = createClient();
      const lines: string[] = [];
      const pending = client.run(['--version'], { onLine: (line) => lines.push(line) });

      const { proc } = spawned[0];
      proc.stdout.write('first line\nsecond ');
      proc.stdout.write('half\n\nlast without newline');
      await flushStreams();
      proc.stderr.write('WARNING: noisy\n');
      await flushStreams();
      proc.exit(0);

      await expect(pending).resolves.toBe('first line\nsecond half\n\nlast without newline');
      expect(lines).toEqual(['first line', 'second half', 'WARNING: noisy', 'last without newline']);
    });

    it('should reject with stderr when the process fails', async () => {
      const { client, spawned } = createClient();
      const pending = client.run(['x']);

      spawned[0].proc.stderr.write('ERROR: [youtube] abc: Video unavailable\n');
      await flushStreams();
      spawned[0].proc.exit(1);

      await expect(pending).rejects.toThrow('ERROR: [youtube] abc: Video unavailable');
    });

    it('should report the exit code when stderr is empty', async () => {
      const { client, spawned } = createClient();
      const pending = client.run(['x']);
      spawned[0].proc.exit(2);
      await expect(pending).rejects.toThrow('yt-dlp exited with code 2');
    });

    it('should report spawn failures', async () => {
      const { client, spawned } = createClient();
      const pending = client.run(['x']);
      spawned[0].proc.emit('error', new Error('spawn yt-dlp ENOENT'));
      await expect(pending).rejects.toThrow('Failed to start yt-dlp: spawn yt-dlp ENOENT');
    });

    it('should terminate on abort and settle only after the process exits', async () => {
      const { client, spawned } = createClient();
      const controller = new AbortController();
      let settled = false;
      const pending = client.run(['x'], { signal: controller.signal });
      pending.catch(() => undefined).finally(() => {
        settled = true;
      });

      controller.abort();
      expect(spawned[0].proc.signals).toEqual(['SIGTERM']);
      await flushStreams();
      expect(settled).toBe(false);

      spawned[0].proc.exit(null);
      await expect(pending).rejects.toBeInstanceOf(CancellationRequestedError);
    });

    it('should refuse to start when already aborted', async () => {
      const { client, spawned } = createClient();
      const controller = new AbortController();
      controller.abort();

      await expect(client.run(['x'], { signal: controller.signal })).rejects.toBeInstanceOf(
        CancellationRequestedError,
      );
      expect(spawned).toHaveLength(0);
    });

    it('should time out and kill the process', async () => {
      jest.useFakeTimers({ doNotFake: ['nextTick', 'setImmediate', 'queueMicrotask'] });
      try {
        const { client, spawned } = createClient();
        const pending = client.run(['x'], { timeoutMs: 1000 });

        jest.advanceTimersByTime(1000);
        expect(spawned[0].proc.signals).toEqual(['SIGTERM']);
        jest.advanceTimersByTime(3000);
        expect(spawned[0].proc.signals).toEqual(['SIGTERM', 'SIGKILL']);

        spawned[0].proc.exit(null);
        await expect(pending).rejects.toBeInstanceOf(EngineTimeoutError);
      } finally {
        jest.useRealTimers();
      }
    });
  });

  describe('fetchInfo()', () => {
    it('should pass proxy, cookies and ffmpeg options and parse the JSON', async () => {
      const { client, spawned } = createClient({
        proxyUrl: 'http://proxy.local:8080',
        cookiesPath: '/tmp/cookies.txt',
        ffmpegPath: '/opt/ffmpeg',
      });
      const pending = client.fetchInfo('https://www.youtube.com/watch?v=abc_DEF-123');

      const { command, args, proc } = spawned[0];
      expect(command).toBe('yt-dlp');
      expect(args).toEqual([
        '--dump-json',
        '--no-playlist',
        '--skip-download',
        '--no-warnings',
        '--socket-timeout', '10',
        '--proxy', 'http://proxy.local:8080',
        '--cookies', '/tmp/cookies.txt',
        '--ffmpeg-location', '/opt/ffmpeg',
        'https://www.youtube.com/watch?v=abc_DEF-123',
      ]);

      proc.stdout.write(JSON.stringify({ id: 'abc_DEF-123', title: 'Test Video', formats: [] }));
      await flushStreams();
      proc.exit(0);

      await expect(pending).resolves.toEqual({ id: 'abc_DEF-123', title: 'Test Video', formats: [] });
    });

    it('should reject malformed JSON', async () => {
      const { client, spawned } = createClient();
      const pending = client.fetchInfo('https://youtu.be/abc_DEF-123');
      spawned[0].proc.stdout.write('not json');
      await flushStreams();
      spawned[0].proc.exit(0);
      await expect(pending).rejects.toThrow('yt-dlp returned malformed JSON');
    });

    it('should report unexpected JSON shapes readably', async () => {
      const { client, spawned } = createClient();
      const pending = client.fetchInfo('https://youtu.be/abc_DEF-123');
      spawned[0].proc.stdout.write(JSON.stringify({ id: 'abc_DEF-123', formats: 'none' }));
      await flushStreams();
      spawned[0].proc.exit(0);
      await expect(pending).rejects.toBeInstanceOf(ExtractionFailureError);
      await expect(pending).rejects.toThrow('yt-dlp returned unexpected JSON at formats: Expected array, received string');
    });

    it('should reject URLs without a scheme as user input', async () => {
      const { client, spawned } = createClient();
      const pending = client.fetchInfo('youtu.be/abc_DEF-123');
      await expect(pending).rejects.toBeInstanceOf(UserInputError);
      await expect(pending).rejects.toThrow('Invalid URL: Invalid url');
      expect(spawned).toHaveLength(0);
    });

    it('should reject URLs carrying shell metacharacters before spawning', async () => {
      const { client, spawned } = createClient();
      await expect(client.fetchInfo('https://youtu.be/abc_DEF-123;rm')).rejects.toThrow();
      expect(spawned).toHaveLength(0);
    });
  });
});

describe('toFormatDescriptors', () => {
  const formats: YtDlpFormat[] = [
    { format_id: '137', ext: 'mp4', url: 'u', width: 1920, height: 1080, fps: 30, vcodec: 'avc1', acodec: 'none', tbr: 4000, filesize: 1000 },
    { format_id: '140', ext: 'm4a', url: 'u', vcodec: 'none', acodec: 'mp4a', abr: 129.5, filesize_approx: 500 },
    { format_id: '18', ext: 'mp4', url: 'u', width: 640, height: 360, vcodec: 'avc1', acodec: 'mp4a', format_note: '360p' },
    { format_id: 'sb0', ext: 'mhtml', url: 'u', vcodec: 'none', acodec: 'none' },
    { format_id: 'nourl', ext: 'mp4', height: 720, vcodec: 'avc1', acodec: 'none' },
    { format_id: 'noext', url: 'u', height: 720, vcodec: 'avc1', acodec: 'none' },
  ];

  it('should keep only downloadable audio or video entries', () => {
    expect(toFormatDescriptors(formats).map((f) => [f.format_id, f.media_kind])).toEqual([
      ['137', 'video'],
      ['140', 'audio'],
      ['18', 'video+audio'],
    ]);
  });

  it('should produce frozen descriptors with normalised fields', () => {
    const [video, audio, muxed] = toFormatDescriptors(formats);
    expect(Object.isFrozen(video)).toBe(true);
    expect(video).toEqual({
      format_id: '137',
      media_kind: 'video',
      resolution: { width: 1920, height: 1080 },
      frame_rate: 30,
      container: 'mp4',
      note: undefined,
      filesize: 1000,
      bitrate: 4000,
    });
    expect(audio.resolution).toBeUndefined();
    expect(audio.filesize).toBe(500);
    expect(audio.bitrate).toBe(129.5);
    expect(muxed.note).toBe('360p');
  });
});

describe('bestThumbnailUrl', () => {
  it('should prefer preference, then area', () => {
    expect(
      bestThumbnailUrl({
        thumbnails: [
          { url: 'small', preference: -5, width: 120, height: 90 },
          { url: 'large', preference: 0, width: 1280, height: 720 },
          { url: 'medium', preference: 0, width: 640, height: 480 },
        ],
      }),
    ).toBe('large');
  });

  it('should fall back to the single thumbnail field', () => {
    expect(bestThumbnailUrl({ thumbnail: 'only', thumbnails: [] })).toBe('only');
    expect(bestThumbnailUrl({})).toBeUndefined();
  });
});
