/**
 * Tests for environment-driven configuration
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { initializeCookies, loadClientConfig, loadConfig } from '../src/utils/config';

describe('Configuration', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('loadConfig()', () => {
    it('should apply defaults', () => {
      const config = loadConfig({ DOWNLOAD_DIRECTORY: tmpDir });

      expect(config).toEqual({
        port: 5000,
        downloadDirectory: path.resolve(tmpDir),
        youtubeApiKey: undefined,
        extractor: {
          ytDlpPath: 'yt-dlp',
          ffmpegPath: undefined,
          proxyUrl: undefined,
          cookiesPath: undefined,
        },
        maxConcurrentJobs: 2,
        metadataTimeout: 30000,
        jobRetentionMs: 3600000,
        progressIntervalMs: 500,
        deleteAfterServeMs: 5000,
      });
    });

    it('should read every setting from the environment', () => {
      const config = loadConfig({
        DOWNLOAD_DIRECTORY: tmpDir,
        PORT: '8080',
        YOUTUBE_API_KEY: 'test-secret',
        YTDLP_PATH: '/usr/local/bin/yt-dlp',
        FFMPEG_PATH: '/usr/bin/ffmpeg',
        YTDLP_PROXY_URL: 'http://proxy.local:3128',
        MAX_CONCURRENT_JOBS: '4',
        METADATA_TIMEOUT: '10000',
        JOB_RETENTION_MS: '60000',
        PROGRESS_INTERVAL_MS: '250',
        DELETE_AFTER_SERVE_MS: '0',
      });

      expect(config.port).toBe(8080);
      expect(config.youtubeApiKey).toBe('test-secret');
      expect(config.extractor).toEqual({
        ytDlpPath: '/usr/local/bin/yt-dlp',
        ffmpegPath: '/usr/bin/ffmpeg',
        proxyUrl: 'http://proxy.local:3128',
        cookiesPath: undefined,
      });
      expect(config.maxConcurrentJobs).toBe(4);
      expect(config.metadataTimeout).toBe(10000);
      expect(config.jobRetentionMs).toBe(60000);
      expect(config.progressIntervalMs).toBe(250);
      expect(config.deleteAfterServeMs).toBe(0);
    });

    it('should keep at least one concurrent job', () => {
      expect(loadConfig({ DOWNLOAD_DIRECTORY: tmpDir, MAX_CONCURRENT_JOBS: '0' }).maxConcurrentJobs).toBe(1);
    });

    it('should reject malformed numbers', () => {
      expect(() => loadConfig({ DOWNLOAD_DIRECTORY: tmpDir, PORT: 'eighty' })).toThrow('Invalid value for PORT: eighty');
      expect(() => loadConfig({ DOWNLOAD_DIRECTORY: tmpDir, JOB_RETENTION_MS: '-1' })).toThrow(
        'Invalid value for JOB_RETENTION_MS: -1',
      );
    });
  });

  describe('loadClientConfig()', () => {
    it('should default to the local service', () => {
      expect(loadClientConfig({})).toEqual({
        serviceUrl: 'http://localhost:5000',
        chromePath: undefined,
        probeTimeoutMs: 15000,
        metadataTimeout: 30000,
      });
      expect(loadClientConfig({ PORT: '7000' }).serviceUrl).toBe('http://localhost:7000');
    });

    it('should read the browser and service settings', () => {
      const config = loadClientConfig({
        SERVICE_URL: 'http://media.internal:9000',
        CHROME_PATH: '/usr/bin/chromium',
        PROBE_TIMEOUT: '5000',
      });
      expect(config.serviceUrl).toBe('http://media.internal:9000');
      expect(config.chromePath).toBe('/usr/bin/chromium');
      expect(config.probeTimeoutMs).toBe(5000);
    });
  });

  describe('initializeCookies()', () => {
    const cookies = '# Netscape HTTP Cookie File\n.youtube.com\tTRUE\t/\tTRUE\t0\tPREF\ttest-value\n';

    it('should write plaintext cookies with restricted permissions', () => {
      const cookiesPath = initializeCookies(cookies, tmpDir);

      expect(cookiesPath).toBe(path.join(tmpDir, '.ytdlp_cookies.txt'));
      expect(fs.readFileSync(path.join(tmpDir, '.ytdlp_cookies.txt'), 'utf-8')).toBe(cookies);
      expect(fs.statSync(path.join(tmpDir, '.ytdlp_cookies.txt')).mode & 0o777).toBe(0o600);
    });

    it('should decode base64 cookies', () => {
      const cookiesPath = initializeCookies(Buffer.from(cookies).toString('base64'), tmpDir);
      expect(cookiesPath).toBeDefined();
      expect(fs.readFileSync(path.join(tmpDir, '.ytdlp_cookies.txt'), 'utf-8')).toBe(cookies);
    });

    it('should skip when no cookies are configured', () => {
      expect(initializeCookies(undefined, tmpDir)).toBeUndefined();
      expect(fs.existsSync(path.join(tmpDir, '.ytdlp_cookies.txt'))).toBe(false);
    });

    it('should pass the cookie file to the extractor config', () => {
      const config = loadConfig({ DOWNLOAD_DIRECTORY: tmpDir, YTDLP_COOKIES_CONTENT: cookies });
      expect(config.extractor.cookiesPath).toBe(path.join(path.resolve(tmpDir), '.ytdlp_cookies.txt'));
    });
  });
});
