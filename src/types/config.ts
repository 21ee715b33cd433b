export interface ExtractorConfig {
  ytDlpPath: string;
  ffmpegPath?: string;
  proxyUrl?: string;
  cookiesPath?: string;
}

export interface AppConfig {
  port: number;
  downloadDirectory: string;
  youtubeApiKey?: string;
  extractor: ExtractorConfig;
  maxConcurrentJobs: number;
  metadataTimeout: number;
  jobRetentionMs: number;
  progressIntervalMs: number;
  deleteAfterServeMs: number;
}

export interface ClientConfig {
  serviceUrl: string;
  chromePath?: string;
  probeTimeoutMs: number;
  metadataTimeout: number;
}
