#!/usr/bin/env node
/**
 * Command-line client: resolves quality for a URL and optionally downloads it.
 *
 *   tubegrab <url> [--kind video|audio|thumbnail] [--format <option>] [--download]
 */

import 'dotenv/config';
import { loadClientConfig } from './utils/config';
import { logger } from './utils/logger';
import { errorMessage } from './utils/errors';
import { MediaClient } from './client/MediaClient';
import { BrowserPlayerHost } from './probe/BrowserPlayerHost';
import { PlayerProbe } from './probe/PlayerProbe';
import { DownloadKind } from './types';

export interface CliArgs {
  url: string;
  kind: DownloadKind;
  format?: string;
  download: boolean;
}

const KINDS: readonly DownloadKind[] = ['video', 'audio', 'thumbnail'];

function isDownloadKind(value: string): value is DownloadKind {
  return KINDS.some((kind) => kind === value);
}

export function parseArgs(argv: readonly string[]): CliArgs {
  let url: string | undefined;
  let kind: DownloadKind = 'video';
  let format: string | undefined;
  let download = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--kind') {
      const value = argv[++i] ?? '';
      if (!isDownloadKind(value)) throw new Error(`Unknown kind: ${value}`);
      kind = value;
    } else if (arg === '--format') {
      format = argv[++i];
    } else if (arg === '--download') {
      download = true;
    } else if (!arg.startsWith('--') && url === undefined) {
      url = arg;
    } else {
      throw new Error(`Unexpected argument: ${arg}`);
    }
  }

  if (!url) throw new Error('Usage: tubegrab <url> [--kind video|audio|thumbnail] [--format <option>] [--download]');
  return { url, kind, format, download };
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const config = loadClientConfig();

  const host = config.chromePath ? new BrowserPlayerHost({ executablePath: config.chromePath }) : null;
  if (!host) {
    logger.warn('CHROME_PATH not set, quality comes from the extraction engine only');
  }

  const client = new MediaClient({
    baseUrl: config.serviceUrl,
    probe: host ? new PlayerProbe(host, { timeoutMs: config.probeTimeoutMs }) : undefined,
    metadataTimeoutMs: config.metadataTimeout,
  });

  try {
    const { metadata, quality } = await client.loadVideo(args.url, args.kind);
    console.log(`${metadata.title} - ${metadata.uploader}`);
    console.log(`Quality: ${quality.estimate.label} (${quality.estimate.source})${quality.highResolution ? ' [high resolution]' : ''}`);
    if (metadata.degraded) {
      console.log(`Degraded metadata: ${metadata.engine_error ?? 'partial result'}`);
    }
    quality.options.forEach((option) => console.log(`  ${option.value}\t${option.label}`));

    if (!args.download) return;

    const selected = args.format ?? quality.options[0]?.value ?? '';
    const job = await client.startDownload({ url: args.url, media_kind: args.kind, selected_format_id: selected });
    const result = await job.waitForCompletion({
      onProgress: (progress) => {
        console.log(`${progress.status} ${progress.progress.toFixed(1)}% ${progress.speed ?? ''} ETA ${progress.eta ?? '--:--'}`);
      },
    });

    if (result.status === 'completed') {
      console.log(`Ready: ${job.fileUrl()}`);
    } else {
      console.log(`Job ${result.status}${result.error ? `: ${result.error}` : ''}`);
      process.exitCode = 1;
    }
  } finally {
    await host?.close();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(errorMessage(error));
    process.exit(1);
  });
}
