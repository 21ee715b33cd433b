import fs from 'fs/promises';
import path from 'path';
import { logger } from '../../utils/logger';
import { PipelineFailureError } from '../../utils/errors';
import { bestThumbnailUrl, YtDlpClient } from '../../extractor/YtDlpClient';
import { toWatchUrl } from '../../utils/VideoIdExtractor';
import { imageExtensionFor } from '../mimeTypes';
import { MediaPipeline, PipelineContext, PipelineResult } from './types';

export type ThumbnailSource = Pick<YtDlpClient, 'fetchInfo'>;

/**
 * Strip characters that are unsafe in file names
 */
export function safeFileStem(title: string, fallback: string): string {
    const stem = title
        .replace(/[\\/:*?"<>|\u0000-\u001f]/g, '')
        .replace(/\s+/g, ' ')
        .trim()
        .slice(0, 80);
    return stem.length > 0 ? stem : fallback;
}

/**
 * ThumbnailPipeline - Looks up the best thumbnail and saves it to the job directory
 */
export class ThumbnailPipeline implements MediaPipeline {
    readonly name = 'thumbnail';
    private readonly source: ThumbnailSource;
    private readonly fetchFn: typeof fetch;

    constructor(source: ThumbnailSource, fetchFn: typeof fetch = fetch) {
        this.source = source;
        this.fetchFn = fetchFn;
    }

    expectedPasses(): number {
        return 1;
    }

    outputExtensions(): string[] {
        return ['.jpg', '.png', '.webp'];
    }

    async run(context: PipelineContext): Promise<PipelineResult> {
        const { request, jobDir, signal, emit } = context;

        const info = await this.source.fetchInfo(toWatchUrl(request.url), { signal });
        const thumbnailUrl = bestThumbnailUrl(info);
        if (!thumbnailUrl) {
            throw new PipelineFailureError('No thumbnail available for this video');
        }
        emit({ type: 'progress', percent: 10 });

        const response = await this.fetchFn(thumbnailUrl, { signal });
        if (!response.ok) {
            throw new PipelineFailureError(`Thumbnail download failed with HTTP ${response.status}`);
        }

        const data = Buffer.from(await response.arrayBuffer());
        const fileName = `${safeFileStem(info.title ?? '', info.id ?? 'thumbnail')}${imageExtensionFor(
            response.headers.get('content-type'),
        )}`;
        const outputPath = path.join(jobDir, fileName);
        await fs.writeFile(outputPath, data);

        emit({ type: 'progress', percent: 100, totalBytes: data.length, downloadedBytes: data.length });
        logger.debug('Thumbnail saved', { jobId: context.jobId, bytes: data.length });

        return { outputPath };
    }
}
