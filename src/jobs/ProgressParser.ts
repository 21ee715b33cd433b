/**
 * ProgressParser - Turns yt-dlp --newline output into structured events
 */

import { parseClock, parseSize } from '../utils/format';

export interface ProgressUpdate {
    type: 'progress';
    percent: number;
    totalBytes?: number;
    downloadedBytes?: number;
    speed?: string;
    bytesPerSecond?: number;
    etaSeconds?: number;
}

export interface DestinationUpdate {
    type: 'destination';
    path: string;
    phase: 'download' | 'postprocess';
}

export interface StageUpdate {
    type: 'stage';
    name: string;
}

export type PipelineEvent = ProgressUpdate | DestinationUpdate | StageUpdate;

const NUMBER = '(\\d+(?:\\.\\d+)?)';
const UNIT = '([KMGT]?i?B)';

// [download]  45.2% of ~ 10.50MiB at  1.23MiB/s ETA 00:05
const PROGRESS_PATTERN = new RegExp(
    `^\\[download\\]\\s+${NUMBER}%\\s+of\\s+~?\\s*${NUMBER}\\s*${UNIT}` +
        `(?:\\s+at\\s+(?:${NUMBER}\\s*${UNIT}\\/s|Unknown\\s+(?:B\\/s|speed)))?` +
        `(?:\\s+ETA\\s+(\\d{1,2}:\\d{2}(?::\\d{2})?|Unknown))?`,
);

const DOWNLOAD_DESTINATION_PATTERN = /^\[download\]\s+Destination:\s+(.+)$/;
const ALREADY_DOWNLOADED_PATTERN = /^\[download\]\s+(.+?)\s+has already been downloaded/;
const MERGER_PATTERN = /^\[Merger\]\s+Merging formats into\s+"(.+)"$/;
const STAGE_PATTERN = /^\[(Merger|VideoConvertor|ExtractAudio|Fixup\w*)\]/;
const POSTPROCESS_DESTINATION_PATTERN = /Destination:\s+(.+)$/;

/**
 * Parse one line of engine output. Lines that carry nothing yield [].
 */
export function parseLine(rawLine: string): PipelineEvent[] {
    const line = rawLine.trim();

    const progress = PROGRESS_PATTERN.exec(line);
    if (progress) {
        const [, percentText, totalText, totalUnit, speedText, speedUnit, etaText] = progress;
        const percent = Math.min(100, parseFloat(percentText));
        const totalBytes = parseSize(totalText, totalUnit);
        const update: ProgressUpdate = { type: 'progress', percent };

        if (totalBytes !== undefined) {
            update.totalBytes = Math.round(totalBytes);
            update.downloadedBytes = Math.round((totalBytes * percent) / 100);
        }
        if (speedText && speedUnit) {
            update.speed = `${speedText}${speedUnit}/s`;
            const rate = parseSize(speedText, speedUnit);
            if (rate !== undefined) update.bytesPerSecond = Math.round(rate);
        }
        if (etaText && etaText !== 'Unknown') {
            update.etaSeconds = parseClock(etaText);
        }
        return [update];
    }

    const destination = DOWNLOAD_DESTINATION_PATTERN.exec(line);
    if (destination) {
        return [{ type: 'destination', path: destination[1], phase: 'download' }];
    }

    const existing = ALREADY_DOWNLOADED_PATTERN.exec(line);
    if (existing) {
        return [
            { type: 'destination', path: existing[1], phase: 'download' },
            { type: 'progress', percent: 100 },
        ];
    }

    const stage = STAGE_PATTERN.exec(line);
    if (stage) {
        const events: PipelineEvent[] = [{ type: 'stage', name: stage[1] }];
        const merged = MERGER_PATTERN.exec(line);
        const converted = merged ? null : POSTPROCESS_DESTINATION_PATTERN.exec(line);
        const target = merged?.[1] ?? converted?.[1];
        if (target) {
            events.push({ type: 'destination', path: target, phase: 'postprocess' });
        }
        return events;
    }

    return [];
}

/**
 * Remaining seconds from elapsed time and percent done.
 * Null until there is some progress to extrapolate from.
 */
export function deriveEta(elapsedSeconds: number, percent: number): number | null {
    if (percent <= 0) return null;
    if (percent >= 100) return 0;
    return Math.round((elapsedSeconds * (100 - percent)) / percent);
}

/**
 * Remaining seconds from byte counts and the current rate
 */
export function etaFromBytes(totalBytes: number, downloadedBytes: number, bytesPerSecond: number): number | null {
    if (bytesPerSecond <= 0 || totalBytes <= 0) return null;
    return Math.max(0, Math.round((totalBytes - downloadedBytes) / bytesPerSecond));
}
