/**
 * QualityResolver - Merges the player-probe signal and the extraction-probe
 * format list into one quality label and the options offered for selection.
 *
 * Pure: both inputs are optional and may disagree; this module owns the
 * reconciliation and nothing else decides precedence.
 */

import { DownloadKind, FormatDescriptor, QualityEstimate } from '../types';
import {
    isHighResolution,
    labelForHeight,
    tierForPlayerLevel,
    UNAVAILABLE_LABEL,
} from './tiers';

export const BEST_OPTION_VALUE = 'best';
export const BEST_AUDIO_OPTION_VALUE = 'bestaudio';

export interface QualityOption {
    value: string;
    label: string;
    height?: number;
    frameRate?: number;
    container?: string;
    synthetic: boolean;
}

export interface QualityInputs {
    kind: DownloadKind;
    playerLevel?: string | null;
    formats?: readonly FormatDescriptor[] | null;
}

export interface ResolvedQuality {
    estimate: QualityEstimate;
    highResolution: boolean;
    options: QualityOption[];
}

// ============================================================================
// Estimates
// ============================================================================

export function estimateFromPlayerLevel(level: string | null | undefined): QualityEstimate | null {
    if (!level) return null;
    const tier = tierForPlayerLevel(level);
    if (!tier) return null;
    return { label: tier.label, source: 'player_probe', numeric_height: tier.height };
}

export function videoFormatsOf(formats: readonly FormatDescriptor[]): FormatDescriptor[] {
    return formats.filter(
        (f) => f.media_kind !== 'audio' && f.resolution !== undefined && f.resolution.height > 0,
    );
}

export function estimateFromFormats(formats: readonly FormatDescriptor[] | null | undefined): QualityEstimate | null {
    if (!formats) return null;
    const video = videoFormatsOf(formats);
    if (video.length === 0) return null;

    const maxHeight = Math.max(...video.map((f) => f.resolution?.height ?? 0));
    return { label: labelForHeight(maxHeight), source: 'extraction_probe', numeric_height: maxHeight };
}

/**
 * Player signal first, extraction signal second, "Unavailable" last
 */
export function resolveEstimate(inputs: Omit<QualityInputs, 'kind'>): QualityEstimate {
    return (
        estimateFromPlayerLevel(inputs.playerLevel) ??
        estimateFromFormats(inputs.formats) ?? { label: UNAVAILABLE_LABEL, source: 'unavailable' }
    );
}

// ============================================================================
// Options
// ============================================================================

function compareVideoFormats(a: FormatDescriptor, b: FormatDescriptor): number {
    const heightA = a.resolution?.height ?? 0;
    const heightB = b.resolution?.height ?? 0;
    if (heightB !== heightA) return heightB - heightA;
    return (b.frame_rate ?? 0) - (a.frame_rate ?? 0);
}

function videoOptionLabel(format: FormatDescriptor): string {
    const height = format.resolution?.height ?? 0;
    let label = `${labelForHeight(height)} (${height}p)`;
    if (format.frame_rate && format.frame_rate > 30) label += ` ${format.frame_rate}fps`;
    if (format.container) label += ` - ${format.container}`;
    return label;
}

function bestOption(estimate: QualityEstimate): QualityOption {
    const label =
        estimate.source === 'unavailable'
            ? 'Best Quality Available'
            : `Best Quality Available (${estimate.label})`;
    return { value: BEST_OPTION_VALUE, label, height: estimate.numeric_height, synthetic: true };
}

function buildVideoOptions(formats: readonly FormatDescriptor[], estimate: QualityEstimate): QualityOption[] {
    const sorted = videoFormatsOf(formats).sort(compareVideoFormats);
    const seen = new Set<string>();
    const options: QualityOption[] = [bestOption(estimate)];

    for (const format of sorted) {
        const height = format.resolution?.height ?? 0;
        const key = `${height}:${format.frame_rate ?? 0}:${format.container}`;
        if (seen.has(key)) continue;
        seen.add(key);

        options.push({
            value: format.format_id,
            label: videoOptionLabel(format),
            height,
            frameRate: format.frame_rate,
            container: format.container,
            synthetic: false,
        });
    }
    return options;
}

/**
 * Highest-bitrate audio-only format, larger file on ties
 */
export function selectBestAudio(formats: readonly FormatDescriptor[]): FormatDescriptor | null {
    const audio = formats.filter((f) => f.media_kind === 'audio');
    if (audio.length === 0) return null;
    return [...audio].sort(
        (a, b) => (b.bitrate ?? 0) - (a.bitrate ?? 0) || (b.filesize ?? 0) - (a.filesize ?? 0),
    )[0];
}

function buildAudioOptions(formats: readonly FormatDescriptor[]): QualityOption[] {
    const best = selectBestAudio(formats);
    if (!best) {
        return [{ value: BEST_AUDIO_OPTION_VALUE, label: 'Audio Only (MP3)', synthetic: true }];
    }
    const detail = best.bitrate ? `${Math.round(best.bitrate)}kbps` : best.note ?? best.container;
    return [
        {
            value: best.format_id,
            label: `Audio Only (MP3, ${detail})`,
            container: best.container,
            synthetic: false,
        },
    ];
}

// ============================================================================
// Entry point
// ============================================================================

export function resolveQuality(inputs: QualityInputs): ResolvedQuality {
    const formats = inputs.formats ?? [];
    const estimate = resolveEstimate(inputs);

    let options: QualityOption[];
    switch (inputs.kind) {
        case 'video':
            options = buildVideoOptions(formats, estimate);
            break;
        case 'audio':
            options = buildAudioOptions(formats);
            break;
        case 'thumbnail':
        default:
            options = [];
            break;
    }

    return {
        estimate,
        highResolution:
            estimate.source !== 'unavailable' && isHighResolution(estimate.label, estimate.numeric_height),
        options,
    };
}
