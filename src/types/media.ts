/**
 * Media types shared by the metadata probes, the quality resolver and the client
 */

// ============================================================================
// Formats
// ============================================================================

export type MediaKind = 'video' | 'audio' | 'video+audio';

export interface Resolution {
    width: number;
    height: number;
}

/**
 * One downloadable variant as reported by the extraction engine.
 * Produced frozen by the metadata layer and never mutated afterwards.
 */
export interface FormatDescriptor {
    readonly format_id: string;
    readonly media_kind: MediaKind;
    readonly resolution?: Resolution;
    readonly frame_rate?: number;
    readonly container: string;
    readonly note?: string;
    readonly filesize?: number;
    readonly bitrate?: number;
}

// ============================================================================
// Quality
// ============================================================================

export type QualitySource = 'player_probe' | 'extraction_probe' | 'unavailable';

export interface QualityEstimate {
    label: string;
    source: QualitySource;
    numeric_height?: number;
}

// ============================================================================
// Metadata
// ============================================================================

export type InfoSource = 'primary_api' | 'extraction_engine' | 'extraction_engine_degraded';

export interface VideoMetadata {
    readonly video_id: string;
    readonly original_url: string;
    readonly title: string;
    readonly uploader: string;
    readonly description?: string;
    readonly duration_seconds?: number;
    readonly channel_logo_url?: string;
    readonly thumbnail_url?: string;
    readonly view_count?: number;
    readonly like_count?: number;
    readonly subscriber_count?: number;
    readonly formats: readonly FormatDescriptor[];
    readonly info_source: InfoSource;
    readonly degraded: boolean;
    readonly engine_error?: string;
}

/**
 * Download request kinds accepted by the job layer.
 * Distinct from MediaKind: a request may ask for the thumbnail only.
 */
export type DownloadKind = 'video' | 'audio' | 'thumbnail';
