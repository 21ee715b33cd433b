/**
 * Quality tier tables shared by both quality signals
 */

export interface PlayerTier {
    label: string;
    height: number;
}

// Levels reported by the embedded player, highest first
export const PLAYER_LEVEL_TIERS: Record<string, PlayerTier> = {
    highres: { label: '8K', height: 4320 },
    hd2880: { label: '5K', height: 2880 },
    hd2160: { label: '4K', height: 2160 },
    hd1440: { label: '2K', height: 1440 },
    hd1080: { label: 'Full HD', height: 1080 },
    hd720: { label: 'HD', height: 720 },
    large: { label: '480p', height: 480 },
    medium: { label: '360p', height: 360 },
    small: { label: '240p', height: 240 },
    tiny: { label: '144p', height: 144 },
};

export const HIGH_RESOLUTION_LABELS: ReadonlySet<string> = new Set(['2K', '4K', '5K', '8K']);

export const HIGH_RESOLUTION_MIN_HEIGHT = 1440;

export const UNAVAILABLE_LABEL = 'Unavailable';

/**
 * Map a player level to a tier. Unknown hdNNN levels become "NNNp".
 */
export function tierForPlayerLevel(level: string): PlayerTier | null {
    const normalized = level.trim().toLowerCase();
    const known = PLAYER_LEVEL_TIERS[normalized];
    if (known) return known;

    const match = /^hd(\d+)$/.exec(normalized);
    if (match) {
        const height = parseInt(match[1], 10);
        if (height > 0) return { label: `${height}p`, height };
    }
    return null;
}

/**
 * Threshold label for a numeric height
 */
export function labelForHeight(height: number): string {
    if (height >= 2160) return '4K';
    if (height >= 1440) return '2K';
    if (height >= 1080) return 'Full HD';
    if (height >= 720) return 'HD';
    return 'SD';
}

export function isHighResolution(label: string, height?: number): boolean {
    return HIGH_RESOLUTION_LABELS.has(label) || (height !== undefined && height >= HIGH_RESOLUTION_MIN_HEIGHT);
}
