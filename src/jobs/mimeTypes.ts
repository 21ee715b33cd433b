import path from 'path';

const MIME_TYPES: Record<string, string> = {
    '.mp4': 'video/mp4',
    '.mkv': 'video/x-matroska',
    '.webm': 'video/webm',
    '.mp3': 'audio/mpeg',
    '.m4a': 'audio/mp4',
    '.opus': 'audio/ogg',
    '.jpg': 'image/jpeg',
    '.jpeg': 'image/jpeg',
    '.png': 'image/png',
    '.webp': 'image/webp',
};

export function mimeTypeFor(filePath: string): string {
    return MIME_TYPES[path.extname(filePath).toLowerCase()] ?? 'application/octet-stream';
}

/**
 * File extension for an image response's content type
 */
export function imageExtensionFor(contentType: string | null): string {
    const type = (contentType ?? '').split(';')[0].trim().toLowerCase();
    switch (type) {
        case 'image/png':
            return '.png';
        case 'image/webp':
            return '.webp';
        default:
            return '.jpg';
    }
}
