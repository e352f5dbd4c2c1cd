/**
 * Filename codec for synced files.
 *
 * Files are named {YYYY-MM-DD}_{title}_{shortId}.txt and the trailing short id
 * is the only link between a file on disk and the document it came from.
 */

export const SYNCED_EXTENSION = '.txt';
export const SHORT_ID_LENGTH = 8;
export const MAX_TITLE_LENGTH = 70;
export const MAX_FOLDER_LENGTH = 100;
export const UNTITLED = 'untitled';
export const UNNAMED_FOLDER = 'unnamed_folder';

// Characters invalid in filenames on Windows/macOS/Linux
const INVALID_CHARS = /[<>:"/\\|?*\x00-\x1f]/g;

export interface FilenameCodec {
    readonly extension: string;
    shortId(id: string): string;
    encode(title: string, id: string, createdAt: string): string;
    decode(filename: string): string;
}

export function shortId(id: string): string {
    return id.length >= SHORT_ID_LENGTH ? id.slice(0, SHORT_ID_LENGTH) : id;
}

/**
 * Truncate by code point so surrogate pairs are never split
 */
function truncate(value: string, max: number): string {
    const chars = Array.from(value);
    return chars.length > max ? chars.slice(0, max).join('') : value;
}

function stripInvalid(value: string): string {
    return value
        .trim()
        .replace(INVALID_CHARS, '_')
        .replace(/_+/g, '_')
        .replace(/^_+|_+$/g, '');
}

export function sanitizeTitle(title: string): string {
    const name = stripInvalid(title);
    return truncate(name || UNTITLED, MAX_TITLE_LENGTH);
}

export function sanitizeFolderName(name: string): string {
    const sanitized = stripInvalid(name);
    // "." and ".." would resolve outside the folder's own directory
    if (!sanitized || /^\.+$/.test(sanitized)) {
        return UNNAMED_FOLDER;
    }
    return truncate(sanitized, MAX_FOLDER_LENGTH);
}

/**
 * YYYY-MM-DD as written in the timestamp itself, so the date follows the
 * offset the service recorded rather than the local timezone.
 */
export function datePrefix(createdAt: string): string {
    const match = /^(\d{4}-\d{2}-\d{2})/.exec(createdAt.trim());
    if (match) return match[1];

    const parsed = new Date(createdAt);
    const date = Number.isNaN(parsed.getTime()) ? new Date() : parsed;
    return date.toISOString().slice(0, 10);
}

export function encodeFilename(title: string, id: string, createdAt: string): string {
    return `${datePrefix(createdAt)}_${sanitizeTitle(title)}_${shortId(id)}${SYNCED_EXTENSION}`;
}

/**
 * Recover the short id from a filename, or '' when the name does not carry one
 */
export function decodeFilename(filename: string): string {
    const name = filename.endsWith(SYNCED_EXTENSION)
        ? filename.slice(0, -SYNCED_EXTENSION.length)
        : filename;

    const lastUnderscore = name.lastIndexOf('_');
    if (lastUnderscore === -1 || lastUnderscore === name.length - 1) {
        return '';
    }

    const candidate = name.slice(lastUnderscore + 1);
    return candidate.length >= SHORT_ID_LENGTH ? candidate.slice(0, SHORT_ID_LENGTH) : '';
}

/**
 * Flat export names: no date prefix or short id, so collisions are resolved
 * with {@link makeUnique}.
 */
export function sanitizeFilename(name: string, fallback: string = UNTITLED): string {
    const sanitized = stripInvalid(name.trim() || fallback) || stripInvalid(fallback) || UNTITLED;
    return truncate(sanitized, MAX_FOLDER_LENGTH);
}

/**
 * Second and later uses of a name get a `_2`, `_3`, ... suffix
 */
export function makeUnique(filename: string, used: Map<string, number>): string {
    const count = used.get(filename) ?? 0;
    used.set(filename, count + 1);
    return count > 0 ? `${filename}_${count + 1}` : filename;
}

export const defaultCodec: FilenameCodec = {
    extension: SYNCED_EXTENSION,
    shortId,
    encode: encodeFilename,
    decode: decodeFilename,
};
