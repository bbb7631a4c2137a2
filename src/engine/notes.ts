// The transaction model has no tag list, no external id and no destination account.
// Rule actions keep those in the notes text using the encodings below.

export const TAG_SEPARATOR = ', ';
export const MARKER_SEPARATOR = ' | ';
export const DELETED_MARKER = '[DELETED by rule]';
export const EXTERNAL_ID_PREFIX = 'External ID: ';
export const INTERNAL_REFERENCE_PREFIX = 'Ref: ';
export const TRANSFER_PREFIX = 'Transfer to: ';

/**
 * Tags are the comma-separated parts of the notes.
 */
export function parseTags(notes: string | null): string[] {
    if (notes === null) {
        return [];
    }
    return notes.split(',').map(tag => tag.trim()).filter(tag => tag !== '');
}

export function joinTags(tags: readonly string[]): string | null {
    return tags.length === 0 ? null : tags.join(TAG_SEPARATOR);
}

export function addTag(notes: string | null, tag: string): string | null {
    const tags = parseTags(notes);
    if (tags.includes(tag)) {
        return notes;
    }
    return joinTags([...tags, tag]);
}

export function removeTag(notes: string | null, tag: string): string | null {
    const tags = parseTags(notes);
    if (!tags.includes(tag)) {
        return notes;
    }
    return joinTags(tags.filter(existing => existing !== tag));
}

export function appendMarker(notes: string | null, marker: string): string {
    return notes === null || notes === '' ? marker : `${notes}${MARKER_SEPARATOR}${marker}`;
}

export function markDeleted(notes: string | null): string {
    return notes === null || notes === '' ? DELETED_MARKER : `${DELETED_MARKER} ${notes}`;
}

/**
 * Value of the last `<prefix><value>` marker in the notes, or null.
 * The value ends at the first comma, where tags added after the marker begin.
 */
export function readMarker(notes: string | null, prefix: string): string | null {
    if (notes === null) {
        return null;
    }
    const segments = notes.split(MARKER_SEPARATOR).filter(segment => segment.startsWith(prefix));
    if (segments.length === 0) {
        return null;
    }
    const [value] = segments[segments.length - 1].slice(prefix.length).split(',');
    return value.trimEnd();
}

export function transferMarker(accountName: string, iban: string): string {
    return `${TRANSFER_PREFIX}${accountName} (${iban})`;
}

/**
 * Name of the destination account recorded by setDestinationAccount, or null.
 */
export function readTransferDestination(notes: string | null): string | null {
    const marker = readMarker(notes, TRANSFER_PREFIX);
    if (marker === null) {
        return null;
    }
    const open = marker.lastIndexOf(' (');
    return open === -1 ? marker : marker.slice(0, open);
}

/**
 * Records a destination account, replacing an earlier transfer marker.
 */
export function writeTransferDestination(notes: string | null, accountName: string, iban: string): string {
    const remaining = notes === null
        ? []
        : notes.split(MARKER_SEPARATOR).filter(segment => segment !== '' && !segment.startsWith(TRANSFER_PREFIX));
    return [...remaining, transferMarker(accountName, iban)].join(MARKER_SEPARATOR);
}
