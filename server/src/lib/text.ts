/**
 * Loose normalization for comparing titles and artist names across sources.
 * "Sorry (feat. X) & Co" -> "sorry and co"
 */
export function slug(s: string): string {
    return s
        .toLowerCase()
        .replace(/\(.*?\)/g, " ") // remove (feat...) etc
        .replace(/\bfeat\.?\b/g, " ")
        .replace(/\bft\.?\b/g, " ")
        .replace(/&/g, " and ")
        .replace(/[^a-z0-9]+/g, " ")
        .trim()
        .replace(/\s+/g, " ");
}

/** Key for "same song by the same artist" across different catalog ids. */
export function songArtistKey(title: string, artist: string): string {
    return `${slug(title)}||${slug(artist)}`;
}

/** Strips featuring credits and bracketed tags before a free-text lookup. */
export function cleanSearchText(s: string): string {
    return s
        .replace(/\(feat\..*?\)/gi, "")
        .replace(/\[.*?\]/g, "")
        .replace(/\s+/g, " ")
        .trim();
}
