/**
 * Identifier helpers shared by the parser, the catalog client and the reports.
 */

const DOI_MARKER = 'doi.org/';

/**
 * Reduce a provider identifier to its bare trailing segment.
 *
 * "https://openalex.org/W123456789/" → "W123456789"
 * "https://doi.org/10.1234/abc"      → "10.1234/abc"
 * "https://ror.org/03490as77"        → "03490as77"
 *
 * DOIs keep their inner slashes: everything after the resolver host is
 * returned. Null, undefined, blank or separator-only input yields null.
 */
export function normalizeId(value: string | null | undefined): string | null {
    if (typeof value !== 'string') return null;

    const trimmed = value.trim().replace(/\/+$/, '');
    if (!trimmed) return null;

    const doiIndex = trimmed.toLowerCase().indexOf(DOI_MARKER);
    if (doiIndex !== -1) {
        return trimmed.slice(doiIndex + DOI_MARKER.length) || null;
    }

    return trimmed.slice(trimmed.lastIndexOf('/') + 1) || null;
}

/**
 * Normalize a list of identifiers, dropping the ones that normalize to null.
 */
export function normalizeIds(values: ReadonlyArray<string | null | undefined> | null | undefined): string[] {
    if (!values) return [];
    return values
        .map((value) => normalizeId(value))
        .filter((id): id is string => id !== null);
}
