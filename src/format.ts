/**
 * Human-readable rendering used by every `toString()` in the library.
 * Output is for debugging only and takes no part in equality.
 */

/**
 * Renders a single key, value or element.
 * Strings are quoted so that `"1"` and `1` stay distinguishable.
 */
export function formatValue(value: unknown): string {
    if (typeof value === 'string') return JSON.stringify(value);
    if (typeof value === 'bigint') return `${value}n`;
    if (Array.isArray(value)) return `[${value.map(formatValue).join(', ')}]`;
    return String(value);
}

export function formatSequence(values: Iterable<unknown>): string {
    const parts: string[] = [];
    for (const v of values) parts.push(formatValue(v));
    return parts.join(', ');
}

export function formatPairs(pairs: Iterable<readonly [unknown, unknown]>): string {
    const parts: string[] = [];
    for (const [k, v] of pairs) parts.push(`${formatValue(k)}: ${formatValue(v)}`);
    return parts.join(', ');
}
