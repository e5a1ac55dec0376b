/**
 * Normalisation helpers shared by the evidence extractors
 */

const CORPORATE_SUFFIXES = new Set([
    'inc', 'incorporated', 'llc', 'ltd', 'limited', 'gmbh', 'ag', 'corp',
    'corporation', 'co', 'company', 'plc', 'sa', 'sarl', 'bv', 'nv', 'pty', 'lp', 'llp',
]);

/**
 * Strip the extension from a filename (last dot segment only)
 */
export function stripExtension(filename: string): string {
    const base = filename.split(/[\\/]/).pop() ?? filename;
    const dot = base.lastIndexOf('.');
    return dot > 0 ? base.slice(0, dot) : base;
}

/**
 * Lowercased tokens of a filename, split on non-alphanumeric runs
 * and on letter/digit boundaries: "INV_2024-001v2.pdf" → [inv, 2024, 001, v, 2]
 */
export function tokenizeFilename(filename: string): string[] {
    return stripExtension(filename)
        .toLowerCase()
        .split(/[^a-z0-9]+/)
        .flatMap(part => part.match(/[a-z]+|[0-9]+/g) ?? [])
        .filter(token => token.length > 0);
}

export function isNumericToken(token: string): boolean {
    return /^[0-9]+$/.test(token);
}

/**
 * "007" and "7" denote the same document number
 */
export function stripLeadingZeros(token: string): string {
    const stripped = token.replace(/^0+/, '');
    return stripped === '' ? '0' : stripped;
}

/**
 * Tokens of an organisation name with punctuation and corporate suffixes removed
 */
export function normalizeNameTokens(name: string): string[] {
    const tokens = name
        .toLowerCase()
        .replace(/&/g, ' and ')
        .split(/[^a-z0-9]+/)
        .filter(token => token.length > 0);

    const meaningful = tokens.filter(token => !CORPORATE_SUFFIXES.has(token));
    // A name made only of suffixes ("The Company") keeps its tokens
    return meaningful.length > 0 ? meaningful : tokens;
}

/**
 * Share of the shorter name's token set found in the longer one
 */
export function tokenSetOverlap(a: readonly string[], b: readonly string[]): number {
    const setA = new Set(a);
    const setB = new Set(b);
    if (setA.size === 0 || setB.size === 0) return 0;

    const [shorter, longer] = setA.size <= setB.size ? [setA, setB] : [setB, setA];
    let shared = 0;
    for (const token of shorter) {
        if (longer.has(token)) shared++;
    }
    return shared / shorter.size;
}

export function normalizeTaxId(value: string): string {
    return value.toUpperCase().replace(/[^A-Z0-9]/g, '');
}

/**
 * Amounts compared to the cent
 */
export function toCents(amount: number): number {
    return Math.round(amount * 100);
}
