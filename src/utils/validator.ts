// Validates that the string is an absolute http(s) URL.
export function isValidUrl(url: string): boolean {
    if (!/^https?:\/\//i.test(url)) return false;
    try {
        const parsed = new URL(url);
        return parsed.hostname.length > 0;
    } catch {
        return false;
    }
}

// Strips characters that are illegal in file names or meaningful to yt-dlp output templates.
export function sanitizeFilename(fileName: string): string {
    return fileName
        .replace(/[\/\\?%*:|"<>]/g, '')
        .replace(/\s+/g, ' ')
        .trim()
        .slice(0, 200);
}

// Splits a command-line fragment into arguments, honouring single and double quotes.
export function splitArgs(input: string): string[] {
    const args: string[] = [];
    let current = '';
    let quote: '"' | "'" | null = null;
    let hasToken = false;

    for (let i = 0; i < input.length; i++) {
        const ch = input.charAt(i);

        if (quote) {
            if (ch === quote) {
                quote = null;
            } else if (ch === '\\' && quote === '"' && i + 1 < input.length) {
                current += input.charAt(++i);
            } else {
                current += ch;
            }
            continue;
        }

        if (ch === '"' || ch === "'") {
            quote = ch;
            hasToken = true;
        } else if (/\s/.test(ch)) {
            if (hasToken) {
                args.push(current);
                current = '';
                hasToken = false;
            }
        } else if (ch === '\\' && i + 1 < input.length) {
            current += input.charAt(++i);
            hasToken = true;
        } else {
            current += ch;
            hasToken = true;
        }
    }

    if (quote) {
        throw new Error(`Unterminated ${quote} quote in: ${input}`);
    }
    if (hasToken) args.push(current);
    return args;
}

// Parses "1,3,5-7" into [1, 3, 5, 6, 7] (1-based playlist positions).
export function parseIndexList(input: string): number[] {
    const indices = new Set<number>();
    for (const part of input.split(',').map((p) => p.trim()).filter((p) => p.length > 0)) {
        const range = part.match(/^(\d+)-(\d+)$/);
        if (range?.[1] && range[2]) {
            const from = parseInt(range[1], 10);
            const to = parseInt(range[2], 10);
            if (from < 1 || to < from) {
                throw new Error(`Invalid index range: ${part}`);
            }
            for (let i = from; i <= to; i++) indices.add(i);
        } else if (/^\d+$/.test(part) && parseInt(part, 10) >= 1) {
            indices.add(parseInt(part, 10));
        } else {
            throw new Error(`Invalid index: ${part}`);
        }
    }
    return [...indices].sort((a, b) => a - b);
}
