import { readFileSync, writeFileSync } from 'node:fs';

/**
 * Delimited text (CSV/TSV) with RFC 4180 quoting.
 */

export type Cell = string | number;

/**
 * Split delimited text into rows of fields.
 * Handles quoted fields with embedded delimiters, quotes ("") and newlines.
 * A trailing newline does not produce an empty row.
 */
export function parseDelimited(text: string, delimiter = ','): string[][] {
    const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
    const rows: string[][] = [];
    let row: string[] = [];
    let field = '';
    let inQuotes = false;

    for (let i = 0; i < input.length; i++) {
        const char = input.charAt(i);

        if (inQuotes) {
            if (char === '"') {
                if (input.charAt(i + 1) === '"') {
                    field += '"';
                    i++;
                } else {
                    inQuotes = false;
                }
            } else {
                field += char;
            }
            continue;
        }

        if (char === '"' && field === '') {
            inQuotes = true;
        } else if (char === delimiter) {
            row.push(field);
            field = '';
        } else if (char === '\n' || char === '\r') {
            if (char === '\r' && input.charAt(i + 1) === '\n') i++;
            row.push(field);
            rows.push(row);
            row = [];
            field = '';
        } else {
            field += char;
        }
    }

    if (field !== '' || row.length > 0) {
        row.push(field);
        rows.push(row);
    }

    return rows;
}

/**
 * Quote a field when it contains the delimiter, a quote or a line break.
 */
export function formatField(value: Cell, delimiter = ','): string {
    const text = String(value);
    if (text.includes(delimiter) || text.includes('"') || text.includes('\n') || text.includes('\r')) {
        return `"${text.replace(/"/g, '""')}"`;
    }
    return text;
}

export function formatRow(values: readonly Cell[], delimiter = ','): string {
    return values.map((value) => formatField(value, delimiter)).join(delimiter);
}

/**
 * Render a header and rows as delimited text, newline-terminated.
 */
export function formatTable(header: readonly string[], rows: Iterable<readonly Cell[]>, delimiter = ','): string {
    const lines = [formatRow(header, delimiter)];
    for (const row of rows) {
        lines.push(formatRow(row, delimiter));
    }
    return lines.join('\n') + '\n';
}

export interface Table {
    header: string[];
    rows: Array<Record<string, string>>;
}

/**
 * Read a delimited file whose first row is the header.
 * Short rows are padded with empty strings.
 */
export function readTable(path: string, delimiter = ','): Table {
    const [header = [], ...body] = parseDelimited(readFileSync(path, 'utf-8'), delimiter);

    const rows = body
        .filter((fields) => fields.some((field) => field !== ''))
        .map((fields) => {
            const record: Record<string, string> = {};
            header.forEach((column, index) => {
                record[column] = fields[index] ?? '';
            });
            return record;
        });

    return { header, rows };
}

export function writeTable(path: string, header: readonly string[], rows: Iterable<readonly Cell[]>, delimiter = ','): void {
    writeFileSync(path, formatTable(header, rows, delimiter), 'utf-8');
}
