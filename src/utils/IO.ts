// IO.ts - Import/export utilities for labeled training data

import fs from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';

export interface LabeledExample {
    text: string;
    label: string;
}

export type Delimiter = ',' | '\t';

export type TrainingDataFormat = 'json' | 'csv' | 'tsv';

export class IO {
    static importJSON(json: string): LabeledExample[] {
        try {
            const data: unknown = JSON.parse(json);
            if (!Array.isArray(data)) throw new Error('Invalid format');
            return data.filter(isLabeledExample).map(({ text, label }) => ({ text, label }));
        } catch (err) {
            console.error('Failed to parse training data JSON:', err);
            return [];
        }
    }

    static exportJSON(pairs: readonly LabeledExample[]): string {
        return JSON.stringify(pairs, null, 2);
    }

    /**
     * Parse delimited text. With a header row the `text` and `label` columns
     * are found by name; otherwise the first two columns are used.
     */
    static importDelimited(text: string, delimiter: Delimiter = ',', hasHeader = true): LabeledExample[] {
        const rows: string[][] = parse(text, {
            delimiter,
            skip_empty_lines: true,
            relax_column_count: true,
            trim: true,
        });
        if (rows.length === 0) return [];

        let textIdx = 0;
        let labelIdx = 1;
        if (hasHeader) {
            const headers = rows[0].map(h => h.toLowerCase());
            if (headers.includes('text')) textIdx = headers.indexOf('text');
            if (headers.includes('label')) labelIdx = headers.indexOf('label');
        }

        const examples: LabeledExample[] = [];
        for (const row of hasHeader ? rows.slice(1) : rows) {
            const exampleText = row[textIdx];
            const label = row[labelIdx];
            if (exampleText && label) {
                examples.push({ text: exampleText, label });
            }
        }
        return examples;
    }

    static exportDelimited(pairs: readonly LabeledExample[], delimiter: Delimiter = ',', includeHeader = true): string {
        const header = includeHeader ? `text${delimiter}label\n` : '';
        const rows = pairs.map(p => `${quoteField(p.text, delimiter)}${delimiter}${quoteField(p.label, delimiter)}`);
        return header + rows.join('\n');
    }

    static importCSV(csv: string, hasHeader = true): LabeledExample[] {
        return this.importDelimited(csv, ',', hasHeader);
    }

    static exportCSV(pairs: readonly LabeledExample[], includeHeader = true): string {
        return this.exportDelimited(pairs, ',', includeHeader);
    }

    static importTSV(tsv: string, hasHeader = true): LabeledExample[] {
        return this.importDelimited(tsv, '\t', hasHeader);
    }

    static exportTSV(pairs: readonly LabeledExample[], includeHeader = true): string {
        return this.exportDelimited(pairs, '\t', includeHeader);
    }

    static formatOf(filePath: string): TrainingDataFormat {
        const ext = path.extname(filePath).toLowerCase();
        if (ext === '.csv') return 'csv';
        if (ext === '.tsv') return 'tsv';
        return 'json';
    }

    static parse(raw: string, format: TrainingDataFormat = 'json'): LabeledExample[] {
        switch (format) {
            case 'csv':
                return this.importCSV(raw);
            case 'tsv':
                return this.importTSV(raw);
            case 'json':
            default:
                return this.importJSON(raw);
        }
    }

    static readFile(filePath: string): LabeledExample[] {
        const raw = fs.readFileSync(filePath, 'utf8');
        return this.parse(raw, this.formatOf(filePath));
    }
}

function isLabeledExample(item: unknown): item is LabeledExample {
    if (typeof item !== 'object' || item === null) return false;
    return 'text' in item && typeof item.text === 'string'
        && 'label' in item && typeof item.label === 'string';
}

function quoteField(value: string, delimiter: Delimiter): string {
    // Unquoted fields are trimmed on import
    if (!value.includes(delimiter) && !/["\r\n]|^\s|\s$/.test(value)) return value;
    return `"${value.replace(/"/g, '""')}"`;
}
