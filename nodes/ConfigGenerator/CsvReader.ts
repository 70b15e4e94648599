import fs from 'fs-extra';
import { MalformedCsvEncodingError } from './errors';
import { readInputFile } from './InputReader';
import type { CsvRow } from './types/model';

export interface ParsedCsv {
	headers: string[];
	rows: CsvRow[];
}

const normalizeBom = (text: string) => (text.charCodeAt(0) === 0xfeff ? text.slice(1) : text);

/**
 * Decode CSV bytes as UTF-8. NUL bytes or invalid sequences mean the file is
 * not text.
 */
export function decodeCsv(bytes: Uint8Array, source: string): string {
	if (bytes.includes(0)) throw new MalformedCsvEncodingError(source);
	try {
		return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
	} catch {
		throw new MalformedCsvEncodingError(source);
	}
}

/** Header row plus quoted fields, with `""` as an escaped quote. */
export function parseCsv(csvText: string): ParsedCsv {
	const normalized = normalizeBom(csvText).replace(/\r\n/g, '\n').replace(/\r/g, '\n');

	const records: string[][] = [];
	let current: string[] = [];
	let field = '';
	let inQuotes = false;

	const pushField = () => {
		current.push(field);
		field = '';
	};

	const pushRecord = () => {
		// blank lines carry no row
		if (!(current.length === 1 && current[0].trim() === '')) records.push(current);
		current = [];
	};

	for (let i = 0; i < normalized.length; i += 1) {
		const ch = normalized[i];

		if (ch === '"') {
			if (inQuotes && normalized[i + 1] === '"') {
				field += '"';
				i += 1;
			} else {
				inQuotes = !inQuotes;
			}
			continue;
		}

		if (ch === ',' && !inQuotes) {
			pushField();
			continue;
		}

		if (ch === '\n' && !inQuotes) {
			pushField();
			pushRecord();
			continue;
		}

		field += ch;
	}
	pushField();
	pushRecord();

	const headers = (records.shift() ?? []).map((h) => h.trim());
	const rows = records.map((values) => {
		const row: CsvRow = {};
		headers.forEach((header, idx) => {
			row[header] = values[idx] ?? '';
		});
		return row;
	});

	return { headers, rows };
}

export async function readCsvFile(filePath: string): Promise<ParsedCsv> {
	const bytes = await readInputFile(filePath, (p) => fs.readFile(p));
	return parseCsv(decodeCsv(bytes, filePath));
}
