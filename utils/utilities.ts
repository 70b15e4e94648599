export const BANNER_WIDTH = 79;

/**
 * Date stamp used in output file names, e.g. 2025_01_26
 */
export function formatDateStamp(date: Date): string {
	const year = String(date.getFullYear());
	const month = String(date.getMonth() + 1).padStart(2, '0');
	const day = String(date.getDate()).padStart(2, '0');
	return `${year}_${month}_${day}`;
}

/**
 * Center text within a fixed width, padding both sides with spaces.
 * Odd padding puts the extra space on the right.
 */
export function centerText(text: string, width: number): string {
	if (text.length >= width) return text;
	const padding = width - text.length;
	const left = Math.floor(padding / 2);
	return `${' '.repeat(left)}${text}${' '.repeat(padding - left)}`;
}

/**
 * Section banner written ahead of each adjacency block
 */
export function formatBanner(title: string): string {
	const rule = '*'.repeat(BANNER_WIDTH);
	return `${rule}\n${centerText(title, BANNER_WIDTH)}\n${rule}\n`;
}

/**
 * Validate node parameters before any file is touched
 */
export function validateGeneratorParams(
	operation: string,
	inputPath: string,
	storageDir?: string,
	lockedRetries?: number,
): string[] {
	const errors: string[] = [];

	if (!inputPath || inputPath.trim() === '') {
		errors.push(operation === 'generateBaseConfigs' ? 'CSV file path is required' : 'Old config file path is required');
	}

	if (storageDir !== undefined && storageDir.trim() === '') {
		errors.push('Storage directory must not be blank');
	}

	if (lockedRetries !== undefined && (!Number.isInteger(lockedRetries) || lockedRetries < 0)) {
		errors.push('Locked file retries must be a whole number of zero or more');
	}

	return errors;
}

/**
 * Generate a one-line summary of a finished run for logging
 */
export function generateRunSummary(operation: string, source: string, outputs: string[]): string {
	const noun = outputs.length === 1 ? 'file' : 'files';
	return `${operation}: ${source} -> ${outputs.length} ${noun}`;
}
