import type { ScanResult } from '../nodes/ConfigGenerator/types/scanner';

/**
 * Utility class for logging config generation progress
 */
export class LoggingUtils {
	/**
	 * Log a message if verbose logging is enabled
	 */
	static log(message: string, verboseLogging: boolean): void {
		if (verboseLogging) {
			console.log(`[ConfigGenerator] ${message}`);
		}
	}

	/**
	 * Log an error if verbose logging is enabled
	 */
	static error(message: string, verboseLogging: boolean): void {
		if (verboseLogging) {
			console.error(`[ConfigGenerator] ${message}`);
		}
	}

	static debug(message: string, data?: unknown, verboseLogging?: boolean): void {
		if (verboseLogging) {
			if (data !== undefined) {
				console.debug(`[ConfigGenerator DEBUG] ${message}`, data);
			} else {
				console.debug(`[ConfigGenerator DEBUG] ${message}`);
			}
		}
	}

	/**
	 * Log what a scan pulled out of an old configuration
	 */
	static analyzeScan(result: ScanResult, verboseLogging: boolean): void {
		if (!verboseLogging) return;

		console.log(`[ConfigGenerator] Scan Summary:`);
		console.log(`  Lines: ${result.meta.linesProcessed}, directives: ${result.meta.matches}`);
		if (result.hostname) {
			const site = result.hostname.site ?? 'unresolved';
			console.log(`  Hostname: ${result.hostname.hostname} (site ${site}, ${result.hostname.switchType})`);
		} else {
			console.log(`  No hostname found`);
		}
		console.log(`  VLANs: ${Object.keys(result.vlans).length}`);

		for (const [kind, text] of Object.entries(result.blocks)) {
			if (text.length === 0) continue;
			const lineCount = text.split('\n').filter((line) => line.trim() !== '').length;
			console.log(`  ${kind}: ${lineCount} lines`);
		}
	}
}
