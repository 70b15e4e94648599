import { buildNamingConvention, DEFAULT_NAMING } from './IdentifierParser';
import { DEFAULT_MASTER_TEMPLATE } from './TemplateManager';
import type { NamingConvention } from './types/model';

export interface GeneratorOptions {
	storageDir?: string;
	bundledDir?: string;
	masterTemplate: string;
	chassisId: string;
	naming: NamingConvention;
	verboseLogging: boolean;
	lockedRetries: number;
}

export const DEFAULT_OPTIONS: GeneratorOptions = {
	masterTemplate: DEFAULT_MASTER_TEMPLATE,
	chassisId: '',
	naming: DEFAULT_NAMING,
	verboseLogging: false,
	lockedRetries: 0,
};

function parseSiteMapping(raw: unknown): Record<string, string> | undefined {
	if (typeof raw !== 'string' || raw.trim() === '') return undefined;
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (e) {
		throw new Error(`Invalid site mapping JSON: ${(e as Error).message}`);
	}
	if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
		throw new Error('Site mapping must be a JSON object of prefix to site name');
	}
	const mapping: Record<string, string> = {};
	for (const [prefix, site] of Object.entries(parsed)) {
		if (typeof site !== 'string') throw new Error(`Site mapping for ${prefix} must be a string`);
		mapping[prefix] = site;
	}
	return mapping;
}

function parsePrefixList(raw: unknown): string[] | undefined {
	if (typeof raw !== 'string' || raw.trim() === '') return undefined;
	return raw
		.split(',')
		.map((s) => s.trim())
		.filter((s) => s.length > 0);
}

function optionalString(raw: unknown): string | undefined {
	return typeof raw === 'string' && raw.trim() !== '' ? raw.trim() : undefined;
}

export function buildOptionsFromParams(params: Record<string, unknown>): GeneratorOptions {
	const sites = parseSiteMapping(params['siteMapping']);
	const accessPrefixes = parsePrefixList(params['accessRolePrefixes']);
	const retries = params['lockedRetries'];

	return {
		storageDir: optionalString(params['storageDir']),
		masterTemplate: optionalString(params['masterTemplate']) ?? DEFAULT_OPTIONS.masterTemplate,
		chassisId: optionalString(params['chassisId']) ?? DEFAULT_OPTIONS.chassisId,
		naming: sites || accessPrefixes ? buildNamingConvention(sites, accessPrefixes) : DEFAULT_OPTIONS.naming,
		verboseLogging: params['verboseLogging'] === true,
		lockedRetries: typeof retries === 'number' ? retries : DEFAULT_OPTIONS.lockedRetries,
	};
}
