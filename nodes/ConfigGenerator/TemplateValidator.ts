import type { BlockKind } from './types/model';

// Replacement order of the block substitution markers.
export const BLOCK_MARKERS: ReadonlyArray<readonly [string, BlockKind]> = [
	['!!!vlan_priority', 'vlanPriority'],
	['!!!Interfaces', 'interfaces'],
	['!!!router_config', 'routerConfig'],
	['!!!rp-address', 'rpAddress'],
	['!!!ip_route', 'ipRoute'],
	['!!!logging', 'logging'],
];

const MARKER_PATTERN = /!!![A-Za-z_-]+/g;

export class TemplateValidator {
	static validate(name: string, source: string): { valid: true } | { valid: false; errors: string[] } {
		const errors: string[] = [];

		if (!name) errors.push('Missing template name');
		if (source.trim() === '') errors.push(`Template ${name} is empty`);

		const known = new Set(BLOCK_MARKERS.map(([marker]) => marker));
		for (const match of source.matchAll(MARKER_PATTERN)) {
			if (!known.has(match[0])) {
				errors.push(`Unknown block marker ${match[0]} in template ${name}`);
			}
		}

		if (errors.length > 0) return { valid: false, errors };
		return { valid: true };
	}
}
