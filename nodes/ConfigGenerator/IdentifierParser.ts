import { MalformedHostnameError } from './errors';
import type { HostnameInfo, NamingConvention } from './types/model';

export const DEFAULT_NAMING: NamingConvention = Object.freeze({
	sitePrefixes: Object.freeze({ S1: 'site_1', S2: 'site_2', S3: 'Site_3' }),
	accessRolePrefixes: Object.freeze(['AS', 'SE', 'EN']),
});

export function buildNamingConvention(
	sitePrefixes?: Record<string, string>,
	accessRolePrefixes?: string[],
): NamingConvention {
	const sites: Record<string, string> = {};
	for (const [prefix, site] of Object.entries(sitePrefixes ?? DEFAULT_NAMING.sitePrefixes)) {
		sites[prefix.toUpperCase()] = site;
	}
	const roles = accessRolePrefixes
		? Object.freeze(accessRolePrefixes.map((p) => p.toUpperCase()))
		: DEFAULT_NAMING.accessRolePrefixes;
	return Object.freeze({ sitePrefixes: Object.freeze(sites), accessRolePrefixes: roles });
}

/**
 * Parse a hostname following SITE-ROLE-BUILDING-ROOM-INSTANCE, e.g. S1-EN-3320-104-1.
 *
 * An unknown site prefix leaves `site` unset. Fewer than four hyphen segments
 * throws MalformedHostnameError.
 */
export function parseHostname(raw: string, naming: NamingConvention = DEFAULT_NAMING): HostnameInfo {
	const hostname = raw.trim().toUpperCase();
	if (hostname === '') {
		throw new MalformedHostnameError(raw, 'hostname is empty');
	}

	const segments = hostname.split('-');
	if (segments.length < 4) {
		throw new MalformedHostnameError(
			hostname,
			`expected SITE-ROLE-BUILDING-ROOM-INSTANCE, found ${segments.length} segment(s)`,
		);
	}

	const sitePrefix = hostname.slice(0, 2);
	const rolePrefix = segments[1];

	return {
		hostname,
		sitePrefix,
		site: Object.prototype.hasOwnProperty.call(naming.sitePrefixes, sitePrefix)
			? naming.sitePrefixes[sitePrefix]
			: undefined,
		rolePrefix,
		switchType: naming.accessRolePrefixes.includes(rolePrefix) ? 'access' : 'router',
		building: segments[2],
		room: segments[3],
	};
}

/**
 * Short ROLE-BUILDING-INSTANCE label used in link descriptions.
 * A four segment hostname has no instance, so the room takes its place.
 */
export function describeHostname(raw: string): string {
	const hostname = raw.trim().toUpperCase();
	const segments = hostname.split('-');
	if (segments.length < 4) {
		throw new MalformedHostnameError(hostname, 'cannot build a link label from fewer than 4 segments');
	}
	return [segments[1], segments[2], segments[segments.length - 1]].join('-');
}
