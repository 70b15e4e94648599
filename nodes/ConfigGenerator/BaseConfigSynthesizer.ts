import { formatBanner } from '../../utils/utilities';
import { DEFAULT_NAMING, describeHostname, parseHostname } from './IdentifierParser';
import type { BaseConfigKind, CsvRow, HostnameInfo, NamingConvention } from './types/model';

export const LINK_SUFFIX = ' - Fabric Underlay';

export const REQUIRED_COLUMNS: Record<BaseConfigKind, readonly string[]> = {
	edge: [
		'edge_hostname',
		'in_hostname',
		'edge_interface_addr1',
		'edge_interface_addr2',
		'in_interface_addr1',
		'in_interface_addr2',
	],
	intermediate: [
		'edge_hostname',
		'in_hostname',
		'edge_interface_addr1',
		'edge_interface_addr2',
		'in_interface_addr1',
		'in_interface_addr2',
		'bn1_hostname',
		'bn2_hostname',
	],
};

export const HOSTNAME_COLUMNS: Record<BaseConfigKind, readonly string[]> = {
	edge: ['edge_hostname', 'in_hostname'],
	intermediate: ['edge_hostname', 'in_hostname', 'bn1_hostname', 'bn2_hostname'],
};

function field(row: CsvRow, column: string): string {
	return (row[column] ?? '').trim();
}

export function describeLink(from: string, to: string): string {
	return `${describeHostname(from)}_TO_${describeHostname(to)}${LINK_SUFFIX}`;
}

/**
 * Add the edge <-> intermediate underlay descriptions to each row in place.
 */
export function synthesizeEdgeRows(rows: CsvRow[]): CsvRow[] {
	for (const row of rows) {
		const edge = field(row, 'edge_hostname');
		const intermediate = field(row, 'in_hostname');
		row.edge_description = describeLink(edge, intermediate);
		row.in_description = describeLink(intermediate, edge);
	}
	return rows;
}

/**
 * Edge descriptions plus the intermediate <-> border node pairs.
 */
export function synthesizeIntermediateRows(rows: CsvRow[]): CsvRow[] {
	synthesizeEdgeRows(rows);
	for (const row of rows) {
		const intermediate = field(row, 'in_hostname');
		const bn1 = field(row, 'bn1_hostname');
		const bn2 = field(row, 'bn2_hostname');
		row.in_bn1_description = describeLink(intermediate, bn1);
		row.in_bn2_description = describeLink(intermediate, bn2);
		row.bn1_description = describeLink(bn1, intermediate);
		row.bn2_description = describeLink(bn2, intermediate);
	}
	return rows;
}

export function synthesizeRows(kind: BaseConfigKind, rows: CsvRow[]): CsvRow[] {
	return kind === 'edge' ? synthesizeEdgeRows(rows) : synthesizeIntermediateRows(rows);
}

/**
 * Split rendered text at floor(length / 2) characters. The split is not
 * line aware and can cut a line in two; callers depend on the exact halves.
 */
export function splitAtMidpoint(text: string): [string, string] {
	const chars = Array.from(text);
	const midpoint = Math.floor(chars.length / 2);
	return [chars.slice(0, midpoint).join(''), chars.slice(midpoint).join('')];
}

export function withBanner(title: string, text: string): string {
	return `${formatBanner(title)}${text}`;
}

/**
 * Border adjacency text for both border nodes: the first half goes to BN1,
 * the second half to BN2, each under its own banner.
 */
export function partitionBorderAdjacency(
	rendered: string,
	bn1Hostname: string,
	bn2Hostname: string,
): { bn1: string; bn2: string } {
	const [first, second] = splitAtMidpoint(rendered);
	return {
		bn1: withBanner(`${bn1Hostname.trim().toUpperCase()} ADJACENCIES`, first),
		bn2: withBanner(`${bn2Hostname.trim().toUpperCase()} ADJACENCIES`, second),
	};
}

export function groupHostnamesBySite(
	rows: CsvRow[],
	columns: readonly string[],
	naming: NamingConvention = DEFAULT_NAMING,
): Map<string, HostnameInfo[]> {
	const bySite = new Map<string, HostnameInfo[]>();
	const seen = new Set<string>();

	for (const row of rows) {
		for (const column of columns) {
			const raw = field(row, column);
			if (raw === '') continue;
			const info = parseHostname(raw, naming);
			if (!info.site || seen.has(info.hostname)) continue;
			seen.add(info.hostname);

			const hosts = bySite.get(info.site) ?? [];
			hosts.push(info);
			bySite.set(info.site, hosts);
		}
	}
	return bySite;
}

export function formatHostnameDocument(site: string, hosts: HostnameInfo[]): string {
	const lines = hosts.map((h) => `${h.hostname}\tbuilding ${h.building}\troom ${h.room}\t${h.switchType}`);
	return `${formatBanner(`${site} HOSTNAMES`)}${lines.join('\n')}\n`;
}
