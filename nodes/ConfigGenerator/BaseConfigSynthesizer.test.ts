import { describe, expect, it } from 'vitest';
import { formatBanner } from '../../utils/utilities';
import {
	describeLink,
	formatHostnameDocument,
	groupHostnamesBySite,
	partitionBorderAdjacency,
	splitAtMidpoint,
	synthesizeEdgeRows,
	synthesizeIntermediateRows,
} from './BaseConfigSynthesizer';
import { parseHostname } from './IdentifierParser';
import type { CsvRow } from './types/model';

describe('describeLink', () => {
	it('builds an underlay description from both hostnames', () => {
		expect(describeLink('S1-EN-3320-104-1', 's1-in-3320-001-2')).toBe('EN-3320-1_TO_IN-3320-2 - Fabric Underlay');
	});
});

describe('row synthesis', () => {
	it('adds edge and intermediate descriptions in place', () => {
		const row: CsvRow = { edge_hostname: 'S1-EN-3320-104-1', in_hostname: 'S1-IN-3320-001-2' };
		const rows = synthesizeEdgeRows([row]);
		expect(rows[0]).toBe(row);
		expect(row.edge_description).toBe('EN-3320-1_TO_IN-3320-2 - Fabric Underlay');
		expect(row.in_description).toBe('IN-3320-2_TO_EN-3320-1 - Fabric Underlay');
	});

	it('adds border node descriptions for intermediate rows', () => {
		const row: CsvRow = {
			edge_hostname: 'S1-EN-3320-104-1',
			in_hostname: 'S1-IN-3320-001-2',
			bn1_hostname: 'S1-BN-5000-010-1',
			bn2_hostname: 'S1-BN-5000-010-2',
		};
		synthesizeIntermediateRows([row]);
		expect(row.edge_description).toBe('EN-3320-1_TO_IN-3320-2 - Fabric Underlay');
		expect(row.in_bn1_description).toBe('IN-3320-2_TO_BN-5000-1 - Fabric Underlay');
		expect(row.in_bn2_description).toBe('IN-3320-2_TO_BN-5000-2 - Fabric Underlay');
		expect(row.bn1_description).toBe('BN-5000-1_TO_IN-3320-2 - Fabric Underlay');
		expect(row.bn2_description).toBe('BN-5000-2_TO_IN-3320-2 - Fabric Underlay');
	});
});

describe('splitAtMidpoint', () => {
	it('splits 100 characters into [0,50) and [50,100)', () => {
		const text = Array.from({ length: 100 }, (_, i) => String.fromCharCode(65 + (i % 26))).join('');
		const [first, second] = splitAtMidpoint(text);
		expect(first).toBe(text.slice(0, 50));
		expect(second).toBe(text.slice(50));
		expect(first + second).toBe(text);
	});

	it('gives the extra character of an odd length to the second half', () => {
		expect(splitAtMidpoint('abcde')).toEqual(['ab', 'cde']);
	});

	it('cuts through a line when the midpoint falls inside it', () => {
		expect(splitAtMidpoint('ab\ncd\nef\n')).toEqual(['ab\nc', 'd\nef\n']);
	});
});

describe('partitionBorderAdjacency', () => {
	it('puts each half under its border node banner', () => {
		const halves = partitionBorderAdjacency('abcdef', 's1-bn-1-2-1', 'S1-BN-1-2-2');
		expect(halves.bn1).toBe(`${formatBanner('S1-BN-1-2-1 ADJACENCIES')}abc`);
		expect(halves.bn2).toBe(`${formatBanner('S1-BN-1-2-2 ADJACENCIES')}def`);
	});
});

describe('hostname documentation', () => {
	const rows: CsvRow[] = [
		{ edge_hostname: 'S1-EN-1-2-1', in_hostname: 'S1-IN-1-2-1' },
		{ edge_hostname: 'S1-EN-1-2-2', in_hostname: 'S1-IN-1-2-1' },
		{ edge_hostname: 'ZZ-EN-1-2-3', in_hostname: 'S2-IN-9-9-1' },
	];

	it('groups unique hostnames by resolved site', () => {
		const bySite = groupHostnamesBySite(rows, ['edge_hostname', 'in_hostname']);
		expect([...bySite.keys()]).toEqual(['site_1', 'site_2']);
		expect(bySite.get('site_1')?.map((h) => h.hostname)).toEqual(['S1-EN-1-2-1', 'S1-IN-1-2-1', 'S1-EN-1-2-2']);
		expect(bySite.get('site_2')?.map((h) => h.hostname)).toEqual(['S2-IN-9-9-1']);
	});

	it('formats one line per host under a banner', () => {
		const doc = formatHostnameDocument('site_2', [parseHostname('S2-IN-9-9-1')]);
		expect(doc).toBe(`${formatBanner('site_2 HOSTNAMES')}S2-IN-9-9-1\tbuilding 9\troom 9\trouter\n`);
	});
});
