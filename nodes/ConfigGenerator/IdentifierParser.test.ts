import { describe, expect, it } from 'vitest';
import { MalformedHostnameError } from './errors';
import { buildNamingConvention, DEFAULT_NAMING, describeHostname, parseHostname } from './IdentifierParser';

describe('parseHostname', () => {
	it('derives site, role, building and room', () => {
		expect(parseHostname('s1-en-3320-104-1')).toEqual({
			hostname: 'S1-EN-3320-104-1',
			sitePrefix: 'S1',
			site: 'site_1',
			rolePrefix: 'EN',
			switchType: 'access',
			building: '3320',
			room: '104',
		});
	});

	it('keeps the site table spelling', () => {
		expect(parseHostname('S3-AS-12-7-1').site).toBe('Site_3');
	});

	it.each(['AS', 'se', 'En'])('treats %s as an access role', (role) => {
		expect(parseHostname(`S2-${role}-1-2-3`).switchType).toBe('access');
	});

	it('classifies any other role as a router and leaves unknown sites unset', () => {
		const info = parseHostname('X9-CR-100-200-1');
		expect(info.switchType).toBe('router');
		expect(info.site).toBeUndefined();
		expect(info.building).toBe('100');
		expect(info.room).toBe('200');
	});

	it('rejects hostnames with fewer than four segments', () => {
		expect(() => parseHostname('S1-EN-3320')).toThrow(MalformedHostnameError);
		expect(() => parseHostname('S1EN3320')).toThrow(MalformedHostnameError);
		expect(() => parseHostname('  ')).toThrow(MalformedHostnameError);
	});

	it('accepts a custom naming convention', () => {
		const naming = buildNamingConvention({ x9: 'lab' }, ['cr']);
		const info = parseHostname('X9-CR-1-2-3', naming);
		expect(info.site).toBe('lab');
		expect(info.switchType).toBe('access');
	});
});

describe('describeHostname', () => {
	it('joins role, building and instance', () => {
		expect(describeHostname('s1-en-3320-104-1')).toBe('EN-3320-1');
	});

	it('uses the room when there is no instance segment', () => {
		expect(describeHostname('S1-IN-100-200')).toBe('IN-100-200');
	});

	it('rejects short hostnames', () => {
		expect(() => describeHostname('S1-IN')).toThrow(MalformedHostnameError);
	});
});

describe('naming conventions', () => {
	it('cannot be changed after they are built', () => {
		const custom = buildNamingConvention({ s9: 'lab' }, ['cr']);
		for (const naming of [DEFAULT_NAMING, custom]) {
			expect(Object.isFrozen(naming)).toBe(true);
			expect(Object.isFrozen(naming.sitePrefixes)).toBe(true);
			expect(Object.isFrozen(naming.accessRolePrefixes)).toBe(true);
		}
		expect(custom.accessRolePrefixes).toEqual(['CR']);
	});
});
