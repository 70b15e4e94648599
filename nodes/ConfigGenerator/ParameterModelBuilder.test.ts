import { describe, expect, it } from 'vitest';
import { BlockScanner } from './BlockScanner';
import { MalformedHostnameError } from './errors';
import { buildParameterModel } from './ParameterModelBuilder';
import { BLOCK_MARKERS } from './TemplateValidator';

const scanner = new BlockScanner();
const JAN_26 = new Date(2025, 0, 26);

describe('buildParameterModel', () => {
	it('folds scalars, vlans and conditions into one model', () => {
		const scan = scanner.scan(
			[
				'hostname S1-EN-3320-104-1',
				'vlan 30',
				' name VOICE',
				'!',
				'ip tacacs source-interface Vlan100',
				'system mtu 9000',
				'ip default-gateway 10.0.100.1',
				'',
			].join('\n'),
		);

		const model = buildParameterModel(scan, { chassisId: 'ECN-0001', now: JAN_26 });

		expect(model.parameters).toEqual({
			hostname: 'S1-EN-3320-104-1',
			building: '3320',
			room: '104',
			vlans: { '30': { name: 'VOICE' } },
			source_interface: 'Vlan100',
			mtu: '9000',
			gateway: '10.0.100.1',
			chassis_id: 'ECN-0001',
		});
		expect(model.conditions).toEqual({ $site: 'site_1', $switch_type: 'access' });
		expect(model.templateName).toBe('S1-EN-3320-104-1.j2');
		expect(model.configFileName).toBe('S1-EN-3320-104-1_2025_01_26.cfg');
	});

	it('leaves the site condition empty for an unknown prefix', () => {
		const model = buildParameterModel(scanner.scan('hostname Q7-DS-10-20-1\n'), { now: JAN_26 });
		expect(model.conditions).toEqual({ $site: '', $switch_type: 'router' });
		expect(model.parameters.chassis_id).toBe('');
	});

	it('supplies a string for every block marker', () => {
		const model = buildParameterModel(scanner.scan('hostname S2-AS-1-2-3\n'), { now: JAN_26 });
		for (const [, kind] of BLOCK_MARKERS) {
			expect(model.blocks[kind]).toBe('');
		}
	});

	it('refuses a scan without a hostname', () => {
		expect(() => buildParameterModel(scanner.scan('ip route 0.0.0.0 0.0.0.0 10.0.0.1\n'))).toThrow(
			MalformedHostnameError,
		);
	});
});
