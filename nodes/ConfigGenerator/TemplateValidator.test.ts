import { describe, expect, it } from 'vitest';
import { TemplateValidator } from './TemplateValidator';

describe('TemplateValidator', () => {
	it('accepts every known block marker', () => {
		const source = '!!!vlan_priority\n!!!Interfaces\n!!!router_config\n!!!rp-address\n!!!ip_route\n!!!logging\n';
		expect(TemplateValidator.validate('Switch_template.j2', source)).toEqual({ valid: true });
	});

	it('ignores plain comment bangs', () => {
		expect(TemplateValidator.validate('t.j2', '!\n!!!\nhostname {{ hostname }}\n')).toEqual({ valid: true });
	});

	it('lists unknown markers and empty templates', () => {
		expect(TemplateValidator.validate('t.j2', '!!!vlans\n!!!Interfaces\n!!!snmp')).toEqual({
			valid: false,
			errors: ['Unknown block marker !!!vlans in template t.j2', 'Unknown block marker !!!snmp in template t.j2'],
		});
		expect(TemplateValidator.validate('', '  ')).toEqual({
			valid: false,
			errors: ['Missing template name', 'Template  is empty'],
		});
	});
});
