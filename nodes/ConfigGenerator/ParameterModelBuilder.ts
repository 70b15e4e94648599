import { formatDateStamp } from '../../utils/utilities';
import { emptyVlanTable } from './BlockScanner';
import { MalformedHostnameError } from './errors';
import type { ParameterModel, TemplateConditions, TemplateParameters } from './types/model';
import type { ScanResult } from './types/scanner';

export interface BuildOptions {
	chassisId?: string;
	now?: Date;
}

/**
 * Fold a finished scan into the parameter map, the template conditions and
 * the block text handed to the template stage.
 */
export function buildParameterModel(scan: ScanResult, options: BuildOptions = {}): ParameterModel {
	const host = scan.hostname;
	if (!host) {
		throw new MalformedHostnameError('', 'no hostname directive found');
	}

	const sources: Array<Partial<TemplateParameters>> = [
		{ hostname: host.hostname },
		{ vlans: scan.vlans },
		{ source_interface: scan.sourceInterface },
		{ building: host.building, room: host.room },
		{ chassis_id: options.chassisId ?? '' },
		{ mtu: scan.mtu },
		{ gateway: scan.gateway },
	];

	const parameters: TemplateParameters = {
		hostname: '',
		building: '',
		room: '',
		vlans: emptyVlanTable(),
		source_interface: '',
		mtu: '',
		gateway: '',
		chassis_id: '',
	};
	for (const source of sources) {
		Object.assign(parameters, source);
	}

	const conditions: TemplateConditions = {
		$site: host.site ?? '',
		$switch_type: host.switchType,
	};

	const stamp = formatDateStamp(options.now ?? new Date());

	return {
		parameters,
		conditions,
		blocks: { ...scan.blocks },
		templateName: `${host.hostname}.j2`,
		configFileName: `${host.hostname}_${stamp}.cfg`,
	};
}
