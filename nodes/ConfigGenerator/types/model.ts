export type SwitchType = 'access' | 'router';

export interface NamingConvention {
	sitePrefixes: Readonly<Record<string, string>>;
	accessRolePrefixes: readonly string[];
}

export interface HostnameInfo {
	hostname: string;
	sitePrefix: string;
	site?: string;
	rolePrefix: string;
	switchType: SwitchType;
	building: string;
	room: string;
}

export interface VlanEntry {
	name?: string;
}

export type VlanTable = Record<string, VlanEntry>;

export type BlockKind = 'vlanPriority' | 'interfaces' | 'routerConfig' | 'rpAddress' | 'ipRoute' | 'logging';

export type BlockText = Record<BlockKind, string>;

// Key names are the ones the switch templates reference.
export interface TemplateParameters {
	hostname: string;
	building: string;
	room: string;
	vlans: VlanTable;
	source_interface: string;
	mtu: string;
	gateway: string;
	chassis_id: string;
}

export interface TemplateConditions {
	$site: string;
	$switch_type: SwitchType | '';
}

export interface ParameterModel {
	parameters: TemplateParameters;
	conditions: TemplateConditions;
	blocks: BlockText;
	templateName: string;
	configFileName: string;
}

export type CsvRow = Record<string, string>;

export type BaseConfigKind = 'edge' | 'intermediate';
