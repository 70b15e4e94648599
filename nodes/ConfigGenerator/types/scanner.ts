import type { BlockText, HostnameInfo, NamingConvention, VlanTable } from './model';

export type ScannerState = 'idle' | 'vlan' | 'interface' | 'router';

export interface ScannerOptions {
	naming?: NamingConvention;
	debug?: boolean;
}

export interface ScanTraceEntry {
	line: string;
	state: ScannerState;
	directive?: string;
}

export interface ScanResult {
	hostname?: HostnameInfo;
	vlans: VlanTable;
	sourceInterface: string;
	mtu: string;
	gateway: string;
	blocks: BlockText;
	meta: {
		linesProcessed: number;
		matches: number;
	};
	trace?: ScanTraceEntry[];
}
