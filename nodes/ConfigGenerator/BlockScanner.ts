import { MalformedHostnameError, MalformedVlanLineError } from './errors';
import { DEFAULT_NAMING, parseHostname } from './IdentifierParser';
import { LineCursor } from './LineCursor';
import type { BlockText, NamingConvention, VlanEntry, VlanTable } from './types/model';
import type { ScannerOptions, ScannerState, ScanResult, ScanTraceEntry } from './types/scanner';

type DirectiveName =
	| 'hostname'
	| 'spanningTreeVlan'
	| 'vlan'
	| 'interface'
	| 'router'
	| 'ipRoute'
	| 'logging'
	| 'tacacsSourceInterface'
	| 'pimRpAddress'
	| 'systemMtu'
	| 'defaultGateway';

interface Directive {
	name: DirectiveName;
	matches(line: string): boolean;
}

interface ScanContext {
	cursor: LineCursor;
	result: ScanResult;
	naming: NamingConvention;
	trace?: ScanTraceEntry[];
}

const prefix = (value: string) => (line: string) => line.startsWith(value);

// Order matters: `spanning-tree vlan` and `vlan` must be tried before anything broader.
const DIRECTIVES: readonly Directive[] = [
	{ name: 'hostname', matches: prefix('hostname') },
	{ name: 'spanningTreeVlan', matches: prefix('spanning-tree vlan') },
	{ name: 'vlan', matches: (line) => line.split(/\s+/)[0] === 'vlan' },
	{ name: 'interface', matches: prefix('interface') },
	{ name: 'router', matches: prefix('router ') },
	{ name: 'ipRoute', matches: prefix('ip route') },
	{ name: 'logging', matches: prefix('logging') },
	{ name: 'tacacsSourceInterface', matches: prefix('ip tacacs source-interface') },
	{ name: 'pimRpAddress', matches: prefix('ip pim rp-address') },
	{ name: 'systemMtu', matches: prefix('system mtu') },
	{ name: 'defaultGateway', matches: prefix('ip default-gateway') },
];

export const SVI_HARDENING = ' no ip proxy-arp\n no ip redirects\n';

export function emptyBlocks(): BlockText {
	return { vlanPriority: '', interfaces: '', routerConfig: '', rpAddress: '', ipRoute: '', logging: '' };
}

// VLAN IDs come straight from the input, so the table has no prototype to collide with.
export function emptyVlanTable(): VlanTable {
	return Object.create(null);
}

const hasOwn = (table: object, key: string): boolean => Object.prototype.hasOwnProperty.call(table, key);

function tokens(line: string): string[] {
	const trimmed = line.trim();
	return trimmed === '' ? [] : trimmed.split(/\s+/);
}

function lastToken(line: string): string {
	const parts = tokens(line);
	return parts.length > 0 ? parts[parts.length - 1] : '';
}

/**
 * Single forward pass over an old IOS/IOS-XE configuration.
 *
 * Unrecognized lines are dropped. When several `hostname` lines appear the
 * last one wins. Block readers pull from the same cursor as the dispatcher,
 * so a line consumed inside a block is never dispatched.
 */
export class BlockScanner {
	scan(text: string, options: ScannerOptions = {}): ScanResult {
		const result: ScanResult = {
			vlans: emptyVlanTable(),
			sourceInterface: '',
			mtu: '',
			gateway: '',
			blocks: emptyBlocks(),
			meta: { linesProcessed: 0, matches: 0 },
		};
		const ctx: ScanContext = {
			cursor: LineCursor.fromText(text),
			result,
			naming: options.naming ?? DEFAULT_NAMING,
			trace: options.debug ? [] : undefined,
		};

		for (const line of ctx.cursor) {
			const directive = DIRECTIVES.find((d) => d.matches(line));
			ctx.trace?.push({ line, state: 'idle', directive: directive?.name });
			if (!directive) continue;

			result.meta.matches += 1;
			this.dispatch(directive.name, line, ctx);
		}

		result.meta.linesProcessed = ctx.cursor.consumed;
		if (ctx.trace) result.trace = ctx.trace;
		return result;
	}

	private dispatch(name: DirectiveName, line: string, ctx: ScanContext): void {
		const { result } = ctx;
		switch (name) {
			case 'hostname': {
				const parts = tokens(line);
				if (parts.length < 2) {
					throw new MalformedHostnameError(line.trim(), 'hostname directive has no name');
				}
				result.hostname = parseHostname(parts[1], ctx.naming);
				break;
			}
			case 'spanningTreeVlan':
				result.blocks.vlanPriority += line;
				break;
			case 'vlan': {
				const parts = tokens(line);
				if (parts.length < 2) throw new MalformedVlanLineError(line);
				this.readVlanBlock(parts[1], ctx);
				break;
			}
			case 'interface':
				result.blocks.interfaces += this.readInterfaceBlock(line, ctx);
				break;
			case 'router':
				result.blocks.routerConfig += this.readRouterBlock(line, ctx);
				break;
			case 'ipRoute':
				result.blocks.ipRoute += line;
				break;
			case 'logging':
				// buffered logging is replaced by the new standard
				if (!line.includes('buffered')) result.blocks.logging += line;
				break;
			case 'tacacsSourceInterface':
				result.sourceInterface = lastToken(line);
				break;
			case 'pimRpAddress':
				result.blocks.rpAddress += line;
				break;
			case 'systemMtu':
				result.mtu = lastToken(line);
				break;
			case 'defaultGateway':
				result.gateway = lastToken(line);
				break;
		}
	}

	private readVlanBlock(vlanId: string, ctx: ScanContext): void {
		const { vlans } = ctx.result;
		const entry: VlanEntry = hasOwn(vlans, vlanId) ? vlans[vlanId] : {};
		vlans[vlanId] = entry;

		for (const line of ctx.cursor) {
			this.record(ctx, line, 'vlan');
			if (line.startsWith(' name')) {
				entry.name = lastToken(line);
			} else if (line.startsWith('!')) {
				break;
			}
		}
	}

	private readInterfaceBlock(seed: string, ctx: ScanContext): string {
		let block = seed;
		for (const line of ctx.cursor) {
			this.record(ctx, line, 'interface');
			if (line.includes('!')) {
				block += '!\n';
				break;
			}
			block += line;
		}

		if (block.includes('interface Vlan') && !block.includes(' no ip proxy-arp')) {
			block = block.replaceAll('!\n', `${SVI_HARDENING}!\n`);
		}
		return block;
	}

	private readRouterBlock(seed: string, ctx: ScanContext): string {
		let block = seed;
		for (const line of ctx.cursor) {
			this.record(ctx, line, 'router');
			if (line.includes('!')) {
				block += '!';
				break;
			}
			block += line;
		}
		return block;
	}

	private record(ctx: ScanContext, line: string, state: ScannerState): void {
		ctx.trace?.push({ line, state });
	}
}
