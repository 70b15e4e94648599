import type {
	IDataObject,
	IExecuteFunctions,
	INodeExecutionData,
	INodeType,
	INodeTypeDescription,
} from 'n8n-workflow';
import { NodeOperationError } from 'n8n-workflow';
import { validateGeneratorParams } from '../../utils/utilities';
import { ConfigGeneratorService } from './ConfigGeneratorService';
import { isConfigGeneratorError } from './errors';
import type { LockedHandler } from './ConfigGeneratorService';
import { buildOptionsFromParams } from './OptionsBuilder';
import { TemplateManager } from './TemplateManager';
import type { BaseConfigKind } from './types/model';

export class ConfigGenerator implements INodeType {
	description: INodeTypeDescription = {
		displayName: 'Config Generator',
		name: 'configGenerator',
		icon: 'fa:file-code',
		group: ['transform'],
		version: 1,
		description: 'Build new Cisco switch configurations from old configs or topology CSV files',
		defaults: { name: 'Config Generator' },
		inputs: ['main'],
		outputs: ['main'],
		properties: [
			{
				displayName: 'Operation',
				name: 'operation',
				type: 'options',
				noDataExpression: true,
				options: [
					{
						name: 'Generate Config',
						value: 'generateConfig',
						description: 'Upgrade an old switch configuration using the site templates',
					},
					{
						name: 'Generate Base Configs',
						value: 'generateBaseConfigs',
						description: 'Build base configs and adjacency files from a topology CSV',
					},
					{ name: 'List Templates', value: 'listTemplates', description: 'List stored templates' },
				],
				default: 'generateConfig',
			},
			// Generate Config
			{
				displayName: 'Old Config File',
				name: 'oldConfigPath',
				type: 'string',
				displayOptions: { show: { operation: ['generateConfig'] } },
				default: '',
				placeholder: '/data/configs/old/S1-EN-3320-104-1.txt',
				description: 'Path of the old configuration file to upgrade',
			},
			{
				displayName: 'Chassis ID',
				name: 'chassisId',
				type: 'string',
				displayOptions: { show: { operation: ['generateConfig'] } },
				default: '',
				description: 'Equipment control number of the replacement switch',
			},
			// Generate Base Configs
			{
				displayName: 'CSV File',
				name: 'csvPath',
				type: 'string',
				displayOptions: { show: { operation: ['generateBaseConfigs'] } },
				default: '',
				description: 'Path of the topology CSV file',
			},
			{
				displayName: 'Node Role',
				name: 'baseConfigKind',
				type: 'options',
				displayOptions: { show: { operation: ['generateBaseConfigs'] } },
				options: [
					{ name: 'Edge', value: 'edge' },
					{ name: 'Intermediate', value: 'intermediate' },
				],
				default: 'edge',
			},
			{
				displayName: 'Advanced Options',
				name: 'advancedOptions',
				type: 'collection',
				placeholder: 'Add Option',
				default: {},
				options: [
					{
						displayName: 'Storage Directory',
						name: 'storageDir',
						type: 'string',
						default: '',
						description: 'Directory holding templates and generated configs',
					},
					{
						displayName: 'Master Template',
						name: 'masterTemplate',
						type: 'string',
						default: 'Switch_template.j2',
					},
					{
						displayName: 'Site Mapping',
						name: 'siteMapping',
						type: 'json',
						default: '',
						description: 'JSON object of two letter hostname prefix to site name',
					},
					{
						displayName: 'Access Role Prefixes',
						name: 'accessRolePrefixes',
						type: 'string',
						default: 'AS,SE,EN',
						description: 'Comma separated role prefixes that mark an access switch',
					},
					{
						displayName: 'Locked File Retries',
						name: 'lockedRetries',
						type: 'number',
						default: 0,
						description: 'How many times to read a file again when another process holds it',
					},
					{
						displayName: 'Verbose Logging',
						name: 'verboseLogging',
						type: 'boolean',
						default: false,
					},
				],
			},
		],
	};

	async execute(this: IExecuteFunctions): Promise<INodeExecutionData[][]> {
		const items = this.getInputData();
		const operation = this.getNodeParameter('operation', 0) as string;
		const out: INodeExecutionData[] = [];

		for (let i = 0; i < items.length; i += 1) {
			try {
				const advanced = this.getNodeParameter('advancedOptions', i, {}) as IDataObject;
				const chassisId = operation === 'generateConfig' ? (this.getNodeParameter('chassisId', i, '') as string) : '';
				const options = buildOptionsFromParams({ ...advanced, chassisId });
				const onLocked: LockedHandler = (_error, attempt) => attempt <= options.lockedRetries;

				if (operation === 'listTemplates') {
					const mgr = new TemplateManager({ storageDir: options.storageDir, verboseLogging: options.verboseLogging });
					const templates = await mgr.list();
					out.push({ json: { templates }, pairedItem: { item: i } });
					continue;
				}

				const inputPath =
					operation === 'generateBaseConfigs'
						? (this.getNodeParameter('csvPath', i) as string)
						: (this.getNodeParameter('oldConfigPath', i) as string);
				const errors = validateGeneratorParams(operation, inputPath, options.storageDir, options.lockedRetries);
				if (errors.length > 0) {
					throw new NodeOperationError(this.getNode(), `Invalid parameters: ${errors.join('; ')}`, { itemIndex: i });
				}

				const service = new ConfigGeneratorService(options);

				if (operation === 'generateConfig') {
					const result = await service.generateFromOldConfig(inputPath, onLocked);
					out.push({
						json: {
							configPath: result.configPath,
							templatePath: result.templatePath,
							hostname: result.model.parameters.hostname,
							site: result.model.conditions.$site,
							switchType: result.model.conditions.$switch_type,
							linesProcessed: result.meta.linesProcessed,
							matches: result.meta.matches,
						},
						pairedItem: { item: i },
					});
					continue;
				}

				if (operation === 'generateBaseConfigs') {
					const kind = this.getNodeParameter('baseConfigKind', i) as BaseConfigKind;
					const result = await service.generateBaseConfigs(inputPath, kind, onLocked);
					out.push({ json: { kind: result.kind, rows: result.rows.length, files: result.files }, pairedItem: { item: i } });
					continue;
				}

				throw new NodeOperationError(this.getNode(), `Unsupported operation: ${operation}`, { itemIndex: i });
			} catch (error) {
				if (error instanceof NodeOperationError) throw error;
				if (this.continueOnFail()) {
					out.push({
						json: {
							error: error instanceof Error ? error.message : String(error),
							code: isConfigGeneratorError(error) ? error.code : undefined,
						},
						pairedItem: { item: i },
					});
					continue;
				}
				throw new NodeOperationError(this.getNode(), error instanceof Error ? error : String(error), { itemIndex: i });
			}
		}

		return [out];
	}
}
