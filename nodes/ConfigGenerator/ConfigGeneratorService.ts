import { LoggingUtils } from '../../utils/LoggingUtils';
import { formatDateStamp, generateRunSummary } from '../../utils/utilities';
import {
	formatHostnameDocument,
	groupHostnamesBySite,
	HOSTNAME_COLUMNS,
	partitionBorderAdjacency,
	REQUIRED_COLUMNS,
	synthesizeRows,
} from './BaseConfigSynthesizer';
import { BlockScanner } from './BlockScanner';
import { readCsvFile } from './CsvReader';
import { InputLockedError } from './errors';
import { readConfigText } from './InputReader';
import type { GeneratorOptions } from './OptionsBuilder';
import { buildParameterModel } from './ParameterModelBuilder';
import { TemplateManager } from './TemplateManager';
import { NunjucksMaterializer } from './TemplateMaterializer';
import type { TemplateMaterializer } from './TemplateMaterializer';
import type { BaseConfigKind, CsvRow, ParameterModel } from './types/model';
import type { ScanResult } from './types/scanner';

/**
 * Decides whether a locked input should be read again. `attempt` counts the
 * reads made so far, starting at 1.
 */
export type LockedHandler = (error: InputLockedError, attempt: number) => boolean | Promise<boolean>;

export interface GenerateConfigResult {
	configPath: string;
	templatePath: string;
	model: ParameterModel;
	meta: ScanResult['meta'];
}

export interface BaseConfigResult {
	kind: BaseConfigKind;
	rows: CsvRow[];
	files: string[];
}

export const BASE_TEMPLATES: Record<BaseConfigKind, { base: string; adjacency: string }> = {
	edge: { base: 'edge_base.j2', adjacency: 'in_adjacency.j2' },
	intermediate: { base: 'in_base.j2', adjacency: 'border_adjacency.j2' },
};

export class ConfigGeneratorService {
	private readonly templates: TemplateManager;
	private readonly materializer: TemplateMaterializer;
	private readonly scanner = new BlockScanner();

	constructor(
		private readonly options: GeneratorOptions,
		materializer?: TemplateMaterializer,
		private readonly now: () => Date = () => new Date(),
	) {
		this.templates = new TemplateManager({
			storageDir: options.storageDir,
			bundledDir: options.bundledDir,
			verboseLogging: options.verboseLogging,
		});
		this.materializer = materializer ?? new NunjucksMaterializer(this.templates.templatesDir);
	}

	get templateManager(): TemplateManager {
		return this.templates;
	}

	/**
	 * Read and scan an old configuration. Every retry after a lock starts a
	 * new read and a new scan.
	 */
	async readOldConfig(filePath: string, onLocked?: LockedHandler): Promise<ScanResult> {
		LoggingUtils.log('Reading old configuration ...', this.options.verboseLogging);
		const text = await this.withLockRetry(() => readConfigText(filePath), onLocked);
		const scan = this.scanner.scan(text, { naming: this.options.naming });
		LoggingUtils.analyzeScan(scan, this.options.verboseLogging);
		return scan;
	}

	async generateFromOldConfig(filePath: string, onLocked?: LockedHandler): Promise<GenerateConfigResult> {
		const scan = await this.readOldConfig(filePath, onLocked);
		const model = buildParameterModel(scan, { chassisId: this.options.chassisId, now: this.now() });
		LoggingUtils.debug('Template parameters', model.parameters, this.options.verboseLogging);
		if (model.conditions.$site) {
			LoggingUtils.log(`This switch will be configured for the ${model.conditions.$site} site`, this.options.verboseLogging);
		}

		await this.templates.prepareTemplate(model, this.options.masterTemplate);

		LoggingUtils.log('Rendering templates ...', this.options.verboseLogging);
		let rendered: string;
		try {
			rendered = this.materializer.render(model.templateName, model.parameters);
		} catch (error) {
			await this.templates.discardTemplate(model.templateName);
			throw error;
		}
		const configPath = await this.templates.writeOutput(model.configFileName, rendered);
		const templatePath = await this.templates.finalizeTemplate(model.templateName);

		LoggingUtils.log(`Configuration file ${configPath} is created`, this.options.verboseLogging);
		return { configPath, templatePath, model, meta: scan.meta };
	}

	async generateBaseConfigs(csvPath: string, kind: BaseConfigKind, onLocked?: LockedHandler): Promise<BaseConfigResult> {
		const verbose = this.options.verboseLogging;
		const parsed = await this.withLockRetry(() => readCsvFile(csvPath), onLocked);
		for (const column of REQUIRED_COLUMNS[kind]) {
			if (!parsed.headers.includes(column)) LoggingUtils.error(`CSV has no ${column} column`, verbose);
		}

		const rows = synthesizeRows(kind, parsed.rows);
		await this.templates.init();

		const stamp = formatDateStamp(this.now());
		const files = new Set<string>();
		const templates = BASE_TEMPLATES[kind];

		for (const row of rows) {
			const edge = this.hostnameOf(row, 'edge_hostname');
			const intermediate = this.hostnameOf(row, 'in_hostname');
			const base = this.materializer.render(templates.base, row);
			const adjacency = this.materializer.render(templates.adjacency, row);

			if (kind === 'edge') {
				files.add(await this.templates.writeOutput(`${edge}_base_${stamp}.cfg`, base));
				files.add(await this.templates.appendOutput(`${intermediate}_adjacency_${stamp}.txt`, adjacency));
			} else {
				files.add(await this.templates.writeOutput(`${intermediate}_base_${stamp}.cfg`, base));

				const bn1 = this.hostnameOf(row, 'bn1_hostname');
				const bn2 = this.hostnameOf(row, 'bn2_hostname');
				const halves = partitionBorderAdjacency(adjacency, bn1, bn2);
				files.add(await this.templates.appendOutput(`${bn1}_adjacency_${stamp}.txt`, halves.bn1));
				files.add(await this.templates.appendOutput(`${bn2}_adjacency_${stamp}.txt`, halves.bn2));
			}
		}

		const bySite = groupHostnamesBySite(rows, HOSTNAME_COLUMNS[kind], this.options.naming);
		for (const [site, hosts] of bySite) {
			files.add(await this.templates.writeOutput(`${site}_hostnames_${stamp}.txt`, formatHostnameDocument(site, hosts)));
		}

		const written = [...files];
		LoggingUtils.log(generateRunSummary(`${kind} base configs`, csvPath, written), verbose);
		return { kind, rows, files: written };
	}

	private hostnameOf(row: CsvRow, column: string): string {
		return (row[column] ?? '').trim().toUpperCase();
	}

	private async withLockRetry<T>(read: () => Promise<T>, onLocked?: LockedHandler): Promise<T> {
		for (let attempt = 1; ; attempt += 1) {
			try {
				return await read();
			} catch (error) {
				if (!(error instanceof InputLockedError) || !onLocked) throw error;
				LoggingUtils.error(error.message, this.options.verboseLogging);
				if (!(await onLocked(error, attempt))) throw error;
			}
		}
	}
}
