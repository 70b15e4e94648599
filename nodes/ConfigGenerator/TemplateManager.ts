import path from 'path';
import fs from 'fs-extra';
import { LoggingUtils } from '../../utils/LoggingUtils';
import { InputNotFoundError } from './errors';
import { BLOCK_MARKERS, TemplateValidator } from './TemplateValidator';
import type { ParameterModel } from './types/model';

export const DEFAULT_MASTER_TEMPLATE = 'Switch_template.j2';

/**
 * Set the site and switch type conditions, then drop each block of old
 * configuration in place of its `!!!` marker.
 */
export function prepareTemplateSource(source: string, model: Pick<ParameterModel, 'conditions' | 'blocks'>): string {
	const conditions: Array<[string, string]> = [
		['$site', model.conditions.$site],
		['$switch_type', model.conditions.$switch_type],
	];
	let data = source;
	for (const [token, value] of conditions) {
		data = data.replaceAll(token, () => value);
	}
	for (const [marker, kind] of BLOCK_MARKERS) {
		data = data.replaceAll(marker, () => model.blocks[kind]);
	}
	return data;
}

export interface TemplateManagerOptions {
	storageDir?: string;
	bundledDir?: string;
	verboseLogging?: boolean;
}

export class TemplateManager {
	private storageDir: string;
	private bundledDir: string;
	private verboseLogging: boolean;

	constructor(options: TemplateManagerOptions = {}) {
		const base = process.env.N8N_USER_FOLDER || process.env.HOME || process.cwd();
		this.storageDir = options.storageDir || path.join(base, '.n8n', 'config-generator');
		this.bundledDir = options.bundledDir || path.join(__dirname, 'templates');
		this.verboseLogging = options.verboseLogging ?? false;
	}

	get templatesDir(): string {
		return path.join(this.storageDir, 'templates');
	}

	get newTemplatesDir(): string {
		return path.join(this.templatesDir, 'New_Templates');
	}

	get outputDir(): string {
		return path.join(this.storageDir, 'configs');
	}

	async init(): Promise<void> {
		await fs.ensureDir(this.storageDir);
		await fs.ensureDir(this.templatesDir);
		await fs.ensureDir(this.newTemplatesDir);
		await fs.ensureDir(this.outputDir);
		await this.seedBundledTemplates();
	}

	private async seedBundledTemplates(): Promise<void> {
		if (!(await fs.pathExists(this.bundledDir))) return;
		const files = (await fs.readdir(this.bundledDir)).filter((f: string) => f.endsWith('.j2'));
		for (const file of files) {
			const target = path.join(this.templatesDir, file);
			if (await fs.pathExists(target)) continue;
			const source = await fs.readFile(path.join(this.bundledDir, file), 'utf8');
			const validation = TemplateValidator.validate(file, source);
			if (validation.valid !== true) {
				LoggingUtils.error(`Skipping bundled template: ${validation.errors.join('; ')}`, this.verboseLogging);
				continue;
			}
			await fs.writeFile(target, source, 'utf8');
		}
	}

	async list(): Promise<string[]> {
		await this.init();
		const files = await fs.readdir(this.templatesDir);
		return files.filter((f: string) => f.endsWith('.j2')).sort();
	}

	async read(name: string): Promise<string> {
		const file = path.join(this.templatesDir, name);
		if (!(await fs.pathExists(file))) throw new InputNotFoundError(file);
		return fs.readFile(file, 'utf8');
	}

	/**
	 * Copy the master template to `<HOSTNAME>.j2` with conditions and blocks
	 * filled in. Returns the path of the prepared template.
	 */
	async prepareTemplate(model: ParameterModel, masterName: string = DEFAULT_MASTER_TEMPLATE): Promise<string> {
		await this.init();
		const master = await this.read(masterName);
		const validation = TemplateValidator.validate(masterName, master);
		if (validation.valid !== true) {
			throw new Error(`Template invalid: ${validation.errors.join('; ')}`);
		}

		LoggingUtils.log(`Copying ${masterName} and setting template conditions`, this.verboseLogging);
		const target = path.join(this.templatesDir, model.templateName);
		await fs.writeFile(target, prepareTemplateSource(master, model), 'utf8');
		return target;
	}

	/**
	 * Move a prepared template into New_Templates. A stale copy already there
	 * is removed first.
	 */
	async finalizeTemplate(templateName: string): Promise<string> {
		const source = path.join(this.templatesDir, templateName);
		const destination = path.join(this.newTemplatesDir, templateName);
		if (await fs.pathExists(destination)) {
			LoggingUtils.log(`Replacing existing template ${destination}`, this.verboseLogging);
			await fs.remove(destination);
		}
		await fs.move(source, destination);
		LoggingUtils.log(`The template file ${templateName} has been moved to ${destination}`, this.verboseLogging);
		return destination;
	}

	async discardTemplate(templateName: string): Promise<void> {
		await fs.remove(path.join(this.templatesDir, templateName));
		LoggingUtils.log(`Removed unfinished template ${templateName}`, this.verboseLogging);
	}

	async writeOutput(fileName: string, text: string): Promise<string> {
		await fs.ensureDir(this.outputDir);
		const file = path.join(this.outputDir, fileName);
		await fs.writeFile(file, text, 'utf8');
		return file;
	}

	async appendOutput(fileName: string, text: string): Promise<string> {
		await fs.ensureDir(this.outputDir);
		const file = path.join(this.outputDir, fileName);
		await fs.appendFile(file, text, 'utf8');
		return file;
	}
}
