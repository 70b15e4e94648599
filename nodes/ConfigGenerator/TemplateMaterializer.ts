import nunjucks from 'nunjucks';
import type { Environment } from 'nunjucks';

/**
 * Renders a named template from a template directory with a context map.
 */
export interface TemplateMaterializer {
	render(templateName: string, context: object): string;
}

export class NunjucksMaterializer implements TemplateMaterializer {
	private env: Environment;

	constructor(templatesDir: string) {
		const loader = new nunjucks.FileSystemLoader(templatesDir, { noCache: true });
		// config text is not HTML
		this.env = new nunjucks.Environment(loader, { autoescape: false });
	}

	render(templateName: string, context: object): string {
		return this.env.render(templateName, context);
	}
}
