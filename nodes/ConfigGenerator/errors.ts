export type ConfigGeneratorErrorCode =
	| 'InputNotFound'
	| 'InputLocked'
	| 'MalformedHostname'
	| 'MalformedVlanLine'
	| 'MalformedCsvEncoding';

/**
 * Base class for failures raised while reading, scanning or rendering.
 * Only `InputLocked` is recoverable; every other code aborts the run.
 */
export class ConfigGeneratorError extends Error {
	readonly code: ConfigGeneratorErrorCode;

	constructor(code: ConfigGeneratorErrorCode, message: string) {
		super(message);
		this.name = code;
		this.code = code;
	}
}

export class InputNotFoundError extends ConfigGeneratorError {
	constructor(readonly path: string) {
		super('InputNotFound', `${path} is not a valid file. Please check the filename and try again.`);
	}
}

export class InputLockedError extends ConfigGeneratorError {
	constructor(readonly path: string) {
		super('InputLocked', `${path} is held by another process. Please close the file and try again.`);
	}
}

export class MalformedHostnameError extends ConfigGeneratorError {
	constructor(readonly hostname: string, detail: string) {
		super('MalformedHostname', `Malformed hostname "${hostname}": ${detail}`);
	}
}

export class MalformedVlanLineError extends ConfigGeneratorError {
	constructor(readonly line: string) {
		super('MalformedVlanLine', `VLAN line has no VLAN ID: "${line.trim()}"`);
	}
}

export class MalformedCsvEncodingError extends ConfigGeneratorError {
	constructor(readonly path: string) {
		super('MalformedCsvEncoding', `${path} is not a text CSV file`);
	}
}

export function isConfigGeneratorError(error: unknown): error is ConfigGeneratorError {
	return error instanceof ConfigGeneratorError;
}
