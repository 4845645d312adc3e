export class DirectoryNotFoundError extends Error {
	constructor(public readonly dirPath: string) {
		super(`Directory not found: ${dirPath}`);
		this.name = "DirectoryNotFoundError";
	}
}

export class MissingRequiredOptionError extends Error {
	constructor(public readonly flag: string) {
		super(`Missing required option: ${flag}`);
		this.name = "MissingRequiredOptionError";
	}
}

export class WriteFailedError extends Error {
	constructor(
		public readonly filePath: string,
		cause?: unknown,
	) {
		super(
			`Failed to write ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`,
		);
		this.name = "WriteFailedError";
		if (cause !== undefined) this.cause = cause;
	}
}

export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
