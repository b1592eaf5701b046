export type ErrorKind =
	| "PROJECT_EXISTS"
	| "NO_MACHINES"
	| "DIRECTORY_CREATE"
	| "GIT_INIT"
	| "TEMPLATE_MISSING"
	| "FILE_WRITE"
	| "INVALID_NAME"
	| "INVALID_CONFIG";

/**
 * Process exit codes, applied only at the CLI boundary.
 * 81 and 82 are documented in the usage contract and must not change.
 */
export const EXIT_CODES: Record<ErrorKind, number> = {
	PROJECT_EXISTS: 81,
	NO_MACHINES: 82,
	DIRECTORY_CREATE: 83,
	GIT_INIT: 84,
	TEMPLATE_MISSING: 85,
	FILE_WRITE: 86,
	INVALID_NAME: 87,
	INVALID_CONFIG: 88,
};

export const UNKNOWN_ERROR_EXIT_CODE = 1;

export class ScaffoldError extends Error {
	readonly kind: ErrorKind;
	readonly path?: string;

	constructor(
		kind: ErrorKind,
		message: string,
		options?: { path?: string; cause?: unknown },
	) {
		super(message, { cause: options?.cause });
		this.name = "ScaffoldError";
		this.kind = kind;
		this.path = options?.path;
	}

	get exitCode(): number {
		return EXIT_CODES[this.kind];
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

export function exitCodeFor(error: unknown): number {
	return error instanceof ScaffoldError
		? error.exitCode
		: UNKNOWN_ERROR_EXIT_CODE;
}
