import path from "node:path";
import { fileURLToPath } from "node:url";
import fs from "fs-extra";
import type {
	ConfigFile,
	ConfigOverrides,
	LicenseConfig,
	ScaffoldConfig,
} from "./types/index.js";
import { resolveConfigPath } from "./utils/config-resolver.js";
import { ScaffoldError } from "./utils/errors.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
export const packageRoot = path.resolve(__dirname, "..");

export const DEFAULT_TEMPLATES_DIR = path.join(packageRoot, "templates");

export const DEFAULTS = {
	box: "ubuntu/jammy64",
	memory: 1024,
	cpus: 1,
	network: "192.168.56",
} as const;

const NETWORK_PATTERN = /^\d{1,3}\.\d{1,3}\.\d{1,3}$/;

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function invalid(configPath: string, reason: string): ScaffoldError {
	return new ScaffoldError(
		"INVALID_CONFIG",
		`Invalid config file ${configPath}: ${reason}`,
		{ path: configPath },
	);
}

function optionalString(
	raw: Record<string, unknown>,
	key: string,
	configPath: string,
): string | undefined {
	const value = raw[key];
	if (value === undefined) return undefined;
	if (typeof value !== "string" || value.length === 0) {
		throw invalid(configPath, `"${key}" must be a non-empty string`);
	}
	return value;
}

function optionalPositiveInt(
	raw: Record<string, unknown>,
	key: string,
	configPath: string,
): number | undefined {
	const value = raw[key];
	if (value === undefined) return undefined;
	if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
		throw invalid(configPath, `"${key}" must be a positive integer`);
	}
	return value;
}

/**
 * Check the parsed JSON against the ConfigFile shape. Unknown keys are ignored.
 */
export function parseConfigFile(raw: unknown, configPath: string): ConfigFile {
	if (!isRecord(raw)) {
		throw invalid(configPath, "expected a JSON object");
	}

	const network = optionalString(raw, "network", configPath);
	if (network !== undefined && !NETWORK_PATTERN.test(network)) {
		throw invalid(configPath, `"network" must look like "192.168.56"`);
	}

	let license: LicenseConfig | undefined;
	if (raw.license !== undefined) {
		if (!isRecord(raw.license)) {
			throw invalid(configPath, `"license" must be an object`);
		}
		license = {
			holder: optionalString(raw.license, "holder", configPath),
			year: optionalPositiveInt(raw.license, "year", configPath),
		};
	}

	return {
		box: optionalString(raw, "box", configPath),
		memory: optionalPositiveInt(raw, "memory", configPath),
		cpus: optionalPositiveInt(raw, "cpus", configPath),
		network,
		license,
		templatesDir: optionalString(raw, "templatesDir", configPath),
	};
}

/**
 * Load vmscaffold.json using the standard resolution order:
 * 1. Explicit configPath (--config)
 * 2. ./vmscaffold.json (current directory)
 * 3. ~/.vmscaffold.json (global fallback)
 */
export async function loadConfigFile(options?: {
	configPath?: string;
	cwd?: string;
}): Promise<{ path: string; config: ConfigFile } | null> {
	const resolvedPath = await resolveConfigPath({
		configPath: options?.configPath,
		cwd: options?.cwd,
	});

	if (!(await fs.pathExists(resolvedPath))) {
		if (options?.configPath) {
			throw invalid(resolvedPath, "file not found");
		}
		return null;
	}

	let raw: unknown;
	try {
		const content = await fs.readFile(resolvedPath, "utf-8");
		raw = JSON.parse(content);
	} catch (error) {
		throw new ScaffoldError(
			"INVALID_CONFIG",
			`Failed to parse config file: ${resolvedPath}`,
			{ path: resolvedPath, cause: error },
		);
	}

	return { path: resolvedPath, config: parseConfigFile(raw, resolvedPath) };
}

function envString(name: string): string | undefined {
	const value = process.env[name];
	return value === undefined || value === "" ? undefined : value;
}

function envPositiveInt(name: string): number | undefined {
	const value = envString(name);
	if (value === undefined) return undefined;
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed <= 0) {
		throw new ScaffoldError(
			"INVALID_CONFIG",
			`${name} must be a positive integer, got "${value}"`,
		);
	}
	return parsed;
}

/**
 * Resolve configuration from CLI flags, config file, and environment variables.
 * Priority: CLI flags > config file > environment variables > defaults
 */
export async function resolveConfig(
	projectName: string,
	overrides: ConfigOverrides = {},
	cwd: string = process.cwd(),
): Promise<ScaffoldConfig> {
	const loaded = await loadConfigFile({
		configPath: overrides.configPath,
		cwd,
	});
	const file = loaded?.config ?? {};

	const templatesDir = file.templatesDir
		? path.resolve(
				loaded ? path.dirname(loaded.path) : cwd,
				file.templatesDir,
			)
		: DEFAULT_TEMPLATES_DIR;

	return {
		box: overrides.box ?? file.box ?? envString("VMSCAFFOLD_BOX") ?? DEFAULTS.box,
		memory:
			overrides.memory ??
			file.memory ??
			envPositiveInt("VMSCAFFOLD_MEMORY") ??
			DEFAULTS.memory,
		cpus:
			overrides.cpus ??
			file.cpus ??
			envPositiveInt("VMSCAFFOLD_CPUS") ??
			DEFAULTS.cpus,
		network: file.network ?? DEFAULTS.network,
		license: {
			holder: file.license?.holder ?? `${projectName} contributors`,
			year: file.license?.year ?? new Date().getFullYear(),
		},
		templatesDir,
	};
}
