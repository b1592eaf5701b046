import os from "node:os";
import path from "node:path";
import fs from "fs-extra";

export const CONFIG_FILE_NAME = "vmscaffold.json";

function expandHome(filePath: string): string {
	return filePath.startsWith("~")
		? path.join(os.homedir(), filePath.slice(1))
		: path.resolve(filePath);
}

/**
 * Resolve config file path using the following priority:
 * 1. --config <path> (explicit path)
 * 2. ./vmscaffold.json (current directory)
 * 3. ~/.vmscaffold.json (global fallback)
 *
 * Returns the first path that exists, or the global fallback path if nothing exists.
 */
export async function resolveConfigPath(options: {
	configPath?: string;
	cwd?: string;
}): Promise<string> {
	if (options.configPath) {
		return expandHome(options.configPath);
	}

	const cwdConfig = path.join(options.cwd ?? process.cwd(), CONFIG_FILE_NAME);
	if (await fs.pathExists(cwdConfig)) {
		return cwdConfig;
	}

	return path.join(os.homedir(), `.${CONFIG_FILE_NAME}`);
}
