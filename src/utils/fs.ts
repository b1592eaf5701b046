import path from "node:path";
import fs from "fs-extra";

const EXECUTABLE_MODE = 0o755;

export interface WriteFileOptions {
	/** chmod 755 after writing, for generated shell scripts. */
	executable?: boolean;
}

export async function ensureDir(dirPath: string): Promise<void> {
	await fs.ensureDir(dirPath);
}

export async function writeFile(
	filePath: string,
	content: string,
	options: WriteFileOptions = {},
): Promise<void> {
	await fs.ensureDir(path.dirname(filePath));
	await fs.writeFile(filePath, content, "utf-8");
	if (options.executable) {
		await fs.chmod(filePath, EXECUTABLE_MODE);
	}
}

export async function readTextFile(filePath: string): Promise<string> {
	return await fs.readFile(filePath, "utf-8");
}

export async function fileExists(filePath: string): Promise<boolean> {
	return await fs.pathExists(filePath);
}
