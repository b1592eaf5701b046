import { ScaffoldError, errorMessage } from "../utils/errors.js";
import { type WriteFileOptions, ensureDir, writeFile } from "../utils/fs.js";
import { relativeToProject } from "../utils/paths.js";

export const GITKEEP = ".gitkeep";

export async function createDir(dirPath: string): Promise<void> {
	try {
		await ensureDir(dirPath);
	} catch (error) {
		throw new ScaffoldError(
			"DIRECTORY_CREATE",
			`Failed to create directory "${dirPath}": ${errorMessage(error)}`,
			{ path: dirPath, cause: error },
		);
	}
}

/**
 * Write a file below the project root and return its project-relative path.
 */
export async function writeProjectFile(
	projectPath: string,
	filePath: string,
	content: string,
	options: WriteFileOptions = {},
): Promise<string> {
	try {
		await writeFile(filePath, content, options);
	} catch (error) {
		throw new ScaffoldError(
			"FILE_WRITE",
			`Failed to write "${filePath}": ${errorMessage(error)}`,
			{ path: filePath, cause: error },
		);
	}
	return relativeToProject(projectPath, filePath);
}
