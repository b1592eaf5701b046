import path from "node:path";
import { ScaffoldError } from "../utils/errors.js";
import { fileExists } from "../utils/fs.js";

/**
 * Resolve the project directory and refuse to continue if it already exists.
 *
 * Nothing is re-checked between this call and the directory's creation, so
 * two concurrent runs against the same name can both pass. Acceptable for a
 * single-user CLI.
 */
export async function checkProjectDir(
	cwd: string,
	projectName: string,
): Promise<string> {
	const projectPath = path.join(cwd, projectName);
	if (await fileExists(projectPath)) {
		throw new ScaffoldError(
			"PROJECT_EXISTS",
			`Project directory "${projectPath}" already exists.`,
			{ path: projectPath },
		);
	}
	return projectPath;
}
