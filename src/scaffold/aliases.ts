/**
 * Shell aliases suggested after a successful run, keyed on the project name.
 */
export function generateAliasSuggestions(
	projectName: string,
	projectPath: string,
): string[] {
	return [
		`alias ${projectName}-cd='cd "${projectPath}"'`,
		`alias ${projectName}-up='"${projectPath}/start-vms.sh"'`,
		`alias ${projectName}-down='"${projectPath}/stop-vms.sh"'`,
	];
}
