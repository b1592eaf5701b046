import path from "node:path";

export const COMMON_MACHINE = "common";

/** Directory of a machine inside the project's machines/ folder. */
export function machineDirName(projectName: string, machine: string): string {
	return machine === COMMON_MACHINE ? machine : `${projectName}-${machine}`;
}

export function machinePath(
	projectPath: string,
	projectName: string,
	machine: string,
	...segments: string[]
): string {
	return path.join(
		projectPath,
		"machines",
		machineDirName(projectName, machine),
		...segments,
	);
}

export function provisionScriptName(machine: string): string {
	return `provision-${machine}.sh`;
}

/** Forward-slash path relative to the project root, for reporting. */
export function relativeToProject(projectPath: string, target: string): string {
	return path.relative(projectPath, target).split(path.sep).join("/");
}

/** Host octet of the first non-common machine; later machines count up. */
export const FIRST_HOST_OCTET = 11;

export function machineAddress(network: string, index: number): string {
	return `${network}.${FIRST_HOST_OCTET + index}`;
}
