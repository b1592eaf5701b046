import path from "node:path";
import * as templates from "../templates/index.js";
import type {
	ProjectContext,
	ScaffoldOptions,
	ScaffoldResult,
} from "../types/index.js";
import { ScaffoldError, errorMessage } from "../utils/errors.js";
import { gitInit } from "../utils/exec.js";
import { log } from "../utils/logger.js";
import { COMMON_MACHINE, machineDirName } from "../utils/paths.js";
import { withSpinner } from "../utils/spinner.js";
import { assertValidName } from "../utils/validate.js";
import { checkProjectDir } from "./guard.js";
import { scaffoldMachine } from "./machine.js";
import { GITKEEP, createDir, writeProjectFile } from "./steps.js";

export interface MachinePlan {
	/** Non-common machines in first-seen order. */
	machines: string[];
	/** Arguments dropped because they were duplicates or "common". */
	skipped: string[];
}

/**
 * "common" is always scaffolded first by the caller, so it is removed here
 * along with repeated names.
 */
export function planMachines(requested: string[]): MachinePlan {
	const machines: string[] = [];
	const skipped: string[] = [];
	for (const machine of requested) {
		if (machine === COMMON_MACHINE || machines.includes(machine)) {
			skipped.push(machine);
		} else {
			machines.push(machine);
		}
	}
	return { machines, skipped };
}

async function initRepository(projectPath: string): Promise<void> {
	try {
		await gitInit(projectPath);
	} catch (error) {
		throw new ScaffoldError(
			"GIT_INIT",
			`Failed to initialize git repository in "${projectPath}": ${errorMessage(error)}`,
			{ path: projectPath, cause: error },
		);
	}
}

async function writeRootFiles(context: ProjectContext): Promise<string[]> {
	const { projectName, projectPath, machines, config } = context;
	const machineDirs = machines.map((machine) =>
		machineDirName(projectName, machine),
	);
	const file = (name: string) => path.join(projectPath, name);

	return [
		await writeProjectFile(
			projectPath,
			file(".gitignore"),
			templates.generateGitignore(),
		),
		await writeProjectFile(
			projectPath,
			file("LICENSE"),
			templates.generateLicense(config.license),
		),
		await writeProjectFile(
			projectPath,
			file("README.md"),
			templates.generateReadme(projectName, machines, config),
		),
		await writeProjectFile(
			projectPath,
			file("add-vbox-guest-additions.sh"),
			templates.generateGuestAdditionsScript(machineDirs),
			{ executable: true },
		),
		await writeProjectFile(
			projectPath,
			file("add-vbox-guest-additions.bat"),
			templates.generateGuestAdditionsBat(machineDirs),
		),
		await writeProjectFile(
			projectPath,
			file("start-vms.sh"),
			templates.generateStartVmsScript(machineDirs),
			{ executable: true },
		),
		await writeProjectFile(
			projectPath,
			file("start-vms.bat"),
			templates.generateStartVmsBat(machineDirs),
		),
		await writeProjectFile(
			projectPath,
			file("stop-vms.sh"),
			templates.generateStopVmsScript(machineDirs),
			{ executable: true },
		),
		await writeProjectFile(
			projectPath,
			file("stop-vms.bat"),
			templates.generateStopVmsBat(machineDirs),
		),
	];
}

/**
 * Generate a complete project. The project directory is the commit point:
 * once it exists, a later failure leaves the partial tree in place.
 */
export async function scaffoldProject(
	options: ScaffoldOptions,
): Promise<ScaffoldResult> {
	const { projectName, cwd, config } = options;

	// The existence check decides the outcome before any other validation.
	const projectPath = await checkProjectDir(cwd, projectName);
	assertValidName("project name", projectName);
	for (const machine of options.machines) {
		assertValidName("machine name", machine);
	}

	const quiet = options.quiet ?? false;
	const plan = planMachines(options.machines);
	for (const machine of quiet ? [] : plan.skipped) {
		log.warn(
			machine === COMMON_MACHINE
				? `"${COMMON_MACHINE}" is always created first; ignoring the extra argument`
				: `Machine "${machine}" was given more than once; creating it once`,
		);
	}

	const context: ProjectContext = {
		projectName,
		projectPath,
		machines: plan.machines,
		config,
	};
	const files: string[] = [];

	if (!quiet) log.info(`Creating project directory "${projectPath}"...`);
	await createDir(projectPath);
	if (!quiet) log.success(`Created project directory "${projectName}"`);

	if (options.git !== false) {
		await withSpinner("Initializing git repository", () =>
			initRepository(projectPath),
		);
	}

	await withSpinner("Creating project structure", async () => {
		await createDir(path.join(projectPath, "images"));
		files.push(
			await writeProjectFile(
				projectPath,
				path.join(projectPath, "images", GITKEEP),
				"",
			),
		);
		await createDir(path.join(projectPath, "machines"));
	});

	for (const machine of [COMMON_MACHINE, ...plan.machines]) {
		const written = await withSpinner(
			`Creating machine "${machineDirName(projectName, machine)}"`,
			() => scaffoldMachine(context, machine),
		);
		files.push(...written);
	}

	const rootFiles = await withSpinner("Generating helper scripts", () =>
		writeRootFiles(context),
	);
	files.push(...rootFiles);

	return {
		project: { name: projectName, path: projectPath },
		machines: [COMMON_MACHINE, ...plan.machines],
		files,
	};
}
