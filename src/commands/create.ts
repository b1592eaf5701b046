import { Command, InvalidArgumentError } from "commander";
import { resolveConfig } from "../config.js";
import { generateAliasSuggestions } from "../scaffold/aliases.js";
import { checkProjectDir } from "../scaffold/guard.js";
import { scaffoldProject } from "../scaffold/project.js";
import type { ScaffoldResult } from "../types/index.js";
import { ScaffoldError, errorMessage, exitCodeFor } from "../utils/errors.js";
import { log, setColorEnabled } from "../utils/logger.js";
import { setSpinnerSilent } from "../utils/spinner.js";
import { assertValidName } from "../utils/validate.js";

export const PROGRAM_NAME = "vmscaffold";

interface CreateCommandOptions {
	config?: string;
	box?: string;
	memory?: number;
	cpus?: number;
	git: boolean;
	color: boolean;
	json: boolean;
}

function parsePositiveInt(value: string): number {
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed <= 0) {
		throw new InvalidArgumentError("Must be a positive integer.");
	}
	return parsed;
}

export function formatUsage(programName: string): string[] {
	return [
		`Usage: ${programName} <project-name> <machine-name> [machine-name...]`,
		"",
		`Example: ${programName} myproject web db`,
		"",
		`Creates ./myproject with the shared "common" machine plus myproject-web and myproject-db.`,
	];
}

async function run(
	projectName: string,
	machines: string[],
	options: CreateCommandOptions,
): Promise<ScaffoldResult> {
	const cwd = process.cwd();

	await checkProjectDir(cwd, projectName);
	assertValidName("project name", projectName);
	for (const machine of machines) {
		assertValidName("machine name", machine);
	}

	if (machines.length === 0) {
		throw new ScaffoldError(
			"NO_MACHINES",
			`No machines specified for project "${projectName}".`,
		);
	}

	const config = await resolveConfig(
		projectName,
		{
			configPath: options.config,
			box: options.box,
			memory: options.memory,
			cpus: options.cpus,
		},
		cwd,
	);

	return await scaffoldProject({
		projectName,
		machines,
		cwd,
		config,
		git: options.git,
		quiet: options.json,
	});
}

function reportSuccess(result: ScaffoldResult): void {
	const { name, path } = result.project;

	log.blank();
	log.success(
		`Project "${name}" created with ${result.machines.length} machine${result.machines.length === 1 ? "" : "s"}!`,
	);
	log.blank();
	log.info("Next steps:");
	log.step(`cd ${path}`);
	log.step("./start-vms.sh");
	log.blank();
	log.info("Suggested aliases:");
	for (const alias of generateAliasSuggestions(name, path)) {
		log.step(alias);
	}
	log.blank();
}

export const createCommand = new Command()
	.name(PROGRAM_NAME)
	.description(
		"Scaffold a multi-machine Vagrant project with shared provisioning",
	)
	.version("0.1.0")
	.argument("[project-name]", "Name of the project directory to create")
	.argument("[machine-names...]", "Machines to create besides \"common\"")
	.option("--config <path>", "Path to vmscaffold.json config file")
	.option("--box <box>", "Vagrant box for every machine")
	.option("--memory <mb>", "Memory per machine in MB", parsePositiveInt)
	.option("--cpus <count>", "CPUs per machine", parsePositiveInt)
	.option("--no-git", "Skip git repository initialization")
	.option("--no-color", "Disable colored output")
	.option("--json", "Output the result as JSON", false)
	.action(
		async (
			projectName: string | undefined,
			machineNames: string[],
			options: CreateCommandOptions,
		) => {
			if (!options.color) {
				setColorEnabled(false);
			}
			setSpinnerSilent(options.json);

			if (!projectName) {
				for (const line of formatUsage(PROGRAM_NAME)) {
					console.log(line);
				}
				return;
			}

			let result: ScaffoldResult;
			try {
				result = await run(projectName, machineNames, options);
			} catch (error) {
				const exitCode = exitCodeFor(error);
				if (options.json) {
					console.log(
						JSON.stringify({
							success: false,
							error: errorMessage(error),
							exitCode,
							...(error instanceof ScaffoldError && error.path
								? { path: error.path }
								: {}),
						}),
					);
					return process.exit(exitCode);
				}
				return log.fatal(errorMessage(error), exitCode);
			}

			if (options.json) {
				console.log(JSON.stringify({ success: true, ...result }, null, 2));
				return;
			}
			reportSuccess(result);
		},
	);
