import path from "node:path";
import * as templates from "../templates/index.js";
import type { ProjectContext } from "../types/index.js";
import { ScaffoldError } from "../utils/errors.js";
import { fileExists, readTextFile } from "../utils/fs.js";
import {
	COMMON_MACHINE,
	machineAddress,
	machineDirName,
	machinePath,
	provisionScriptName,
} from "../utils/paths.js";
import { GITKEEP, createDir, writeProjectFile } from "./steps.js";

export const COMMON_PROVISION_TEMPLATE = "template-common-provision-sh";

async function loadTemplate(templatesDir: string, name: string) {
	const templatePath = path.join(templatesDir, name);
	if (!(await fileExists(templatePath))) {
		throw new ScaffoldError(
			"TEMPLATE_MISSING",
			`Template "${templatePath}" not found.`,
			{ path: templatePath },
		);
	}
	return await readTextFile(templatePath);
}

async function scaffoldCommon(context: ProjectContext): Promise<string[]> {
	const { projectName, projectPath, machines, config } = context;
	const provisionDir = machinePath(
		projectPath,
		projectName,
		COMMON_MACHINE,
		"provision",
	);

	const template = await loadTemplate(
		config.templatesDir,
		COMMON_PROVISION_TEMPLATE,
	);
	await createDir(provisionDir);

	const vmNames = machines.map((machine) =>
		machineDirName(projectName, machine),
	);
	const content = templates.renderCommonProvision(template, {
		projectName,
		vmNames,
		hosts: vmNames.map(
			(vmName, index) => `${vmName}=${machineAddress(config.network, index)}`,
		),
	});

	return [
		await writeProjectFile(
			projectPath,
			path.join(provisionDir, provisionScriptName(COMMON_MACHINE)),
			content,
			{ executable: true },
		),
	];
}

async function scaffoldVm(
	context: ProjectContext,
	machine: string,
): Promise<string[]> {
	const { projectName, projectPath, machines, config } = context;
	const index = machines.indexOf(machine);
	if (index === -1) {
		throw new Error(
			`Machine "${machine}" is not part of project "${projectName}"`,
		);
	}

	const vmName = machineDirName(projectName, machine);
	const dir = (...segments: string[]) =>
		machinePath(projectPath, projectName, machine, ...segments);

	await createDir(dir("files"));
	await createDir(dir("provision"));

	return [
		await writeProjectFile(projectPath, dir("files", GITKEEP), ""),
		await writeProjectFile(
			projectPath,
			dir("provision", provisionScriptName(machine)),
			templates.generateProvisionScript(vmName),
			{ executable: true },
		),
		await writeProjectFile(
			projectPath,
			dir("Vagrantfile"),
			templates.generateVagrantfile({
				vmName,
				machine,
				address: machineAddress(config.network, index),
				config,
			}),
		),
	];
}

/**
 * Create one machine's directory tree under `machines/` and return the
 * project-relative paths of the files written.
 */
export async function scaffoldMachine(
	context: ProjectContext,
	machine: string,
): Promise<string[]> {
	if (machine === COMMON_MACHINE) {
		return await scaffoldCommon(context);
	}
	return await scaffoldVm(context, machine);
}
