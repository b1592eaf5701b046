import path from "node:path";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	type TempDirectory,
	createTempDirectory,
	listFiles,
} from "../../__tests__/helpers/temp-directory.js";
import { DEFAULTS, DEFAULT_TEMPLATES_DIR } from "../config.js";
import type { ProjectContext, ScaffoldConfig } from "../types/index.js";
import { scaffoldMachine } from "./machine.js";

function createConfig(overrides: Partial<ScaffoldConfig> = {}): ScaffoldConfig {
	return {
		box: DEFAULTS.box,
		memory: DEFAULTS.memory,
		cpus: DEFAULTS.cpus,
		network: DEFAULTS.network,
		license: { holder: "lab contributors", year: 2025 },
		templatesDir: DEFAULT_TEMPLATES_DIR,
		...overrides,
	};
}

describe("scaffoldMachine", () => {
	let temp: TempDirectory;
	let context: ProjectContext;

	beforeEach(async () => {
		temp = await createTempDirectory("vmscaffold-machine-");
		const projectPath = path.join(temp.path, "lab");
		await fs.ensureDir(path.join(projectPath, "machines"));
		context = {
			projectName: "lab",
			projectPath,
			machines: ["web", "db"],
			config: createConfig(),
		};
	});

	afterEach(async () => {
		await temp.cleanup();
	});

	describe("common machine", () => {
		it("should write the provisioning script from the template", async () => {
			const files = await scaffoldMachine(context, "common");

			expect(files).toEqual(["machines/common/provision/provision-common.sh"]);
			const content = await fs.readFile(
				path.join(context.projectPath, files[0]),
				"utf-8",
			);
			expect(content.startsWith("#!/usr/bin/env bash\n")).toBe(true);
			expect(content).toContain(
				"# Shared provisioning for every machine in the lab project.",
			);
			expect(content).toContain("# Machines: lab-web lab-db\n");
			expect(content).toContain(
				"for entry in lab-web=192.168.56.11 lab-db=192.168.56.12; do",
			);
			expect(content).not.toContain("{{");
		});

		it("should make the script executable", async () => {
			const [file] = await scaffoldMachine(context, "common");
			const stats = await fs.stat(path.join(context.projectPath, file));
			expect(stats.mode & 0o100).toBeTruthy();
		});

		it("should fail with TEMPLATE_MISSING before creating anything", async () => {
			const templatesDir = path.join(temp.path, "no-templates");
			context.config = createConfig({ templatesDir });

			await expect(scaffoldMachine(context, "common")).rejects.toMatchObject({
				kind: "TEMPLATE_MISSING",
				path: path.join(templatesDir, "template-common-provision-sh"),
			});
			expect(
				await fs.pathExists(path.join(context.projectPath, "machines", "common")),
			).toBe(false);
		});

		it("should use a custom templates directory", async () => {
			const templatesDir = path.join(temp.path, "custom");
			await fs.outputFile(
				path.join(templatesDir, "template-common-provision-sh"),
				"echo {{PROJECT_NAME}}: {{MACHINES}}\n",
			);
			context.config = createConfig({ templatesDir });

			const [file] = await scaffoldMachine(context, "common");

			expect(await fs.readFile(path.join(context.projectPath, file), "utf-8")).toBe(
				"echo lab: lab-web lab-db\n",
			);
		});
	});

	describe("named machines", () => {
		it("should create files/, provision/ and a Vagrantfile", async () => {
			const files = await scaffoldMachine(context, "db");

			expect(files).toEqual([
				"machines/lab-db/files/.gitkeep",
				"machines/lab-db/provision/provision-db.sh",
				"machines/lab-db/Vagrantfile",
			]);
			expect(await listFiles(path.join(context.projectPath, "machines"))).toEqual(
				[
					"lab-db/Vagrantfile",
					"lab-db/files/.gitkeep",
					"lab-db/provision/provision-db.sh",
				],
			);
		});

		it("should address machines by their position", async () => {
			await scaffoldMachine(context, "db");

			const vagrantfile = await fs.readFile(
				path.join(context.projectPath, "machines", "lab-db", "Vagrantfile"),
				"utf-8",
			);
			expect(vagrantfile).toContain('config.vm.define "lab-db"');
			expect(vagrantfile).toContain(
				'config.vm.network "private_network", ip: "192.168.56.12"',
			);
			expect(vagrantfile).toContain("vb.memory = 1024");
			expect(vagrantfile).toContain(
				'config.vm.provision "shell", path: "../common/provision/provision-common.sh"',
			);
			expect(vagrantfile).toContain(
				'config.vm.provision "shell", path: "provision/provision-db.sh"',
			);
		});

		it("should name the VM in its provisioning script", async () => {
			await scaffoldMachine(context, "web");

			const script = await fs.readFile(
				path.join(
					context.projectPath,
					"machines",
					"lab-web",
					"provision",
					"provision-web.sh",
				),
				"utf-8",
			);
			expect(script).toContain('echo "==> [lab-web] provisioning"');
		});

		it("should reject a machine outside the project", async () => {
			await expect(scaffoldMachine(context, "cache")).rejects.toThrow(
				'Machine "cache" is not part of project "lab"',
			);
		});
	});

	it("should leave the process working directory alone", async () => {
		const before = process.cwd();
		await scaffoldMachine(context, "common");
		await scaffoldMachine(context, "web");
		expect(process.cwd()).toBe(before);
	});
});
