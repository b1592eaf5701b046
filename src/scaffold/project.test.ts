import path from "node:path";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("execa", () => ({
	execa: vi.fn().mockResolvedValue({ stdout: "", stderr: "" }),
}));

import { execa } from "execa";
import {
	type TempDirectory,
	createTempDirectory,
	listFiles,
} from "../../__tests__/helpers/temp-directory.js";
import { DEFAULTS, DEFAULT_TEMPLATES_DIR } from "../config.js";
import type { ScaffoldConfig } from "../types/index.js";
import { log } from "../utils/logger.js";
import { planMachines, scaffoldProject } from "./project.js";

const mockExeca = vi.mocked(execa);

const config: ScaffoldConfig = {
	box: DEFAULTS.box,
	memory: DEFAULTS.memory,
	cpus: DEFAULTS.cpus,
	network: DEFAULTS.network,
	license: { holder: "Lab Team", year: 2025 },
	templatesDir: DEFAULT_TEMPLATES_DIR,
};

describe("planMachines", () => {
	it("should keep the given order", () => {
		expect(planMachines(["web", "db", "cache"])).toEqual({
			machines: ["web", "db", "cache"],
			skipped: [],
		});
	});

	it("should drop common and repeated names", () => {
		expect(planMachines(["web", "common", "db", "web"])).toEqual({
			machines: ["web", "db"],
			skipped: ["common", "web"],
		});
	});
});

describe("scaffoldProject", () => {
	let temp: TempDirectory;

	beforeEach(async () => {
		vi.clearAllMocks();
		mockExeca.mockResolvedValue({ stdout: "", stderr: "" } as never);
		temp = await createTempDirectory("vmscaffold-project-");
	});

	afterEach(async () => {
		await temp.cleanup();
	});

	it("should generate the full project layout", async () => {
		const result = await scaffoldProject({
			projectName: "lab",
			machines: ["web", "db"],
			cwd: temp.path,
			config,
		});

		const projectPath = path.join(temp.path, "lab");
		expect(result.project).toEqual({ name: "lab", path: projectPath });
		expect(result.machines).toEqual(["common", "web", "db"]);
		expect(result.files).toEqual([
			"images/.gitkeep",
			"machines/common/provision/provision-common.sh",
			"machines/lab-web/files/.gitkeep",
			"machines/lab-web/provision/provision-web.sh",
			"machines/lab-web/Vagrantfile",
			"machines/lab-db/files/.gitkeep",
			"machines/lab-db/provision/provision-db.sh",
			"machines/lab-db/Vagrantfile",
			".gitignore",
			"LICENSE",
			"README.md",
			"add-vbox-guest-additions.sh",
			"add-vbox-guest-additions.bat",
			"start-vms.sh",
			"start-vms.bat",
			"stop-vms.sh",
			"stop-vms.bat",
		]);
		expect(await listFiles(projectPath)).toEqual([...result.files].sort());
	});

	it("should initialize git in the project directory", async () => {
		await scaffoldProject({
			projectName: "lab",
			machines: ["web"],
			cwd: temp.path,
			config,
		});

		expect(mockExeca).toHaveBeenCalledTimes(1);
		expect(mockExeca).toHaveBeenCalledWith("git", ["init"], {
			stdio: "pipe",
			cwd: path.join(temp.path, "lab"),
		});
	});

	it("should skip git when disabled", async () => {
		await scaffoldProject({
			projectName: "lab",
			machines: ["web"],
			cwd: temp.path,
			config,
			git: false,
		});

		expect(mockExeca).not.toHaveBeenCalled();
	});

	it("should scaffold common exactly once when it is also requested", async () => {
		const warn = vi.spyOn(log, "warn");

		const result = await scaffoldProject({
			projectName: "lab",
			machines: ["common", "web", "web"],
			cwd: temp.path,
			config,
		});

		expect(result.machines).toEqual(["common", "web"]);
		expect(
			result.files.filter((file) => file.startsWith("machines/common/")),
		).toEqual(["machines/common/provision/provision-common.sh"]);
		expect(warn).toHaveBeenCalledTimes(2);
		warn.mockRestore();
	});

	it("should leave an existing project untouched", async () => {
		const projectPath = path.join(temp.path, "lab");
		await fs.outputFile(path.join(projectPath, "notes.txt"), "keep me");

		await expect(
			scaffoldProject({
				projectName: "lab",
				machines: ["web"],
				cwd: temp.path,
				config,
			}),
		).rejects.toMatchObject({ kind: "PROJECT_EXISTS" });

		expect(await listFiles(projectPath)).toEqual(["notes.txt"]);
		expect(mockExeca).not.toHaveBeenCalled();
	});

	it("should check for an existing project before validating names", async () => {
		await fs.ensureDir(path.join(temp.path, "lab"));

		await expect(
			scaffoldProject({
				projectName: "lab",
				machines: ["my web"],
				cwd: temp.path,
				config,
			}),
		).rejects.toMatchObject({ kind: "PROJECT_EXISTS" });
	});

	it("should reject invalid machine names before creating anything", async () => {
		await expect(
			scaffoldProject({
				projectName: "lab",
				machines: ["web", "../escape"],
				cwd: temp.path,
				config,
			}),
		).rejects.toMatchObject({ kind: "INVALID_NAME" });

		expect(await fs.pathExists(path.join(temp.path, "lab"))).toBe(false);
	});

	it("should report a git failure and keep the partial tree", async () => {
		mockExeca.mockRejectedValue(new Error("git not found"));
		const projectPath = path.join(temp.path, "lab");

		await expect(
			scaffoldProject({
				projectName: "lab",
				machines: ["web"],
				cwd: temp.path,
				config,
			}),
		).rejects.toMatchObject({
			kind: "GIT_INIT",
			message: `Failed to initialize git repository in "${projectPath}": git not found`,
		});

		expect(await fs.pathExists(projectPath)).toBe(true);
		expect(await fs.pathExists(path.join(projectPath, "machines"))).toBe(false);
	});

	it("should report a missing template after creating the project", async () => {
		await expect(
			scaffoldProject({
				projectName: "lab",
				machines: ["web"],
				cwd: temp.path,
				config: { ...config, templatesDir: path.join(temp.path, "none") },
			}),
		).rejects.toMatchObject({ kind: "TEMPLATE_MISSING" });

		expect(
			await fs.pathExists(path.join(temp.path, "lab", "images", ".gitkeep")),
		).toBe(true);
	});

	it("should stay silent in quiet mode", async () => {
		const info = vi.spyOn(log, "info");
		const success = vi.spyOn(log, "success");

		await scaffoldProject({
			projectName: "lab",
			machines: ["web"],
			cwd: temp.path,
			config,
			quiet: true,
		});

		expect(info).not.toHaveBeenCalled();
		expect(success).not.toHaveBeenCalled();
		info.mockRestore();
		success.mockRestore();
	});

	it("should write the license for the configured holder", async () => {
		await scaffoldProject({
			projectName: "lab",
			machines: ["web"],
			cwd: temp.path,
			config,
		});

		const license = await fs.readFile(
			path.join(temp.path, "lab", "LICENSE"),
			"utf-8",
		);
		expect(license).toContain("Copyright (c) 2025 Lab Team\n");
	});
});
