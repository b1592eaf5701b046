import { type Options, execa } from "execa";

export async function execCommand(
	command: string,
	args: string[],
	options?: Options,
): Promise<{ stdout: string; stderr: string }> {
	const result = await execa(command, args, {
		stdio: "pipe",
		...options,
	});
	return {
		stdout: typeof result.stdout === "string" ? result.stdout : "",
		stderr: typeof result.stderr === "string" ? result.stderr : "",
	};
}

export async function gitInit(cwd: string): Promise<void> {
	await execCommand("git", ["init"], { cwd });
}
