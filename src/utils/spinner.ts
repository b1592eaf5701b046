import ora, { type Ora } from "ora";

let silent = false;

/**
 * Suppress spinners for machine-readable output (--json).
 */
export function setSpinnerSilent(value: boolean): void {
	silent = value;
}

export function createSpinner(text: string): Ora {
	return ora({ text, color: "cyan", isSilent: silent });
}

export async function withSpinner<T>(
	text: string,
	fn: () => Promise<T>,
): Promise<T> {
	const spinner = createSpinner(text).start();
	try {
		const result = await fn();
		spinner.succeed();
		return result;
	} catch (error) {
		spinner.fail();
		throw error;
	}
}
