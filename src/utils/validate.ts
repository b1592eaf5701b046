import { ScaffoldError } from "./errors.js";

// Names end up in hostnames, shell word lists and Ruby string literals.
const NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/**
 * Returns an error string when `name` is not usable as a project or machine
 * name, or `true` when it is.
 */
export function validateName(name: string): true | string {
	if (name.length === 0) {
		return "Name must not be empty";
	}
	if (!NAME_PATTERN.test(name)) {
		return `"${name}" must start with a letter or digit and contain only letters, digits, ".", "_" or "-"`;
	}
	return true;
}

export function assertValidName(label: string, name: string): void {
	const result = validateName(name);
	if (result !== true) {
		throw new ScaffoldError("INVALID_NAME", `Invalid ${label}: ${result}`);
	}
}
