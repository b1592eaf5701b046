export interface CommonProvisionValues {
	projectName: string;
	/** Full VM names of the non-common machines. */
	vmNames: string[];
	/** `name=address` pairs for /etc/hosts. */
	hosts: string[];
}

/**
 * Fill the placeholders of the static common provisioning template.
 */
export function renderCommonProvision(
	template: string,
	values: CommonProvisionValues,
): string {
	return template
		.replaceAll("{{PROJECT_NAME}}", values.projectName)
		.replaceAll("{{MACHINES}}", values.vmNames.join(" "))
		.replaceAll("{{HOSTS}}", values.hosts.join(" "));
}
