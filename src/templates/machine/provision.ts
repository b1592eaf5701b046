export function generateProvisionScript(vmName: string): string {
	return `#!/usr/bin/env bash
# Provisioning for ${vmName}. Runs after the common provisioning script.
set -euo pipefail

export DEBIAN_FRONTEND=noninteractive

echo "==> [${vmName}] provisioning"
`;
}
