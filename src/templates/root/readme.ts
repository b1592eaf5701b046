import type { ScaffoldConfig } from "../../types/index.js";
import { machineAddress, machineDirName } from "../../utils/paths.js";

export function generateReadme(
	projectName: string,
	machines: string[],
	config: ScaffoldConfig,
): string {
	const rows = machines
		.map((machine, index) => {
			const name = machineDirName(projectName, machine);
			return `| \`${name}\` | ${machineAddress(config.network, index)} | \`machines/${name}/provision/provision-${machine}.sh\` |`;
		})
		.join("\n");

	return `# ${projectName}

A multi-machine [Vagrant](https://www.vagrantup.com/) environment running on
VirtualBox.

## Machines

| Machine | Address | Provisioning |
|---------|---------|--------------|
${rows}

Every machine runs \`machines/common/provision/provision-common.sh\` before
its own provisioning script.

Box: \`${config.box}\` · Memory: ${config.memory} MB · CPUs: ${config.cpus}

## Usage

### Prerequisites

- [Vagrant](https://developer.hashicorp.com/vagrant/install)
- [VirtualBox](https://www.virtualbox.org/wiki/Downloads)

### Start and stop

\`\`\`bash
./start-vms.sh    # or start-vms.bat on Windows
./stop-vms.sh     # or stop-vms.bat
\`\`\`

### Guest additions

\`\`\`bash
./add-vbox-guest-additions.sh
\`\`\`

Installs the \`vagrant-vbguest\` plugin if needed and updates the VirtualBox
guest additions on every machine.

## Project Structure

\`\`\`
├── images/                 # Exported boxes and disk images (not committed)
├── machines/
│   ├── common/provision/   # Provisioning shared by all machines
│   └── ${projectName}-<machine>/
│       ├── files/          # Files synced to /vagrant/files
│       ├── provision/      # Machine-specific provisioning
│       └── Vagrantfile
├── start-vms.{sh,bat}
├── stop-vms.{sh,bat}
└── add-vbox-guest-additions.{sh,bat}
\`\`\`
`;
}
