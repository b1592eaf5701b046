import type { ScaffoldConfig } from "../../types/index.js";
import { COMMON_MACHINE, provisionScriptName } from "../../utils/paths.js";

export interface VagrantfileOptions {
	/** Full VM name, `<project>-<machine>`. */
	vmName: string;
	machine: string;
	address: string;
	config: ScaffoldConfig;
}

export function generateVagrantfile({
	vmName,
	machine,
	address,
	config,
}: VagrantfileOptions): string {
	const commonScript = `../${COMMON_MACHINE}/provision/${provisionScriptName(COMMON_MACHINE)}`;

	return `# -*- mode: ruby -*-
# vi: set ft=ruby :

Vagrant.configure("2") do |config|
  config.vm.define "${vmName}"
  config.vm.box = "${config.box}"
  config.vm.hostname = "${vmName}"
  config.vm.network "private_network", ip: "${address}"

  config.vm.synced_folder "files", "/vagrant/files"

  config.vm.provider "virtualbox" do |vb|
    vb.name = "${vmName}"
    vb.memory = ${config.memory}
    vb.cpus = ${config.cpus}
  end

  config.vm.provision "shell", path: "${commonScript}"
  config.vm.provision "shell", path: "provision/${provisionScriptName(machine)}"
end
`;
}
