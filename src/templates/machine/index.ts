export { generateVagrantfile } from "./vagrantfile.js";
export { generateProvisionScript } from "./provision.js";
export { renderCommonProvision } from "./common-provision.js";
