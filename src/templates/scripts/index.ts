export {
	generateStartVmsBat,
	generateStartVmsScript,
	generateStopVmsBat,
	generateStopVmsScript,
} from "./vms.js";
export {
	generateGuestAdditionsBat,
	generateGuestAdditionsScript,
} from "./guest-additions.js";
