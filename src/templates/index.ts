// Root templates
export * from "./root/index.js";

// VM helper scripts
export * from "./scripts/index.js";

// Per-machine templates
export * from "./machine/index.js";
