import { toBatch } from "./batch.js";

function shellScript(machineDirs: string[], verb: string, command: string) {
	return `#!/usr/bin/env bash
set -e

cd "\$(dirname "\$0")"

for machine in ${machineDirs.join(" ")}; do
  echo "==> ${verb} \$machine"
  (cd "machines/\$machine" && vagrant ${command})
done
`;
}

function batchScript(machineDirs: string[], verb: string, command: string) {
	return toBatch([
		"@echo off",
		'pushd "%~dp0"',
		`for %%m in (${machineDirs.join(" ")}) do (`,
		`  echo ==^> ${verb} %%m`,
		"  pushd machines\\%%m",
		`  call vagrant ${command}`,
		"  popd",
		")",
		"popd",
	]);
}

export function generateStartVmsScript(machineDirs: string[]): string {
	return shellScript(machineDirs, "Starting", "up");
}

export function generateStartVmsBat(machineDirs: string[]): string {
	return batchScript(machineDirs, "Starting", "up");
}

// Machines stop in reverse start order.
export function generateStopVmsScript(machineDirs: string[]): string {
	return shellScript([...machineDirs].reverse(), "Stopping", "halt");
}

export function generateStopVmsBat(machineDirs: string[]): string {
	return batchScript([...machineDirs].reverse(), "Stopping", "halt");
}
