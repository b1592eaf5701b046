import { toBatch } from "./batch.js";

const PLUGIN = "vagrant-vbguest";

export function generateGuestAdditionsScript(machineDirs: string[]): string {
	return `#!/usr/bin/env bash
set -e

cd "\$(dirname "\$0")"

if ! vagrant plugin list | grep -q "${PLUGIN}"; then
  echo "==> Installing ${PLUGIN} plugin"
  vagrant plugin install ${PLUGIN}
fi

for machine in ${machineDirs.join(" ")}; do
  echo "==> Updating guest additions on \$machine"
  (cd "machines/\$machine" && vagrant vbguest --do install)
done
`;
}

export function generateGuestAdditionsBat(machineDirs: string[]): string {
	return toBatch([
		"@echo off",
		'pushd "%~dp0"',
		`vagrant plugin list | findstr /c:"${PLUGIN}" >nul`,
		"if errorlevel 1 (",
		`  echo ==^> Installing ${PLUGIN} plugin`,
		`  call vagrant plugin install ${PLUGIN}`,
		")",
		`for %%m in (${machineDirs.join(" ")}) do (`,
		"  echo ==^> Updating guest additions on %%m",
		"  pushd machines\\%%m",
		"  call vagrant vbguest --do install",
		"  popd",
		")",
		"popd",
	]);
}
