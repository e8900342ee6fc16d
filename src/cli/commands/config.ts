/**
 * Config command - Show where settings come from and what they resolve to
 */

import { describeConfigError, getUserConfigPath, loadConfig } from "../../utils";

export async function showConfig(
  userConfigPath: string = getUserConfigPath(),
): Promise<void> {
  const { config, errors } = await loadConfig(undefined, userConfigPath);

  console.log("User configuration file location:");
  console.log(userConfigPath);
  console.log("\nEffective settings:");
  console.log(`  unoconv path: ${config.unoconvPath}`);
  console.log(
    `  timeout:      ${config.timeout === 0 ? "none" : `${config.timeout}ms`}`,
  );
  console.log(`  log level:    ${config.logging.level}`);

  for (const err of errors) {
    console.log(`\n${describeConfigError(err)}`);
  }
}

export async function configCommand(): Promise<void> {
  await showConfig();
}
