/**
 * Config command - Show where user settings live and which keys exist
 */

import { getUserConfigPath, loadDefaultConfig } from "../../utils";
import type { ConverterConfig } from "../../types";

/**
 * One `section.key = value` line per setting
 */
export function describeConfig(config: ConverterConfig): string[] {
  const lines: string[] = [];
  for (const [section, settings] of Object.entries(config)) {
    for (const [key, value] of Object.entries(settings)) {
      lines.push(`${section}.${key} = ${JSON.stringify(value)}`);
    }
  }
  return lines;
}

export async function configCommand(): Promise<void> {
  try {
    const defaults = await loadDefaultConfig();

    console.log("User configuration file location:");
    console.log(getUserConfigPath());
    console.log("\nSettings and their defaults:");
    for (const line of describeConfig(defaults)) {
      console.log(`  ${line}`);
    }
    console.log(
      '\nOverride any of them in JSON, e.g. { "translation": { "latchScope": "span" } }',
    );
  } catch (error) {
    console.error(error);
    process.exit(1);
  }
}
