import { loadConfig } from "../../config";

export function validateConfig(configPath?: string): boolean {
  const result = loadConfig(configPath);
  if (result.success) {
    console.log(`✅ Config check passed: ${result.path}`);
    return true;
  }
  console.error(`❌ Config check failed: ${result.path}`);
  for (const error of result.errors ?? []) {
    console.error(`- ${error}`);
  }
  process.exitCode = 1;
  return false;
}
