import { ensureConfig } from "../config";
import { getFlags } from "../context/flags";
import { listProviders, resolveProvider } from "../providers";
import { printError } from "../errors";

export async function runAiStatus(): Promise<void> {
  const config = ensureConfig();
  const flags = getFlags();
  const requested = flags.provider ?? config.ai.preferred_provider;
  const settings = { endpoint: config.ai.endpoint, model: flags.model ?? (config.ai.model || undefined) };
  const resolution = await resolveProvider(requested, settings);
  if (!resolution.ok) {
    if (resolution.reason === "invalid") {
      printError("AF-1506", `Invalid provider '${requested}'. ${resolution.details}`);
      process.exitCode = 1;
      return;
    }
    printError("AF-1504", resolution.details);
    for (const provider of listProviders(settings)) {
      const status = await provider.version();
      console.log(`${provider.label}: ${status.ok ? status.output : `unavailable (${status.error})`}`);
    }
    process.exitCode = 1;
    return;
  }
  const activeStatus = await resolution.provider.version();
  console.log(`Provider selected: ${resolution.selected}`);
  console.log(`${resolution.provider.label} available: ${activeStatus.output}`);
}
