/**
 * Playground: Inspect Model Resolution
 *
 * Loads a gateway config and prints how model strings resolve, which
 * providers are configured and which aliases apply. Makes no upstream calls.
 *
 * Usage:
 *   npm run playground:resolve -- [config.yml] [model...]
 *
 * Examples:
 *   npm run playground:resolve
 *   npm run playground:resolve -- config/gateway.example.yml poe:best "!openai:gpt-4o" my-fast-model
 */

import { join } from "path";
import { createGateway, type Gateway } from "../src/gateway.js";
import { getConfigDir, loadGatewayConfig } from "../src/config/loader.js";
import { createConsoleLogger } from "../src/utils/logger.js";

// ─────────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────────

const [configArg, ...modelArgs] = process.argv.slice(2);
const CONFIG_PATH = configArg ?? join(getConfigDir(), "gateway.example.yml");
const MODELS =
  modelArgs.length > 0 ? modelArgs : ["fast", "poe:best", "!openai:gpt-4o", "sonnet", "work:quick"];

// ─────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────

const log = (message: string) => console.log(`\n${message}`);
const divider = () => console.log("─".repeat(60));

// ─────────────────────────────────────────────────────────────────
// Sections
// ─────────────────────────────────────────────────────────────────

const showProviders = (gateway: Gateway) => {
  log("📌 Providers");
  divider();
  for (const provider of gateway.listProviders()) {
    const auth = provider.passthrough ? "passthrough" : `${provider.keyCount} key(s)`;
    console.log(`${provider.name.padEnd(12)} ${provider.format.padEnd(10)} ${auth.padEnd(12)} ${provider.baseUrl}`);
  }
};

const showAliases = (gateway: Gateway) => {
  const summary = gateway.listAliases();
  log(`📌 Aliases (${summary.totalAliases}, ${summary.totalFallbacks} fallback)`);
  divider();
  console.log(`Default provider: ${summary.defaultProvider ?? "(none)"}`);
  for (const provider of summary.providers) {
    console.log(`\n${provider.provider}:`);
    for (const alias of provider.aliases) {
      const marker = alias.type === "fallback" ? " (fallback)" : "";
      console.log(`  ${alias.alias} -> ${alias.target}${marker}`);
    }
  }
};

const showProfiles = (gateway: Gateway) => {
  const profiles = gateway.listProfiles();
  if (profiles.length === 0) return;
  log(`📌 Profiles (${profiles.length})`);
  divider();
  for (const profile of profiles) {
    const timeout = profile.timeoutMs !== undefined ? ` timeout ${profile.timeoutMs}ms` : "";
    const retries = profile.maxRetries !== undefined ? ` retries ${profile.maxRetries}` : "";
    console.log(`${profile.name}:${timeout}${retries}`);
    for (const alias of profile.aliases) {
      console.log(`  ${alias.alias} -> ${alias.target}`);
    }
  }
};

const showResolutions = (gateway: Gateway) => {
  log("📌 Resolutions");
  divider();
  for (const model of MODELS) {
    const result = gateway.resolve(model);
    if (result.isErr()) {
      console.log(`${model.padEnd(24)} ✗ ${result.error.message}`);
      continue;
    }
    const { provider, resolvedModel, wasResolved, resolutionPath, profile } = result.value;
    const path = resolutionPath.length > 0 ? ` via ${resolutionPath.join(" -> ")}` : "";
    const via = profile ? ` [profile ${profile.name}]` : "";
    const status = wasResolved ? "✓" : "=";
    console.log(`${model.padEnd(24)} ${status} ${provider ?? "?"}:${resolvedModel}${path}${via}`);
  }

  const stats = gateway.getCacheStats();
  console.log(`\nCache: ${stats.size} entries, ${stats.hits} hits, ${stats.misses} misses`);
};

// ─────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────

const main = () => {
  console.log(`Config: ${CONFIG_PATH}`);
  const logger = createConsoleLogger({ level: "warn" });
  const gateway = createGateway(loadGatewayConfig({ path: CONFIG_PATH, logger }), { logger });

  showProviders(gateway);
  showAliases(gateway);
  showProfiles(gateway);
  showResolutions(gateway);
};

try {
  main();
} catch (error) {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
}
