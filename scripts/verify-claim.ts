#!/usr/bin/env npx tsx
/**
 * Verify a single claim from the command line.
 *
 * Usage: npx tsx scripts/verify-claim.ts "<claim>" [--config path/to/config.json] [--json]
 *
 * Exits with code 1 when verification does not succeed.
 */

import { loadAppConfig } from "../src/lib/config-loader";
import { createVerifier } from "../src/lib/analyzer/verifier";
import { formatCitations } from "../src/lib/analyzer/answer-synthesizer";
import { ConfigError, errorMessage } from "../src/lib/errors";

type CliArgs = { claim: string; configPath?: string; json: boolean };

function parseArgs(argv: string[]): CliArgs {
  const rest: string[] = [];
  let configPath: string | undefined;
  let json = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--config") {
      configPath = argv[++i];
    } else if (arg === "--json") {
      json = true;
    } else {
      rest.push(arg);
    }
  }

  if (rest.length === 0) {
    console.error('Usage: npx tsx scripts/verify-claim.ts "<claim>" [--config path] [--json]');
    process.exit(1);
  }
  return { claim: rest.join(" "), configPath, json };
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  const { config, sourceFile, overrides } = loadAppConfig({ filePath: args.configPath });
  if (!args.json) {
    console.log(`Config: ${sourceFile ?? "defaults"}${overrides.length ? ` (+${overrides.length} env overrides)` : ""}`);
  }

  const verifier = createVerifier(config);
  try {
    const result = await verifier.verify(args.claim);

    if (args.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      console.log(`\nVerdict: ${result.verdict} (${result.sourceLabel ?? "no retrieval"})\n`);
      console.log(result.finalAnswer);
      console.log("\nCitations:");
      console.log(formatCitations(result.citations));
      if (result.error) console.error(`\nError: ${result.error}`);
    }
    return result.success ? 0 : 1;
  } finally {
    await verifier.close();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    if (err instanceof ConfigError) {
      console.error("Invalid configuration:");
      for (const issue of err.issues) console.error(`  - ${issue}`);
    } else {
      console.error(`Verification failed: ${errorMessage(err)}`);
    }
    process.exit(1);
  });
