#!/usr/bin/env npx tsx
/**
 * Seed the local vector index with curated documents.
 *
 * Usage: npx tsx scripts/seed-index.ts <documents.json> [--config path/to/config.json]
 *
 * The JSON file holds an array of { content, source, url? } objects.
 */

import fs from "fs";
import path from "path";
import { z } from "zod";
import { loadAppConfig } from "../src/lib/config-loader";
import { createVerifier } from "../src/lib/analyzer/verifier";
import { errorMessage } from "../src/lib/errors";

const DocumentsFileSchema = z.array(
  z.object({
    content: z.string().min(1),
    source: z.string().min(1),
    url: z.string().url().optional(),
  }),
);

async function main(): Promise<number> {
  const argv = process.argv.slice(2);
  const configIdx = argv.indexOf("--config");
  const configPath = configIdx >= 0 ? argv[configIdx + 1] : undefined;
  const file = argv.find((arg, i) => !arg.startsWith("--") && (configIdx < 0 || i !== configIdx + 1));

  if (!file) {
    console.error("Usage: npx tsx scripts/seed-index.ts <documents.json> [--config path]");
    return 1;
  }

  const parsed = DocumentsFileSchema.safeParse(JSON.parse(fs.readFileSync(path.resolve(file), "utf-8")));
  if (!parsed.success) {
    console.error(`Invalid documents file ${file}:`);
    for (const issue of parsed.error.issues) console.error(`  - [${issue.path.join(".")}] ${issue.message}`);
    return 1;
  }

  const { config } = loadAppConfig({ filePath: configPath });
  const verifier = createVerifier(config);
  try {
    const result = await verifier.addDocuments(parsed.data);
    const status = await verifier.status();
    console.log(`Submitted ${result.submitted} documents (success=${result.success}); index size: ${status.indexSize ?? "unknown"}`);
    return result.success ? 0 : 1;
  } finally {
    await verifier.close();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    console.error(`Seeding failed: ${errorMessage(err)}`);
    process.exit(1);
  });
