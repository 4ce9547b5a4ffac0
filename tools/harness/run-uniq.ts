/*
  Uniq pipe harness
  - Runs a JSON array or NDJSON feed file through the uniq pipe
  - Prints each emitted item as one JSON line, followed by a summary
  Usage:
    npx tsx tools/harness/run-uniq.ts --file data/feed.json --key link
    npx tsx tools/harness/run-uniq.ts --file data/feed.ndjson --verbose
*/

import { createReadStream, promises as fs } from "fs";
import path from "path";
import readline from "readline";
import { streamPipe } from "../../src/services/uniq.service";
import { createLogger } from "../../src/config/logger";
import { loadConfig } from "../../src/config/config";

interface Args {
  file?: string;
  key?: string;
  verbose?: boolean;
}

function parseArgs(): Args {
  const out: Args = {};
  const argv = process.argv.slice(2);
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === "--file") out.file = argv[++i];
    else if (a === "--key") out.key = argv[++i];
    else if (a === "--verbose") out.verbose = true;
  }
  return out;
}

// NDJSON is streamed line by line so large feeds are never loaded whole
async function* readNdjson(file: string): AsyncGenerator<unknown, void, undefined> {
  const lines = readline.createInterface({ input: createReadStream(file, "utf8"), crlfDelay: Infinity });
  let lineNo = 0;
  for await (const line of lines) {
    lineNo++;
    if (!line.trim()) continue;
    try {
      yield JSON.parse(line);
    } catch (err) {
      throw new Error(`${path.basename(file)}:${lineNo}: invalid JSON (${err instanceof Error ? err.message : String(err)})`);
    }
  }
}

async function readJsonArray(file: string): Promise<unknown[]> {
  const parsed: unknown = JSON.parse(await fs.readFile(file, "utf8"));
  if (!Array.isArray(parsed)) throw new Error(`${path.basename(file)}: expected a JSON array of items`);
  return parsed;
}

async function run() {
  const args = parseArgs();
  if (!args.file) {
    throw new Error("--file is required");
  }
  const cfg = loadConfig();
  // Harness runs are verbose unless LOG_LEVEL says otherwise
  const log = createLogger(process.env.LOG_LEVEL ? cfg.logLevel : "debug", { logDir: cfg.logDir });

  const file = path.resolve(args.file);
  log.info("harness:file", { file });
  const source = file.toLowerCase().endsWith(".ndjson") ? readNdjson(file) : await readJsonArray(file);

  let emitted = 0;
  const items = streamPipe(source, {
    conf: args.key ? { uniq_key: args.key } : undefined,
    context: { runId: `harness-${Date.now()}`, verbose: args.verbose },
    logger: log,
  });
  for await (const item of items) {
    emitted++;
    process.stdout.write(JSON.stringify(item) + "\n");
  }
  log.info("harness:done", { emitted });
}

run().catch((e: unknown) => {
  console.error("[harness] fatal:", e instanceof Error ? e.message : e);
  process.exitCode = 1;
});
