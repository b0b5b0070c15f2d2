#!/usr/bin/env node
/**
 * routedef CLI
 *
 * Usage:
 *   routedef [--config routedef.json] [--out-dir dir] [--check] [--list] <files...>
 *
 * Expands every `defineRoutes!( ... )` invocation of each file and writes the
 * result next to it as `<name>.g.ts` (see `outputSuffix`), or under --out-dir.
 *
 *   --config   JSON file with compiler options
 *   --out-dir  Directory for the generated files
 *   --check    Write nothing, exit with 1 when a generated file is missing or stale
 *   --list     Print the route tables found
 */

import * as fs from "fs/promises";
import { uniq } from "lodash";
import path from "path";
import { Either, Left, Right } from "purify-ts/Either";
import { debuglog } from "util";
import { parseConfigFile, resolveOptions } from "./routes.config";
import type { CompilerOptions } from "./routes.config";
import { expandMacros, listRoutes } from "./routes.compiler";
import { tryExtractErrorMessage } from "./utils";

const log = debuglog("routedef");

export type CliArgs = {
  files: string[];
  configPath: string | null;
  outDir: string | null;
  check: boolean;
  list: boolean;
};

export function parseArgs(argv: string[]): Either<string, CliArgs> {
  const args: CliArgs = {
    files: [],
    configPath: null,
    outDir: null,
    check: false,
    list: false,
  };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--check") {
      args.check = true;
    } else if (arg === "--list") {
      args.list = true;
    } else if (arg === "--config" || arg === "--out-dir") {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        return Left(`Missing value for ${arg}`);
      }
      if (arg === "--config") {
        args.configPath = value;
      } else {
        args.outDir = value;
      }
      i++;
    } else if (arg.startsWith("--")) {
      return Left(`Unknown option: ${arg}`);
    } else {
      args.files.push(arg);
    }
  }
  if (args.files.length === 0) {
    return Left("No input files");
  }
  return Right({ ...args, files: uniq(args.files) });
}

// eg: src/app.ts -> src/app.g.ts
export function outputPathFor(
  file: string,
  outDir: string | null,
  suffix: string
): string {
  const parsed = path.parse(file);
  return path.join(outDir === null ? parsed.dir : outDir, parsed.name + suffix);
}

// Two inputs sharing a name would write the same file under --out-dir
function findOutputCollision(
  files: string[],
  outDir: string | null,
  suffix: string
): string | null {
  const seen = new Map<string, string>();
  for (const file of files) {
    const outFile = path.resolve(outputPathFor(file, outDir, suffix));
    const other = seen.get(outFile);
    if (other !== undefined) {
      return `${other} and ${file} would both be written to ${outFile}`;
    }
    seen.set(outFile, file);
  }
  return null;
}

export function generatedHeader(file: string): string {
  return `// Generated by routedef from ${path.basename(file)}. Do not edit.\n`;
}

async function loadOptions(
  configPath: string | null
): Promise<Either<string, CompilerOptions>> {
  if (configPath === null) {
    return Right(resolveOptions());
  }
  let text: string;
  try {
    text = await fs.readFile(configPath, "utf8");
  } catch (err) {
    return Left(`Can't read config ${configPath}: ${tryExtractErrorMessage(err)}`);
  }
  return parseConfigFile(text)
    .mapLeft((err) => `Invalid config ${configPath}: ${err}`)
    .map(resolveOptions);
}

async function readIfExists(file: string): Promise<string | null> {
  try {
    return await fs.readFile(file, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return null;
    }
    throw err;
  }
}

// Returns false when the file made the run fail
async function processFile(
  file: string,
  args: CliArgs,
  opts: CompilerOptions
): Promise<boolean> {
  if (file.endsWith(opts.outputSuffix)) {
    console.error(`${file}: refusing to expand a generated file`);
    return false;
  }
  let source: string;
  try {
    source = await fs.readFile(file, "utf8");
  } catch (err) {
    console.error(`${file}: ${tryExtractErrorMessage(err)}`);
    return false;
  }

  const expansion = expandMacros(source, opts);
  if (expansion.isLeft()) {
    const err = expansion.extract();
    console.error(
      `${file}:${err.position.line}:${err.position.column}: expected ${err.expected}, found ${err.found}`
    );
    return false;
  }
  const { code, tables } = expansion.unsafeCoerce();
  if (tables.length === 0) {
    console.warn(`${file}: no ${opts.macroName}! invocation found, skipping`);
    return true;
  }

  if (args.list) {
    console.log(`${file}:`);
    for (const table of tables) {
      for (const line of listRoutes(table, opts)) {
        console.log("  " + line);
      }
    }
  }

  const outFile = outputPathFor(file, args.outDir, opts.outputSuffix);
  const output = generatedHeader(file) + code;
  if (args.check) {
    const existing = await readIfExists(outFile);
    if (existing !== output) {
      console.error(`${outFile} is out of date, run routedef ${file}`);
      return false;
    }
    log(`${outFile} is up to date`);
    return true;
  }

  await fs.mkdir(path.dirname(outFile), { recursive: true });
  await fs.writeFile(outFile, output, "utf8");
  console.log(`[routedef] Generated: ${outFile}`);
  return true;
}

/**
 * Runs the CLI, resolving to the process exit code.
 */
export async function main(argv: string[]): Promise<number> {
  const parsedArgs = parseArgs(argv);
  if (parsedArgs.isLeft()) {
    console.error(parsedArgs.extract());
    return 1;
  }
  const args = parsedArgs.unsafeCoerce();

  const loaded = await loadOptions(args.configPath);
  if (loaded.isLeft()) {
    console.error(loaded.extract());
    return 1;
  }
  const opts = loaded.unsafeCoerce();
  log(`Options: ${JSON.stringify(opts)}`);

  const collision = findOutputCollision(args.files, args.outDir, opts.outputSuffix);
  if (collision !== null) {
    console.error(collision);
    return 1;
  }

  let ok = true;
  for (const file of args.files) {
    const fileOk = await processFile(file, args, opts);
    ok = ok && fileOk;
  }
  return ok ? 0 : 1;
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then(function (code) {
      process.exitCode = code;
    })
    .catch(function (err) {
      console.error("routedef failed: " + tryExtractErrorMessage(err));
      if (err instanceof Error) {
        console.error(`Stacktrace: ${err.stack}`);
      }
      process.exitCode = 1;
    });
}
