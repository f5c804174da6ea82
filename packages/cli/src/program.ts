/**
 * Command definitions for the catalog CLI
 *
 * The program is built per invocation so tests can drive it in-process with
 * their own environment, output sinks and store factory.
 */

import { readFile } from "node:fs/promises";
import { Command, CommanderError } from "commander";
import {
  createCatalogStore,
  loadConfig,
  logger,
  validateRecord,
  validateUpdate,
  type CatalogStore,
  type Environment,
  type SelectorOptions,
} from "@service-catalog/store";
import { mergeFields, parseBackend, parseJsonObject } from "./lib/arg.js";
import { resolveEnvironment, isVerbose, type GlobalOptions } from "./lib/env.js";
import { CliError, formatCliError, mapErrorToExitCode } from "./lib/errors.js";
import { colorizeError, renderJson, renderTable } from "./lib/render.js";
import { metricHook } from "./lib/telemetry.js";

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export type StoreFactory = (env: Environment, options: SelectorOptions) => CatalogStore;

export interface CliDeps {
  env: Environment;
  io: CliIO;
  /** Defaults to the backend selector over loadConfig(env), which also sets the log level */
  openStore?: StoreFactory;
  version?: string;
}

type ListOptions = { category?: string; search?: string; raw?: boolean; table?: boolean };
type GetOptions = { raw?: boolean };
type PayloadOptions = { data?: string; file?: string };
type CreateOptions = PayloadOptions & { name?: string; category?: string; description?: string };
type UpdateOptions = PayloadOptions & { category?: string; description?: string };
type DeleteOptions = { force?: boolean };

export const defaultStoreFactory: StoreFactory = (env, options) => {
  const config = loadConfig(env);
  logger.setLevel(config.logLevel);
  return createCatalogStore(config, options);
};

/**
 * Read a JSON object payload from --data or --file
 */
async function readPayload(options: PayloadOptions): Promise<Record<string, unknown>> {
  if (options.data !== undefined && options.file !== undefined) {
    throw new CliError("Cannot use both --file and --data; choose one");
  }
  if (options.data !== undefined) {
    return parseJsonObject(options.data, "--data");
  }
  if (options.file !== undefined) {
    let content: string;
    try {
      content = await readFile(options.file, "utf8");
    } catch (err) {
      throw new CliError(`Cannot read ${options.file}`, { cause: err });
    }
    return parseJsonObject(content, `file ${options.file}`);
  }
  return {};
}

export function createProgram(deps: CliDeps): Command {
  const { io } = deps;
  const storeFactory = deps.openStore ?? defaultStoreFactory;
  const program = new Command();

  // Output and exit handling must be configured before subcommands inherit it
  program
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.stdout(str),
      writeErr: (str) => io.stderr(colorizeError(str)),
    });

  program
    .name("catalog")
    .description("Service catalog store - local file or object store backed")
    .version(deps.version ?? "0.0.0")
    .option("--backend <kind>", "Storage backend: local or remote", parseBackend)
    .option("--path <file>", "Local document path")
    .option("--bucket <name>", "Remote bucket")
    .option("--key <key>", "Remote object key")
    .option("--seed <file>", "Seed dataset for a missing document")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  const openStore = (): CatalogStore => {
    const opts = globals();
    const hooks = isVerbose(opts, deps.env) ? [metricHook(io.stderr)] : [];
    return storeFactory(resolveEnvironment(opts, deps.env), { instrumentation: { hooks } });
  };

  const report = (message: string): void => {
    if (!globals().quiet) {
      io.stdout(message + "\n");
    }
  };

  program
    .command("init")
    .description("Create the catalog document from the seed dataset if it does not exist")
    .action(async () => {
      const store = openStore();
      const records = await store.list();
      report(`Catalog ready at ${store.describe().location} (${records.length} records)`);
    });

  program
    .command("list")
    .description("List records in catalog order")
    .option("--category <category>", "Only records in this category (case-insensitive)")
    .option("--search <text>", "Only records whose name or description contains text")
    .option("--raw", "Output raw JSON without formatting")
    .option("--table", "Output aligned columns instead of JSON")
    .action(async (options: ListOptions) => {
      const records = await openStore().list({
        category: options.category,
        search: options.search,
      });
      io.stdout(options.table ? renderTable(records) : renderJson(records, { raw: options.raw }));
    });

  program
    .command("get <name>")
    .description("Show a record")
    .option("--raw", "Output raw JSON without formatting")
    .action(async (name: string, options: GetOptions) => {
      const record = await openStore().get(name);
      io.stdout(renderJson(record, { raw: options.raw }));
    });

  program
    .command("create")
    .description("Add a record")
    .option("--name <name>", "Record name (unique)")
    .option("--category <category>", "Record category")
    .option("--description <text>", "Record description")
    .option("--data <json>", "Inline JSON record")
    .option("--file <path>", "Read the record from a JSON file")
    .action(async (options: CreateOptions) => {
      const payload = mergeFields(await readPayload(options), {
        name: options.name,
        category: options.category,
        description: options.description,
      });
      const created = await openStore().create(validateRecord(payload));
      report(`Created ${created.name}`);
    });

  program
    .command("update <name>")
    .description("Change a record's category and/or description")
    .option("--category <category>", "New category")
    .option("--description <text>", "New description")
    .option("--data <json>", "Inline JSON with the fields to change")
    .option("--file <path>", "Read the fields to change from a JSON file")
    .action(async (name: string, options: UpdateOptions) => {
      const payload = mergeFields(await readPayload(options), {
        category: options.category,
        description: options.description,
      });
      if (Object.keys(payload).length === 0) {
        throw new CliError("Nothing to update; pass --category, --description or --data");
      }
      const updated = await openStore().update(name, validateUpdate(payload));
      report(`Updated ${updated.name}`);
    });

  program
    .command("delete <name>")
    .description("Remove a record")
    .option("--force", "Confirm removal")
    .action(async (name: string, options: DeleteOptions) => {
      if (!options.force) {
        throw new CliError("Use --force to confirm deletion");
      }
      await openStore().delete(name);
      report(`Deleted ${name}`);
    });

  return program;
}

/**
 * Run the CLI and return the process exit code
 * @param argv - Arguments after the executable and script path
 */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const program = createProgram(deps);

  try {
    await program.parseAsync(argv, { from: "user" });
    return 0;
  } catch (err) {
    // Commander has already written its own usage/help output
    if (err instanceof CommanderError) {
      return err.exitCode;
    }

    const verbose = isVerbose(program.opts<GlobalOptions>(), deps.env);
    deps.io.stderr(`Error: ${formatCliError(err, verbose)}\n`);
    return mapErrorToExitCode(err);
  }
}
