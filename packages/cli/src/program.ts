/**
 * sandbox-mirror command line.
 */

import { Command, CommanderError, InvalidArgumentError } from "commander";
import { OsmApiClient, type ClientConfig, type OsmApi } from "@sandbox-mirror/clients-core";
import {
  FILTER_STAGE_NAMES,
  errorMessage,
  exportArea,
  isFilterStageName,
  mirrorArea,
  parseBbox,
  resolveConfig,
  validateBbox,
  type FilterStageName,
} from "@sandbox-mirror/mirror";
import { readAuth, type AuthTarget } from "./auth.js";
import { confirmDeletion } from "./confirm.js";
import { createTerminalPrompt, type Prompt } from "./prompt.js";

export interface CliOptions {
  auth?: boolean;
  overpass?: string;
  sandbox?: string;
  filter?: string;
  date?: string;
  stages?: FilterStageName[];
  osc?: string;
}

export type SandboxApi = OsmApi & AuthTarget;

export interface CliDeps {
  createPrompt: () => Prompt;
  createApi: (config: ClientConfig) => SandboxApi;
  mirrorArea: typeof mirrorArea;
  exportArea: typeof exportArea;
  env: Record<string, string | undefined>;
}

export const defaultDeps: CliDeps = {
  createPrompt: () => createTerminalPrompt(),
  createApi: (config) => new OsmApiClient(config),
  mirrorArea,
  exportArea,
  env: process.env,
};

/** Parse `--stages a,b` into known stage names */
export function parseStages(value: string): FilterStageName[] {
  const names = value
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name !== "");
  const stages: FilterStageName[] = [];
  for (const name of names) {
    if (!isFilterStageName(name)) {
      throw new InvalidArgumentError(
        `Unknown stage "${name}", expected one of: ${FILTER_STAGE_NAMES.join(", ")}`
      );
    }
    stages.push(name);
  }
  return stages;
}

/**
 * Run one mirroring (or export) and return the process exit code.
 *
 * The bbox is validated before anything is asked or downloaded.
 */
export async function run(bboxText: string, options: CliOptions, deps: CliDeps): Promise<number> {
  const config = resolveConfig(
    { overpassEndpoint: options.overpass, sandboxApiUrl: options.sandbox },
    deps.env
  );
  const bbox = validateBbox(parseBbox(bboxText), config.maxArea);
  const donor = { filter: options.filter, date: options.date, stages: options.stages ?? [] };

  if (options.osc) {
    await deps.exportArea({ bbox, path: options.osc, config, ...donor });
    return 0;
  }
  if (!options.auth) {
    throw new Error("Uploading to the sandbox needs credentials, pass --auth");
  }

  const userAgent = config.createdBy;
  const sandbox = deps.createApi({ baseUrl: config.sandboxApiUrl, userAgent });
  const production = deps.createApi({ baseUrl: config.productionApiUrl, userAgent });

  const prompt = deps.createPrompt();
  try {
    const authorization = await readAuth(prompt, sandbox);
    if (authorization === null) {
      console.log("Okay");
      return 0;
    }
    await deps.mirrorArea({
      bbox,
      sandbox,
      production,
      config,
      confirm: confirmDeletion(prompt),
      ...donor,
    });
    return 0;
  } finally {
    prompt.close();
  }
}

export function createProgram(deps: CliDeps, onExit: (code: number) => void): Command {
  const program = new Command();
  program
    .name("sandbox-mirror")
    .description("Downloads data from Overpass API and uploads it to the OSM development sandbox.")
    .argument("<bbox>", "target bounding box as minlon,minlat,maxlon,maxlat")
    .option("-a, --auth", "prompt for sandbox credentials (needed to upload)")
    .option("--overpass <url>", "use a custom Overpass API instance")
    .option("--sandbox <url>", "use a custom sandbox API (OSM API 0.6 base URL)")
    .option("--filter <expr>", 'Overpass tag filter, e.g. "building" or "highway"="path"')
    .option("--date <iso>", "copy the data as it was at this date")
    .option(
      "--stages <list>",
      `filter stages to run after download (${FILTER_STAGE_NAMES.join(", ")})`,
      parseStages
    )
    .option("--osc <file>", "write an osmChange file instead of touching the sandbox")
    .showHelpAfterError()
    .exitOverride()
    .action(async (bbox: string, options: CliOptions) => {
      onExit(await run(bbox, options, deps));
    });
  return program;
}

/**
 * Parse arguments and run; never throws.
 *
 * @param argv - Full argv, node and script path included
 */
export async function main(argv: string[], deps: CliDeps = defaultDeps): Promise<number> {
  let code = 0;
  const program = createProgram(deps, (exitCode) => {
    code = exitCode;
  });
  try {
    await program.parseAsync(argv);
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    console.error(`[error] ${errorMessage(err)}`);
    return 1;
  }
  return code;
}
