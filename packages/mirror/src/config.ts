/**
 * Pipeline configuration.
 *
 * Defaults are overridden by environment variables, which are in turn
 * overridden by explicit values (CLI flags).
 */

export interface MirrorConfig {
  /** Destination sandbox, OSM API 0.6 base URL */
  sandboxApiUrl: string;
  /** Production API, consulted for the create-batch capacity */
  productionApiUrl: string;
  /** Overpass API base URL (without `/interpreter`) */
  overpassEndpoint: string;
  /** Largest accepted bbox area in square degrees */
  maxArea: number;
  /** Existing sandbox element count above which deletion needs confirmation */
  confirmThreshold: number;
  /** Changeset capacity used when a server does not advertise one */
  defaultCapacity: number;
  /** Overpass query timeout in seconds */
  overpassTimeout: number;
  /** `created_by` changeset tag and osmChange generator label */
  createdBy: string;
  deleteComment: string;
  createComment: string;
}

export const DEFAULT_CONFIG: MirrorConfig = {
  sandboxApiUrl: "https://master.apis.dev.openstreetmap.org/api/0.6",
  productionApiUrl: "https://api.openstreetmap.org/api/0.6",
  overpassEndpoint: "https://overpass-api.de/api",
  // ≈ 10×10 km at mid-latitudes
  maxArea: 0.01,
  confirmThreshold: 10000,
  defaultCapacity: 10000,
  overpassTimeout: 300,
  createdBy: "sandbox-mirror 1.0",
  deleteComment: "Clearing an area before uploading",
  createComment: "Copying data from OSM",
};

type Env = Record<string, string | undefined>;

function numberFromEnv(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a positive number, got "${raw}"`);
  }
  return value;
}

/** Drop undefined entries so they don't shadow defaults when spread */
function defined<T extends object>(values: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(values) as (keyof T)[]) {
    if (values[key] !== undefined) result[key] = values[key];
  }
  return result;
}

/**
 * Resolve the effective configuration.
 *
 * Recognized variables: SANDBOX_API_URL, OSM_API_URL, OVERPASS_ENDPOINT,
 * MIRROR_MAX_AREA, MIRROR_CONFIRM_THRESHOLD.
 */
export function resolveConfig(
  overrides: Partial<MirrorConfig> = {},
  env: Env = process.env
): MirrorConfig {
  const fromEnv = defined({
    sandboxApiUrl: env["SANDBOX_API_URL"],
    productionApiUrl: env["OSM_API_URL"],
    overpassEndpoint: env["OVERPASS_ENDPOINT"],
    maxArea: numberFromEnv(env, "MIRROR_MAX_AREA"),
    confirmThreshold: numberFromEnv(env, "MIRROR_CONFIRM_THRESHOLD"),
  });
  return { ...DEFAULT_CONFIG, ...fromEnv, ...defined(overrides) };
}
