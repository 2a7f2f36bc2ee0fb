import fs from "fs/promises";
import path from "path";
import dotenv from "dotenv";
import { load } from "js-yaml";
import { z } from "zod";
import { DEFAULT_MIN_INTERVAL_MS, DEFAULT_TIMEOUT_MS } from "@bibverify/refcheck";

export const SETTINGS_FILE = "bibverify.config.yaml";

const SettingsSchema = z
  .object({
    minIntervalMs: z.coerce.number().int().nonnegative().default(DEFAULT_MIN_INTERVAL_MS),
    timeoutMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
    mailto: z.string().email().optional(),
    semanticScholarApiKey: z.string().min(1).optional(),
  })
  .strict();

export type Settings = z.infer<typeof SettingsSchema>;

/** Environment variables that override the settings file */
const ENV_OVERRIDES = {
  minIntervalMs: "BIBVERIFY_MIN_INTERVAL_MS",
  timeoutMs: "BIBVERIFY_TIMEOUT_MS",
  mailto: "BIBVERIFY_MAILTO",
  semanticScholarApiKey: "SEMANTIC_SCHOLAR_API_KEY",
} as const satisfies Record<keyof Settings, string>;

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function loadEnvFile(filePath: string, { override = false }: { override?: boolean } = {}) {
  const { error } = dotenv.config({ path: filePath, override, quiet: true });
  if (error && !isMissingFile(error)) {
    throw error;
  }
}

function loadEnvForProjectRoot(cwd: string) {
  loadEnvFile(path.resolve(cwd, ".env"));
  loadEnvFile(path.resolve(cwd, ".env.local"), { override: true });
}

async function readSettingsFile(filePath: string): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (isMissingFile(err)) return {};
    throw err;
  }

  let document: unknown;
  try {
    document = load(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid YAML in ${filePath}: ${reason}`);
  }

  if (document === undefined || document === null) return {};
  const parsed = z.record(z.unknown()).safeParse(document);
  if (!parsed.success) {
    throw new Error(`Invalid settings: ${SETTINGS_FILE} must contain a mapping`);
  }
  return parsed.data;
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, string> {
  const overrides: Record<string, string> = {};
  for (const [setting, variable] of Object.entries(ENV_OVERRIDES)) {
    const value = env[variable];
    if (value !== undefined && value !== "") {
      overrides[setting] = value;
    }
  }
  return overrides;
}

/**
 * Resolve settings from `.env`, `.env.local`, the optional settings file
 * and the environment, in increasing order of precedence
 */
export async function loadSettings(options: { cwd?: string } = {}): Promise<Settings> {
  const cwd = options.cwd ?? process.cwd();
  loadEnvForProjectRoot(cwd);

  const fromFile = await readSettingsFile(path.resolve(cwd, SETTINGS_FILE));
  const result = SettingsSchema.safeParse({ ...fromFile, ...envOverrides(process.env) });

  if (!result.success) {
    const problems = result.error.issues.map((issue) => {
      const where = issue.path.length ? issue.path.join(".") : SETTINGS_FILE;
      return `${where}: ${issue.message}`;
    });
    throw new Error(`Invalid settings: ${problems.join("; ")}`);
  }

  return result.data;
}
