import { readFile, access } from "fs/promises";
import { join, resolve } from "path";
import YAML from "yaml";
import { z } from "zod";

// ============================================================================
// Schema
// ============================================================================

export const CONFIG_FILE_NAME = ".deskcalc.yml";

const HexColor = z
  .string()
  .regex(/^#[0-9a-fA-F]{6}$/, "Expected a colour in #rrggbb form");

export const ThemeSchema = z
  .object({
    background: HexColor.default("#2c3e50"),
    display: HexColor.default("#ecf0f1"),
    button: HexColor.default("#34495e"),
    focus: HexColor.default("#1a252f"),
    operator: HexColor.default("#e74c3c"),
    equals: HexColor.default("#27ae60"),
  })
  .strict();

export const ConfigSchema = z
  .object({
    precision: z.number().int().min(0).max(15).default(10),
    errorPolicy: z.enum(["clear", "keep"]).default("clear"),
    historySize: z.number().int().min(0).max(1000).default(50),
    banner: z.boolean().default(true),
    theme: ThemeSchema.default({}),
  })
  .strict();

export type ThemeConfig = z.infer<typeof ThemeSchema>;
export type DeskcalcConfig = z.infer<typeof ConfigSchema>;

// ============================================================================
// Errors
// ============================================================================

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

// ============================================================================
// Loading
// ============================================================================

export function getDefaultConfig(): DeskcalcConfig {
  return ConfigSchema.parse({});
}

/**
 * Validate a parsed YAML document against the config schema
 */
export function parseConfig(raw: unknown, configPath: string): DeskcalcConfig {
  // An empty YAML file parses to null
  const result = ConfigSchema.safeParse(raw ?? {});

  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid configuration in ${configPath}`, configPath, issues);
  }

  return result.data;
}

/**
 * Load configuration.
 *
 * An explicit path must exist. Without one, .deskcalc.yml in the working
 * directory is used when present, and the defaults otherwise.
 */
export async function loadConfig(
  explicitPath?: string,
  cwd: string = process.cwd()
): Promise<DeskcalcConfig> {
  const configPath = explicitPath ? resolve(cwd, explicitPath) : join(cwd, CONFIG_FILE_NAME);

  if (!explicitPath && !(await fileExists(configPath))) {
    return getDefaultConfig();
  }

  let content: string;
  try {
    content = await readFile(configPath, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Cannot read configuration file ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      configPath
    );
  }

  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (error) {
    throw new ConfigError(
      `Malformed YAML in ${configPath}`,
      configPath,
      [error instanceof Error ? error.message : String(error)]
    );
  }

  return parseConfig(raw, configPath);
}

export function stringifyConfig(config: DeskcalcConfig): string {
  return YAML.stringify(config);
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}
