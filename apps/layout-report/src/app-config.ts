/**
 * Runtime settings for the layout report CLI. Command-line flags override
 * these per invocation.
 */
export interface AppConfig {
  surfaceWidth: number;
  surfaceHeight: number;
  minimumGap: number;
  defaultLabelHeight: number;
  logLevel: string;
}

type Env = Readonly<Record<string, string | undefined>>;

const DEFAULT_SURFACE_WIDTH = 800;
const DEFAULT_SURFACE_HEIGHT = 600;
const DEFAULT_MINIMUM_GAP = 10;
const DEFAULT_LABEL_HEIGHT = 20;

const readInteger = (env: Env, name: string, fallback: number): number => {
  const raw = env[name]?.trim();
  if (raw === undefined || raw === "") {
    return fallback;
  }

  if (!/^\d+$/.test(raw)) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}".`);
  }
  return Number(raw);
};

export const loadAppConfig = (env: Env = process.env): AppConfig => ({
  surfaceWidth: readInteger(env, "LAYOUT_SURFACE_WIDTH", DEFAULT_SURFACE_WIDTH),
  surfaceHeight: readInteger(env, "LAYOUT_SURFACE_HEIGHT", DEFAULT_SURFACE_HEIGHT),
  minimumGap: readInteger(env, "LAYOUT_MIN_GAP", DEFAULT_MINIMUM_GAP),
  defaultLabelHeight: readInteger(env, "LAYOUT_LABEL_HEIGHT", DEFAULT_LABEL_HEIGHT),
  logLevel: env.LOG_LEVEL || "info",
});
