import path from "node:path"
import {
  type ConfigSource,
  DotenvSource,
  EnvSource,
  JsonSource,
  loadConfig,
  ObjectSource,
} from "@digilock/config"
import { type CodecConfig, type CodecEnv, codecEnvSchema, ENV_PREFIX } from "./schema"

export const CONFIG_FILE = "digilock.json"

export function mapEnvToConfig(env: CodecEnv, cwd: string): CodecConfig {
  return {
    charset: {
      offset: env.CHARSET_OFFSET,
      ...(env.CHARSET_FILE !== undefined && { file: path.resolve(cwd, env.CHARSET_FILE) }),
      ...(env.CHARSET_DIR !== undefined && { dir: path.resolve(cwd, env.CHARSET_DIR) }),
    },
    ...(env.DEFAULT_LOCK !== undefined && { defaultLock: env.DEFAULT_LOCK }),
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
  }
}

/**
 * Reads codec settings, later sources winning:
 * `digilock.json`, then `.env`, then the process environment, then `overrides`.
 *
 * `digilock.json` uses bare keys (`DEFAULT_LOCK`); `.env` and the environment
 * use the `DIGILOCK_` prefix. Relative charset paths resolve against `cwd`.
 *
 * @throws ConfigValidationError
 */
export async function loadCodecConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
  overrides?: Partial<CodecEnv>,
): Promise<CodecConfig> {
  const sources: ConfigSource[] = [
    new JsonSource({ file: CONFIG_FILE, required: false, cwd }),
    new DotenvSource({ file: ".env", required: false, cwd, prefix: ENV_PREFIX }),
    new EnvSource({ env, prefix: ENV_PREFIX }),
  ]

  if (overrides) sources.push(new ObjectSource(overrides))

  const result = await loadConfig({ schema: codecEnvSchema, sources })

  return mapEnvToConfig(result.value, cwd)
}
