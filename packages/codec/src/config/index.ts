export {
  type CodecFromConfigDeps,
  createCodecFromConfig,
  loadConfiguredCharset,
} from "./create-codec-from-config"
export { CONFIG_FILE, loadCodecConfig, mapEnvToConfig } from "./load-codec-config"
export { type CodecConfig, type CodecEnv, codecEnvSchema, ENV_PREFIX } from "./schema"
