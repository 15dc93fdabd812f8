export {
  ConfigSchema,
  ProjectConfigSchema,
  PersistConfigSchema,
  type Config,
  type ConfigInput,
  type ProjectConfig,
  type ProjectConfigInput,
  type PersistConfig,
} from "./schema.js";
export { CONFIG_FILE, createConfig, loadConfig, selectProjects } from "./loader.js";
