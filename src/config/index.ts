export { CONFIG_FILE, resolveConfigPath, parseConfig, loadConfig } from "./config";
