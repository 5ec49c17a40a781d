export { config, configSchema, loadConfig, resetConfig, type Config } from "@nestfinder/config";
