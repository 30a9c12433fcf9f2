import {
  type ConfigOverrides,
  loadServiceConfig,
  parsePositiveInt,
  type ServiceConfig,
} from "../lib/config/service-config";
import { setDebug } from "../lib/utils/log";

/** Raw option values as commander hands them over, globals included. */
export type CliOptions = {
  config?: string;
  dataDir?: string;
  debug?: boolean;
  host?: string;
  port?: string;
  retentionHours?: string;
  timeout?: string;
  json?: boolean;
};

export function toOverrides(options: CliOptions): ConfigOverrides {
  return {
    host: options.host,
    port: parsePositiveInt(options.port),
    debug: options.debug ? true : undefined,
    dataDir: options.dataDir,
    retentionHours: parsePositiveInt(options.retentionHours),
    toolTimeoutMs: parsePositiveInt(options.timeout),
  };
}

/** Resolve the service config for a command and apply its debug setting. */
export function resolveConfig(options: CliOptions): ServiceConfig {
  const config = loadServiceConfig(toOverrides(options), options.config);
  setDebug(config.debug);
  return config;
}
