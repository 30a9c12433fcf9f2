import type { ServiceConfig } from "../config/service-config";
import { ConversionDispatcher } from "../convert";
import { LifecycleManager, Sweeper } from "../lifecycle";
import { ChildProcessRunner, type ProcessRunner } from "../process";
import { type FileStore, LocalFileStore } from "../store";

export interface Service {
  config: ServiceConfig;
  runner: ProcessRunner;
  store: FileStore;
  lifecycle: LifecycleManager;
  dispatcher: ConversionDispatcher;
  sweeper: Sweeper;
}

export interface ServiceOverrides {
  runner?: ProcessRunner;
  store?: FileStore;
  now?: () => number;
}

/**
 * Wire every component from one resolved config. Tests swap the runner and
 * clock; nothing else differs from production.
 */
export function createService(config: ServiceConfig, overrides: ServiceOverrides = {}): Service {
  const runner = overrides.runner ?? new ChildProcessRunner();
  const store = overrides.store ?? new LocalFileStore(config.paths);
  const lifecycle = new LifecycleManager(store, {
    retentionMs: config.retentionMs,
    now: overrides.now,
  });
  const dispatcher = new ConversionDispatcher({
    runner,
    tools: config.tools,
    tempRoot: config.paths.temp,
    timeoutMs: config.toolTimeoutMs,
    ocrLang: config.ocrLang,
    maxConcurrent: config.maxConcurrentConversions,
  });
  const sweeper = new Sweeper(lifecycle, config.sweepIntervalMs);
  return { config, runner, store, lifecycle, dispatcher, sweeper };
}
