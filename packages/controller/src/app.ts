import { CommanderError } from 'commander';
import type { KubeConfig } from '@kubernetes/client-node';
import { startHealthServer, type HealthServer } from './api/server';
import { loadConfig, type ControllerConfig } from './config';
import { readServiceAccountNamespace, resolveNamespace } from './config/namespace';
import { ConfigurationError, ConnectivityError } from './errors/controller.errors';
import { LimitsController } from './services/limits-controller.service';
import { SchedulerService, type SchedulerClock } from './services/scheduler.service';
import { createKubeObjectStore, loadKubeConfig } from './store/kube.store';
import type { ObjectStore } from './store/object-store';
import { createLogger, loggingOptionsFromEnv, type Logger } from './utils/logger';

export interface RunOptions {
  namespace: string;
  signal?: AbortSignal;
  clock?: SchedulerClock;
}

/**
 * Run reconciliation against `store` until the schedule ends.
 * Resolves with the number of cycles run; rejects with the first cycle error.
 */
export const runController = async (
  config: ControllerConfig,
  store: ObjectStore,
  logger: Logger,
  options: RunOptions
): Promise<number> => {
  const controller = new LimitsController(
    store,
    {
      namespace: options.namespace,
      configMapName: config.configMapName,
      limitsKey: config.limitsKey,
      generatedConfigMapName: config.generatedConfigMapName,
      statefulSetLabel: config.statefulSetLabel,
      activeSeriesMax: config.activeSeriesMax,
    },
    logger
  );

  let healthServer: HealthServer | null = null;
  if (config.healthPort !== undefined) {
    healthServer = await startHealthServer(controller, config.healthPort, logger.child({ service: 'health' }));
  }

  try {
    const scheduler = new SchedulerService(logger.child({ service: 'scheduler' }));
    return await scheduler.run(
      async () => {
        await controller.runCycle();
      },
      { intervalMs: config.intervalMs, signal: options.signal, clock: options.clock }
    );
  } finally {
    await healthServer?.close();
  }
};

const currentContextNamespace = (kubeConfig: KubeConfig): string | undefined =>
  kubeConfig.getContextObject(kubeConfig.getCurrentContext())?.namespace;

/**
 * Process entry point. Resolves with the exit code.
 */
export const main = async (
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): Promise<number> => {
  const logger = createLogger(loggingOptionsFromEnv(env));

  let config: ControllerConfig;
  try {
    config = loadConfig(argv, env);
  } catch (error) {
    if (error instanceof CommanderError && error.exitCode === 0) {
      return 0;
    }
    if (error instanceof ConfigurationError) {
      logger.fatal({ issues: error.issues }, error.message);
      return 1;
    }
    throw error;
  }

  const shutdown = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, 'Received shutdown signal, stopping after the current cycle');
    shutdown.abort();
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);

  try {
    let kubeConfig: KubeConfig;
    try {
      kubeConfig = loadKubeConfig(env);
    } catch (error) {
      throw new ConnectivityError(
        `Failed to initialize controller: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        {},
        { cause: error }
      );
    }

    const { namespace, source } = resolveNamespace({
      flag: config.namespace,
      env,
      readServiceAccountNamespace: () => readServiceAccountNamespace(),
      kubeContextNamespace: () => currentContextNamespace(kubeConfig),
    });
    logger.info(
      {
        namespace,
        namespaceSource: source,
        configMap: config.configMapName,
        generatedConfigMap: config.generatedConfigMapName,
        limitsKey: config.limitsKey,
        statefulSetLabel: config.statefulSetLabel,
        activeSeriesMax: config.activeSeriesMax,
        intervalMs: config.intervalMs,
      },
      'Starting receive limits controller'
    );

    const store = createKubeObjectStore(kubeConfig, logger.child({ service: 'kube' }));
    await runController(config, store, logger, { namespace, signal: shutdown.signal });
    return 0;
  } catch (error) {
    logger.fatal({ err: error }, 'Reconciliation failed');
    return 1;
  } finally {
    process.off('SIGTERM', onSignal);
    process.off('SIGINT', onSignal);
  }
};

/**
 * Where the exit code is recorded. The process is the default.
 */
export interface ExitTarget {
  exitCode?: number | string;
}

/**
 * Run `main` and record its exit code on `target`. The process ends once
 * pending log output has drained.
 */
export const start = async (
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
  target: ExitTarget = process
): Promise<void> => {
  target.exitCode = await main(argv, env);
};
