import { Command, CommanderError } from 'commander'
import { z } from 'zod'
import { DEFAULT_LIMITS_KEY, DEFAULT_STATEFULSET_LABEL } from '@receive-limits/shared'
import { ConfigurationError } from '../errors/controller.errors'
import { parseDuration } from './duration'

/**
 * Command line flag for each configuration field, used in error messages
 */
const FLAG_NAMES: Record<string, string> = {
  configMapName: '--configmap-name',
  limitsKey: '--configmap-limits-path',
  generatedConfigMapName: '--configmap-generated-name',
  statefulSetLabel: '--statefulset-label',
  activeSeriesMax: '--active-series-max',
  intervalMs: '--interval',
  namespace: '--namespace',
  healthPort: '--health-port',
}

const blankAsAbsent = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value

const numeric = (value: unknown): unknown => {
  const present = blankAsAbsent(value)
  return typeof present === 'string' ? Number(present) : present
}

const requiredName = () =>
  z.preprocess(blankAsAbsent, z.string({ required_error: 'missing required flag' }))

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  configMapName: requiredName(),
  limitsKey: z.preprocess(blankAsAbsent, z.string().default(DEFAULT_LIMITS_KEY)),
  generatedConfigMapName: requiredName(),
  statefulSetLabel: z.preprocess(blankAsAbsent, z.string().default(DEFAULT_STATEFULSET_LABEL)),
  activeSeriesMax: z.preprocess(
    numeric,
    z
      .number({
        required_error: 'missing required flag',
        invalid_type_error: 'must be a number',
      })
      .int('must be an integer')
      .positive('must be greater than zero')
      .max(Number.MAX_SAFE_INTEGER, 'is too large')
  ),
  intervalMs: z.preprocess(
    blankAsAbsent,
    z
      .string()
      .default('0')
      .transform((value, ctx) => {
        const ms = parseDuration(value)
        if (ms === undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `invalid duration "${value}" (expected e.g. 30s, 1m, 1h30m)`,
          })
          return z.NEVER
        }
        return ms
      })
  ),
  namespace: z.preprocess(blankAsAbsent, z.string().optional()),
  healthPort: z.preprocess(
    numeric,
    z.number({ invalid_type_error: 'must be a number' }).int().min(1).max(65535).optional()
  ),
})

export type ControllerConfig = z.infer<typeof configSchema>

/**
 * Raw option values as collected from flags and environment
 */
export type RawControllerConfig = { [K in keyof ControllerConfig]?: string }

interface CliOptions {
  configmapName?: string
  configmapLimitsPath?: string
  configmapGeneratedName?: string
  statefulsetLabel?: string
  activeSeriesMax?: string
  interval?: string
  namespace?: string
  healthPort?: string
}

/**
 * Command line definition
 */
export const buildProgram = (): Command =>
  new Command()
    .name('receive-limits-controller')
    .description(
      'Publishes a generated receive limits ConfigMap whose default head series limit tracks the number of ready receivers'
    )
    .option('--configmap-name <name>', 'ConfigMap containing the source limits configuration')
    .option('--configmap-limits-path <key>', `key of the limits configuration within the ConfigMap (default: ${DEFAULT_LIMITS_KEY})`)
    .option('--configmap-generated-name <name>', 'name given to the generated limits ConfigMap')
    .option('--statefulset-label <selector>', `label selector of the receive StatefulSets (default: ${DEFAULT_STATEFULSET_LABEL})`)
    .option('--active-series-max <count>', 'head series a single receive replica can hold')
    .option('--interval <duration>', 'reconcile periodically (e.g. 30s, 1m); 0 runs once and exits')
    .option('--namespace <namespace>', 'namespace of the ConfigMaps and StatefulSets')
    .option('--health-port <port>', 'serve /healthz, /readyz and /status on this port')
    .exitOverride()
    .configureOutput({ writeErr: () => undefined })

/**
 * Collect raw values: flags first, then environment variables
 */
export const collectRawConfig = (argv: readonly string[], env: NodeJS.ProcessEnv): RawControllerConfig => {
  const program = buildProgram()
  try {
    program.parse([...argv], { from: 'user' })
  } catch (error) {
    if (error instanceof CommanderError && error.exitCode !== 0) {
      throw new ConfigurationError(error.message, [error.message])
    }
    throw error
  }
  const options = program.opts<CliOptions>()

  return {
    configMapName: options.configmapName ?? env['CONFIGMAP_NAME'],
    limitsKey: options.configmapLimitsPath ?? env['CONFIGMAP_LIMITS_PATH'],
    generatedConfigMapName: options.configmapGeneratedName ?? env['CONFIGMAP_GENERATED_NAME'],
    statefulSetLabel: options.statefulsetLabel ?? env['STATEFULSET_LABEL'],
    activeSeriesMax: options.activeSeriesMax ?? env['ACTIVE_SERIES_MAX'],
    intervalMs: options.interval ?? env['INTERVAL'],
    namespace: options.namespace,
    healthPort: options.healthPort ?? env['HEALTH_PORT'],
  }
}

/**
 * Validate raw values, reporting every problem at once
 */
export const validateConfig = (raw: RawControllerConfig): ControllerConfig => {
  const result = configSchema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.errors.map((issue) => {
      const field = String(issue.path[0] ?? '')
      return `${FLAG_NAMES[field] ?? field}: ${issue.message}`
    })
    throw new ConfigurationError(`Configuration validation failed: ${issues.join('; ')}`, issues)
  }
  return result.data
}

/**
 * Load and validate configuration from the command line and environment
 */
export const loadConfig = (
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): ControllerConfig => validateConfig(collectRawConfig(argv, env))
