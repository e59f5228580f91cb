import * as path from 'node:path'
import { existsSync, readFileSync } from 'node:fs'
import { parse } from 'yaml'
import { z } from 'zod'
import type { BackendDescriptor, FederationLog } from './federation/types.js'

const CONFIG_DIRNAME = '.calfed'
const CONFIG_FILENAME = 'config.yaml'

export function findConfigDir(): string {
  // Walk up from cwd looking for an existing .calfed/ directory
  let dir = process.cwd()
  while (dir !== path.dirname(dir)) {
    const candidate = path.join(dir, CONFIG_DIRNAME)
    if (existsSync(candidate)) return candidate
    dir = path.dirname(dir)
  }
  // Fallback: cwd
  return path.resolve(CONFIG_DIRNAME)
}

const descriptorSchema = z.object({
  name: z.string().min(1),
  args: z.array(z.unknown()).default([]),
})

const configSchema = z.object({
  federation: z
    .object({
      backends: z.array(descriptorSchema).default([{ name: 'database', args: [] }]),
      cache: z
        .object({
          ttlSeconds: z.number().int().nonnegative().default(60),
        })
        .default({}),
    })
    .default({}),
  log: z
    .object({
      level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    })
    .default({}),
  server: z
    .object({
      host: z.string().min(1).default('127.0.0.1'),
      port: z.number().int().min(0).max(65535).default(4330),
    })
    .default({}),
})

export type FederationConfig = z.output<typeof configSchema>

export function defaultConfig(): FederationConfig {
  return configSchema.parse({})
}

/**
 * Descriptors from the configuration, in file order.
 */
export function backendDescriptors(config: FederationConfig): BackendDescriptor[] {
  return config.federation.backends.map(({ name, args }) => ({ name, args }))
}

/**
 * Load `config.yaml` from the configuration directory. A missing file yields
 * the defaults; a file that fails to parse or validate is reported and
 * replaced by the defaults.
 */
export function loadConfig(configDir?: string, log?: FederationLog): FederationConfig {
  const dir = configDir ?? process.env.CALFED_DIR ?? findConfigDir()
  const configPath = path.join(dir, CONFIG_FILENAME)
  if (!existsSync(configPath)) {
    return defaultConfig()
  }

  let raw: unknown
  try {
    raw = parse(readFileSync(configPath, 'utf-8'))
  } catch (err) {
    log?.record(
      'config',
      `Could not parse ${configPath}: ${err instanceof Error ? err.message : String(err)}. Using defaults.`,
      'warn',
    )
    return defaultConfig()
  }

  // An empty file parses to null
  const result = configSchema.safeParse(raw ?? {})
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    log?.record('config', `Invalid ${configPath}: ${issues}. Using defaults.`, 'warn')
    return defaultConfig()
  }
  return result.data
}
