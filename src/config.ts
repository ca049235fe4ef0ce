import { cosmiconfigSync } from 'cosmiconfig'
import { isCheckStyle } from './analysis/allocations'
import type { AllocatorSpec } from './analysis/allocations'

export interface CsafeConfig {
  // Returned when an allocation fails
  errorCode: string
  // Returned by rewritten functions on success
  successCode: string
  // Out parameter added to pointer-returning functions
  outArgName: string
  // Status variable declared in bodies that call rewritten functions
  statusVar: string
  // Allocators on top of the built-in table
  allocators: AllocatorSpec[]
}

export const DEFAULT_CONFIG: CsafeConfig = {
  errorCode: 'ENOMEM',
  successCode: '0',
  outArgName: 'out',
  statusVar: 'rc',
  allocators: [],
}

export interface LoadedConfig {
  config: CsafeConfig
  // File the settings came from, null when only defaults apply
  filepath: string | null
}

const explorer = cosmiconfigSync('csafe', {
  searchStrategy: 'project',
  searchPlaces: [
    'package.json',
    '.csaferc',
    '.csaferc.json',
    '.csaferc.yaml',
    '.csaferc.yml',
    'csafe.config.json',
  ],
})

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/

function nonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim() !== ''
}

function parseAllocators(value: unknown): AllocatorSpec[] {
  if (!Array.isArray(value)) return []
  const specs: AllocatorSpec[] = []
  for (const entry of value) {
    if (!isRecord(entry)) continue
    const { name, checkStyle } = entry
    if (typeof name === 'string' && IDENTIFIER.test(name) && isCheckStyle(checkStyle)) {
      specs.push({ name, checkStyle })
    }
  }
  return specs
}

/**
 * Merge a user-supplied object over the defaults. Fields of the wrong
 * type are ignored; identifiers that must name a C variable are checked.
 */
export function mergeConfig(user: unknown): CsafeConfig {
  const config: CsafeConfig = { ...DEFAULT_CONFIG, allocators: [] }
  if (!isRecord(user)) return config

  if (nonEmptyString(user.errorCode)) config.errorCode = user.errorCode.trim()
  if (nonEmptyString(user.successCode)) config.successCode = user.successCode.trim()
  if (typeof user.outArgName === 'string' && IDENTIFIER.test(user.outArgName)) {
    config.outArgName = user.outArgName
  }
  if (typeof user.statusVar === 'string' && IDENTIFIER.test(user.statusVar)) {
    config.statusVar = user.statusVar
  }
  config.allocators = parseAllocators(user.allocators)
  return config
}

export interface LoadConfigOptions {
  searchFrom?: string
  configPath?: string
}

/**
 * Load settings from `configPath` when given, otherwise search upward from
 * `searchFrom` (default: the working directory).
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const result = options.configPath
    ? explorer.load(options.configPath)
    : explorer.search(options.searchFrom)
  if (result === null || result.isEmpty === true) {
    return { config: mergeConfig(undefined), filepath: result?.filepath ?? null }
  }
  const raw: unknown = result.config
  return { config: mergeConfig(raw), filepath: result.filepath }
}
