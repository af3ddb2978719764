/**
 * CLI Configuration
 *
 * Manages persistent settings stored in ~/.config/card-binder/config.json (XDG standard).
 * Supports custom config file location via --config-file flag or CARD_BINDER_CONFIG env var.
 */

import { existsSync } from 'node:fs'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import { ConfigurationError } from '../cache/errors'
import { isImageSize } from '../catalog/paths'
import { isRecord } from '../types/fields'

/**
 * All persistable CLI settings.
 */
export interface Config {
  /** Where the store, catalog cache and images live */
  homeDir?: string | undefined
  /** Catalog API root */
  apiBaseUrl?: string | undefined
  /** Default binder image size */
  imageSize?: string | undefined
  /** Minimum delay between catalog requests */
  requestIntervalMs?: number | undefined
  /** Age at which cached catalog lists are refreshed */
  catalogTtlDays?: number | undefined
  /** Default binder rows per page */
  binderRows?: number | undefined
  /** Default binder columns per page */
  binderColumns?: number | undefined

  /** When settings were last updated */
  updatedAt?: string | undefined
}

type StringConfigKey = 'homeDir' | 'apiBaseUrl' | 'imageSize'
type NumberConfigKey = 'requestIntervalMs' | 'catalogTtlDays' | 'binderRows' | 'binderColumns'

/** Valid config keys for type-safe access */
export type ConfigKey = StringConfigKey | NumberConfigKey

/** Config keys that accept string values */
const STRING_KEYS: readonly StringConfigKey[] = ['homeDir', 'apiBaseUrl', 'imageSize']
/** Config keys that accept number values */
const NUMBER_KEYS: readonly NumberConfigKey[] = [
  'requestIntervalMs',
  'catalogTtlDays',
  'binderRows',
  'binderColumns'
]

const STRING_KEY_SET: ReadonlySet<string> = new Set(STRING_KEYS)
const NUMBER_KEY_SET: ReadonlySet<string> = new Set(NUMBER_KEYS)

/** Descriptions for config keys (for help output) */
const CONFIG_DESCRIPTIONS: Record<ConfigKey, string> = {
  homeDir: 'Data directory (default: ~/.card-binder)',
  apiBaseUrl: 'Catalog API root (default: https://api.scryfall.com)',
  imageSize: 'Binder image size: full, large, normal, small (default: large)',
  requestIntervalMs: 'Minimum milliseconds between catalog requests (default: 200)',
  catalogTtlDays: 'Days before cached catalog lists are refreshed (default: 7)',
  binderRows: 'Card rows per binder page (default: 3)',
  binderColumns: 'Card columns per binder page (default: 3)'
}

function isStringKey(key: string): key is StringConfigKey {
  return STRING_KEY_SET.has(key)
}

function isNumberKey(key: string): key is NumberConfigKey {
  return NUMBER_KEY_SET.has(key)
}

/**
 * Get the type of a config key.
 * Returns user-friendly type names for CLI help.
 */
export function getConfigType(key: ConfigKey): string {
  return isNumberKey(key) ? 'number' : 'string'
}

/**
 * Get the description of a config key.
 */
export function getConfigDescription(key: ConfigKey): string {
  return CONFIG_DESCRIPTIONS[key]
}

/**
 * Get XDG config directory path for card-binder.
 * Uses ~/.config/card-binder on all platforms.
 */
function getDefaultConfigDir(): string {
  return join(homedir(), '.config', 'card-binder')
}

/**
 * Get the config file path.
 * Priority: configFile arg > CARD_BINDER_CONFIG env var > default XDG path
 */
export function getConfigPath(configFile?: string): string {
  if (configFile) {
    return configFile
  }
  if (process.env.CARD_BINDER_CONFIG) {
    return process.env.CARD_BINDER_CONFIG
  }
  return join(getDefaultConfigDir(), 'config.json')
}

/**
 * Keep the known settings of a parsed config file. Values of the wrong type
 * are dropped.
 */
export function parseConfig(raw: unknown): Config {
  const config: Config = {}
  if (!isRecord(raw)) return config
  for (const key of STRING_KEYS) {
    const value = raw[key]
    if (typeof value === 'string') config[key] = value
  }
  for (const key of NUMBER_KEYS) {
    const value = raw[key]
    if (typeof value === 'number' && Number.isFinite(value)) config[key] = value
  }
  if (typeof raw['updatedAt'] === 'string') {
    config.updatedAt = raw['updatedAt']
  }
  return config
}

/**
 * Load config from the config file.
 * Returns null if file doesn't exist or can't be parsed.
 */
export async function loadConfig(configFile?: string): Promise<Config | null> {
  const path = getConfigPath(configFile)
  if (!existsSync(path)) {
    return null
  }
  try {
    const content = await readFile(path, 'utf-8')
    return parseConfig(JSON.parse(content))
  } catch {
    return null
  }
}

/**
 * Save config to the config file.
 * Creates parent directories if needed.
 */
export async function saveConfig(config: Config, configFile?: string): Promise<void> {
  const path = getConfigPath(configFile)
  await mkdir(dirname(path), { recursive: true })
  const withTimestamp: Config = {
    ...config,
    updatedAt: new Date().toISOString()
  }
  await writeFile(path, JSON.stringify(withTimestamp, null, 2))
}

function parseNumberValue(key: NumberConfigKey, value: string): number {
  const parsed = Number(value)
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new ConfigurationError(`Invalid value for ${key}: expected a non-negative number, got '${value}'`)
  }
  return parsed
}

function parseStringValue(key: StringConfigKey, value: string): string {
  if (key === 'imageSize' && !isImageSize(value)) {
    throw new ConfigurationError(`Invalid value for imageSize: expected full, large, normal or small, got '${value}'`)
  }
  return value
}

/**
 * Parse a string value into the appropriate type for a config key.
 *
 * @throws ConfigurationError when the value doesn't fit the key
 */
export function parseConfigValue(key: ConfigKey, value: string): string | number {
  return isNumberKey(key) ? parseNumberValue(key, value) : parseStringValue(key, value)
}

/**
 * Check if a string is a valid config key.
 */
export function isValidConfigKey(key: string): key is ConfigKey {
  return isStringKey(key) || isNumberKey(key)
}

/**
 * Get all valid config keys (sorted alphabetically).
 */
export function getValidConfigKeys(): ConfigKey[] {
  return [...STRING_KEYS, ...NUMBER_KEYS].sort()
}

/**
 * Set a single config value and save.
 */
export async function setConfigValue(key: ConfigKey, value: string, configFile?: string): Promise<string | number> {
  const config = (await loadConfig(configFile)) ?? {}
  let parsed: string | number
  if (isNumberKey(key)) {
    parsed = parseNumberValue(key, value)
    config[key] = parsed
  } else {
    parsed = parseStringValue(key, value)
    config[key] = parsed
  }
  await saveConfig(config, configFile)
  return parsed
}

/**
 * Unset (remove) a config value and save.
 */
export async function unsetConfigValue(key: ConfigKey, configFile?: string): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  delete config[key]
  await saveConfig(config, configFile)
}

/**
 * Data home directory.
 * Priority: --home flag > CARD_BINDER_HOME env var > config homeDir > ~/.card-binder
 */
export function resolveHomeDir(flag: string | undefined, config: Config): string {
  return flag || process.env.CARD_BINDER_HOME || config.homeDir || join(homedir(), '.card-binder')
}
