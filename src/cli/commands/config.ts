/**
 * Config Command
 *
 * Manage persistent CLI settings stored in ~/.config/card-binder/config.json.
 * Supports list, set, and unset operations.
 */

import { ConfigurationError } from '../../cache/errors'
import type { Logger } from '../../logger'
import type { CLIArgs } from '../args'
import {
  type ConfigKey,
  getConfigPath,
  getValidConfigKeys,
  isValidConfigKey,
  loadConfig,
  setConfigValue,
  unsetConfigValue
} from '../config'

/**
 * Execute the config command.
 */
export async function cmdConfig(args: CLIArgs, logger: Logger): Promise<void> {
  const configFile = args.configFile
  const [key, value] = args.operands

  switch (args.action) {
    case 'list':
      await listConfig(configFile, logger)
      break
    case 'set':
      await setConfig(key, value, configFile, logger)
      break
    case 'unset':
      await unsetConfig(key, configFile, logger)
      break
    default:
      throw new ConfigurationError(`Unknown config action: ${args.action}. Use list, set or unset.`)
  }
}

async function listConfig(configFile: string | undefined, logger: Logger): Promise<void> {
  const config = await loadConfig(configFile)
  const path = getConfigPath(configFile)

  logger.log(`\nConfig file: ${path}\n`)

  const setKeys = getValidConfigKeys().filter((key) => config?.[key] !== undefined)
  if (setKeys.length === 0) {
    logger.log('No settings configured. Run `card-binder config --help` for available settings.')
  } else {
    for (const key of setKeys) {
      logger.log(`  ${key}: ${String(config?.[key])}`)
    }
  }
}

function validateConfigKey(key: string | undefined, usage: string): ConfigKey {
  if (!key) {
    throw new ConfigurationError(`Missing key. Usage: ${usage}`)
  }
  if (!isValidConfigKey(key)) {
    throw new ConfigurationError(`Invalid key: ${key}. Valid keys: ${getValidConfigKeys().join(', ')}`)
  }
  return key
}

async function setConfig(
  key: string | undefined,
  value: string | undefined,
  configFile: string | undefined,
  logger: Logger
): Promise<void> {
  const validKey = validateConfigKey(key, 'card-binder config set <key> <value>')
  if (value === undefined) {
    throw new ConfigurationError('Missing value. Usage: card-binder config set <key> <value>')
  }
  const parsedValue = await setConfigValue(validKey, value, configFile)
  logger.log(`Set ${validKey}=${String(parsedValue)}`)
}

async function unsetConfig(key: string | undefined, configFile: string | undefined, logger: Logger): Promise<void> {
  const validKey = validateConfigKey(key, 'card-binder config unset <key>')
  await unsetConfigValue(validKey, configFile)
  logger.log(`Unset ${validKey}`)
}
