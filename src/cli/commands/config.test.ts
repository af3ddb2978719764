import { existsSync, rmSync } from 'node:fs'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { createRecordingLogger, createTempDir, type RecordedLogs } from '../../test-support'
import type { Logger } from '../../logger'
import { parseArgs } from '../args'
import { loadConfig } from '../config'
import { cmdConfig } from './config'

describe('cmdConfig', () => {
  let testDir: string
  let configFile: string
  let logger: Logger
  let logs: RecordedLogs

  function run(...argv: string[]): Promise<void> {
    return cmdConfig(parseArgs(['config', ...argv, '--config-file', configFile], false), logger)
  }

  beforeEach(() => {
    testDir = createTempDir('config-command-test')
    configFile = join(testDir, 'config.json')
    const recording = createRecordingLogger()
    logger = recording.logger
    logs = recording.logs
  })

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true, force: true })
    }
  })

  it('lists an empty config', async () => {
    await run()

    expect(logs.log).toEqual([
      `\nConfig file: ${configFile}\n`,
      'No settings configured. Run `card-binder config --help` for available settings.'
    ])
  })

  it('sets, lists and unsets a value', async () => {
    await run('set', 'binderRows', '4')
    await run('list')
    await run('unset', 'binderRows')

    expect(logs.log).toEqual(['Set binderRows=4', `\nConfig file: ${configFile}\n`, '  binderRows: 4', 'Unset binderRows'])
    expect((await loadConfig(configFile))?.binderRows).toBeUndefined()
  })

  it('rejects an unknown key', async () => {
    await expect(run('set', 'colour', 'blue')).rejects.toThrow(
      'Invalid key: colour. Valid keys: apiBaseUrl, binderColumns, binderRows, catalogTtlDays, homeDir, imageSize, requestIntervalMs'
    )
  })

  it('needs a value to set', async () => {
    await expect(run('set', 'homeDir')).rejects.toThrow('Missing value. Usage: card-binder config set <key> <value>')
  })

  it('rejects an unknown action', async () => {
    await expect(run('reset')).rejects.toThrow('Unknown config action: reset. Use list, set or unset.')
  })
})
