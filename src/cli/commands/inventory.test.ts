import { existsSync, rmSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import type { Logger } from '../../logger'
import { catalogCard, createRecordingLogger, createTempDir, fakeCatalog, type RecordedLogs } from '../../test-support'
import { parseArgs } from '../args'
import { cmdInventory } from './inventory'

const mockFetch = vi.hoisted(() => vi.fn())
vi.mock('../../http', () => ({ httpFetch: mockFetch }))

describe('cmdInventory', () => {
  let testDir: string
  let logger: Logger
  let logs: RecordedLogs

  function run(...argv: string[]): Promise<void> {
    return cmdInventory(
      parseArgs(
        ['inventory', ...argv, '-m', join(testDir, 'home'), '--config-file', join(testDir, 'config.json')],
        false
      ),
      logger
    )
  }

  beforeEach(() => {
    testDir = createTempDir('inventory-command-test')
    mockFetch.mockReset()
    mockFetch.mockImplementation(
      fakeCatalog([catalogCard({ id: 'card-elves', name: 'Llanowar Elves', set: 'm19', number: '314' })])
    )
    vi.stubEnv('CARD_BINDER_HOME', '')
    const recording = createRecordingLogger()
    logger = recording.logger
    logs = recording.logs
  })

  afterEach(() => {
    vi.unstubAllEnvs()
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true, force: true })
    }
  })

  it('creates an inventory, adds a list and shows it from a fresh store', async () => {
    const list = join(testDir, 'list.txt')
    writeFileSync(list, '3x Llanowar Elves (M19:314)\n')

    await run('create', join(testDir, 'cards'), '--name', 'Main')
    await run('add', 'main', list)
    logs.log.length = 0
    await run('show', 'main', '--cards', '--board', '--no-meta')

    expect(logs.log).toEqual(['3x Llanowar Elves (M19:314)'])
    expect(existsSync(join(testDir, 'home', 'store.json'))).toBe(true)
    expect(existsSync(join(testDir, 'home', 'catalog-cache.json'))).toBe(true)
  })

  it('reports an unknown inventory', async () => {
    await expect(run('show', 'ghost')).rejects.toThrow('`ghost` is not an inventory that is currently defined')
  })
})
