import { describe, expect, it } from 'vitest'
import { parseArgs } from './args'

describe('CLI Args', () => {
  describe('parseArgs', () => {
    it('parses inventory create with its directory', () => {
      const args = parseArgs(['inventory', 'create', './cards', '-n', 'My Cards'], false)
      expect(args.command).toBe('inventory')
      expect(args.action).toBe('create')
      expect(args.operands).toEqual(['./cards'])
      expect(args.name).toBe('My Cards')
      expect(args.id).toBeUndefined()
    })

    it('parses inventory add with several list files', () => {
      const args = parseArgs(['inventory', 'add', 'main', 'a.txt', 'b.txt'], false)
      expect(args.action).toBe('add')
      expect(args.operands).toEqual(['main', 'a.txt', 'b.txt'])
    })

    it('parses show flags', () => {
      const args = parseArgs(['inventory', 'show', 'main', '-c', '-b', '--no-meta'], false)
      expect(args.cards).toBe(true)
      expect(args.board).toBe(true)
      expect(args.noMeta).toBe(true)
    })

    it('keeps meta by default', () => {
      const args = parseArgs(['inventory', 'show', 'main'], false)
      expect(args.cards).toBe(false)
      expect(args.noMeta).toBe(false)
    })

    it('parses edit options', () => {
      const args = parseArgs(['binder', 'edit', 'trades', '--id', 'sales', '--path', '/tmp/b'], false)
      expect(args.command).toBe('binder')
      expect(args.id).toBe('sales')
      expect(args.path).toBe('/tmp/b')
      expect(args.name).toBeUndefined()
    })

    it('parses delete with --delete-directory', () => {
      expect(parseArgs(['inventory', 'delete', 'main', '-d'], false).deleteDirectory).toBe(true)
      expect(parseArgs(['binder', 'delete', 'trades'], false).deleteDirectory).toBe(false)
    })

    it('parses binder create layout options as numbers', () => {
      const args = parseArgs(
        ['binder', 'create', './site', '--list', 'cards.txt', '--rows', '2', '--columns', '4', '--image-size', 'small'],
        false
      )
      expect(args.listFile).toBe('cards.txt')
      expect(args.inventory).toBeUndefined()
      expect(args.rows).toBe(2)
      expect(args.columns).toBe(4)
      expect(args.imageSize).toBe('small')
    })

    it('leaves layout options undefined when not provided', () => {
      const args = parseArgs(['binder', 'create', './site', '--inventory', 'main'], false)
      expect(args.inventory).toBe('main')
      expect(args.rows).toBeUndefined()
      expect(args.columns).toBeUndefined()
      expect(args.imageSize).toBeUndefined()
    })

    it('parses card search names and flags', () => {
      const args = parseArgs(['card', 'search', 'Llanowar Elves', 'Shock', '--fuzzy', '--set', 'm19'], false)
      expect(args.command).toBe('card')
      expect(args.operands).toEqual(['Llanowar Elves', 'Shock'])
      expect(args.fuzzy).toBe(true)
      expect(args.set).toBe('m19')
    })

    it('uses card image defaults', () => {
      const args = parseArgs(['card', 'image', 'm19', '314'], false)
      expect(args.operands).toEqual(['m19', '314'])
      expect(args.imageSize).toBe('full')
      expect(args.lang).toBe('en')
      expect(args.back).toBe(false)
      expect(args.output).toBeUndefined()
    })

    it('parses card image options', () => {
      const args = parseArgs(['card', 'image', 'khm', '1', '--size', 'small', '--back', '-o', 'out.jpg'], false)
      expect(args.imageSize).toBe('small')
      expect(args.back).toBe(true)
      expect(args.output).toBe('out.jpg')
    })

    it('parses cache commands', () => {
      const list = parseArgs(['cache', 'list'], false)
      expect(list.command).toBe('cache')
      expect(list.action).toBe('list')
      expect(list.operands).toEqual([])

      const clear = parseArgs(['cache', 'clear', '/sets/m19', '--images'], false)
      expect(clear.action).toBe('clear')
      expect(clear.operands).toEqual(['/sets/m19'])
      expect(clear.images).toBe(true)
    })

    it('parses config with action, key and value', () => {
      const args = parseArgs(['config', 'set', 'binderRows', '4'], false)
      expect(args.command).toBe('config')
      expect(args.action).toBe('set')
      expect(args.operands).toEqual(['binderRows', '4'])
    })

    it('defaults config action to list', () => {
      const args = parseArgs(['config'], false)
      expect(args.action).toBe('list')
      expect(args.operands).toEqual([])
    })

    it('parses global options after the action', () => {
      const args = parseArgs(['inventory', 'list', '-q', '-m', '/data/cards', '--config-file', 'c.json'], false)
      expect(args.quiet).toBe(true)
      expect(args.verbose).toBe(false)
      expect(args.homeDir).toBe('/data/cards')
      expect(args.configFile).toBe('c.json')
    })

    it('parses global options before the group', () => {
      const args = parseArgs(['-v', 'binder', 'list'], false)
      expect(args.verbose).toBe(true)
      expect(args.action).toBe('list')
    })

    it('returns help for a group without an action', () => {
      expect(parseArgs(['inventory'], false).command).toBe('help')
    })

    it('returns help for a missing required argument', () => {
      expect(parseArgs(['inventory', 'create'], false).command).toBe('help')
    })
  })
})
