/**
 * CLI Argument Parsing
 *
 * Uses commander for a two-level CLI: a command group (inventory, binder,
 * card, cache) and an action within it, plus the flat `config` command.
 */

import { Command } from 'commander'
import { VERSION } from '../version'
import { getConfigDescription, getConfigType, getValidConfigKeys } from './config'

export type CommandGroup = 'inventory' | 'binder' | 'card' | 'cache' | 'config' | 'help'

export interface CLIArgs {
  command: CommandGroup
  /** Action within the group, e.g. "create" */
  action: string
  /** Positional arguments of the action, in order */
  operands: string[]
  quiet: boolean
  verbose: boolean
  homeDir: string | undefined
  configFile: string | undefined
  name: string | undefined
  id: string | undefined
  path: string | undefined
  cards: boolean
  board: boolean
  noMeta: boolean
  deleteDirectory: boolean
  inventory: string | undefined
  listFile: string | undefined
  rows: number | undefined
  columns: number | undefined
  imageSize: string | undefined
  fuzzy: boolean
  set: string | undefined
  lang: string | undefined
  back: boolean
  output: string | undefined
  images: boolean
}

const DESCRIPTION = `Organize a trading card collection into inventories and printable binder pages.

Card lists use the board format, one entry per line:
  4x Llanowar Elves (M19:314) *F*

Examples:
  $ card-binder inventory create ./my-cards --name "My Cards"
  $ card-binder inventory add my_cards purchases.txt
  $ card-binder binder create ./binder --inventory my_cards
  $ card-binder card search "Llanowar Elves"`

const GROUPS: readonly CommandGroup[] = ['inventory', 'binder', 'card', 'cache', 'config']

function isCommandGroup(value: string): value is CommandGroup {
  return GROUPS.some((group) => group === value)
}

function addInventoryCommands(program: Command): void {
  const inventory = program.command('inventory').description('Manage inventories of owned cards')

  inventory
    .command('create')
    .description('Create an empty inventory in a directory')
    .argument('<dir>', 'Directory to hold inventory.json')
    .option('-n, --name <name>', 'Display name (default: derived from the ID, or "default")')
    .option('-i, --id <id>', 'Inventory ID (default: derived from the name)')

  inventory.command('list').description('List inventory IDs')

  inventory
    .command('show')
    .description('Show an inventory')
    .argument('<id>', 'Inventory ID')
    .option('-c, --cards', 'List the cards instead of counting them')
    .option('-b, --board', 'List cards in board format')
    .option('--no-meta', 'Leave out ID, name and location')

  inventory
    .command('edit')
    .description("Change an inventory's ID, name or location")
    .argument('<id>', 'Inventory ID')
    .option('--id <id>', 'New ID')
    .option('--name <name>', 'New name')
    .option('--path <dir>', 'New location')

  inventory
    .command('delete')
    .description('Delete an inventory')
    .argument('<id>', 'Inventory ID')
    .option('-d, --delete-directory', 'Also delete the inventory directory')

  inventory
    .command('add')
    .description('Add the cards of one or more board lists to an inventory')
    .argument('<id>', 'Inventory ID')
    .argument('<files...>', 'Card list files')
}

function addBinderCommands(program: Command): void {
  const binder = program.command('binder').description('Build and manage binder pages')

  binder
    .command('create')
    .description('Build binder pages from an inventory or a card list')
    .argument('<dir>', 'Directory to write the binder into')
    .option('--inventory <id>', 'Inventory to take the cards from')
    .option('--list <file>', 'Card list to take the cards from')
    .option('-n, --name <name>', 'Display name (default: derived from the ID, or "default")')
    .option('-i, --id <id>', 'Binder ID (default: derived from the name)')
    .option('--rows <num>', 'Card rows per page (default: config binderRows, or 3)')
    .option('--columns <num>', 'Card columns per page (default: config binderColumns, or 3)')
    .option('--image-size <size>', 'Image size: full, large, normal, small (default: config imageSize, or large)')

  binder.command('list').description('List binder IDs')

  binder
    .command('show')
    .description('Show a binder')
    .argument('<id>', 'Binder ID')
    .option('-c, --cards', 'List the cards instead of counting them')

  binder
    .command('edit')
    .description("Change a binder's ID, name or location")
    .argument('<id>', 'Binder ID')
    .option('--id <id>', 'New ID')
    .option('--name <name>', 'New name (regenerates the pages)')
    .option('--path <dir>', 'New location')

  binder
    .command('delete')
    .description('Delete a binder')
    .argument('<id>', 'Binder ID')
    .option('-d, --delete-directory', 'Also delete the binder directory')
}

function addCardCommands(program: Command): void {
  const card = program.command('card').description('Look cards up in the catalog')

  card
    .command('search')
    .description('Look cards up by name')
    .argument('<names...>', 'Card names')
    .option('--fuzzy', 'Allow partial and misspelled names')
    .option('--set <code>', 'Limit to one set')

  card
    .command('show')
    .description('Show a card by set and collector number')
    .argument('<set>', 'Set code')
    .argument('<number>', 'Collector number')
    .option('--lang <lang>', 'Printing language', 'en')

  card
    .command('image')
    .description('Download a card image into the image cache')
    .argument('<set>', 'Set code')
    .argument('<number>', 'Collector number')
    .option('--size <size>', 'Image size: full, large, normal, small', 'full')
    .option('--lang <lang>', 'Printing language', 'en')
    .option('--back', 'Back face of a double-faced card')
    .option('-o, --output <file>', 'Also save the image to this file')
}

function addCacheCommands(program: Command): void {
  const cache = program.command('cache').description('Inspect and clear the catalog cache')

  cache
    .command('list')
    .description('List the keys under a cache path')
    .argument('[path]', 'Cache path', '/')
    .option('--images', 'Use the image cache')

  cache
    .command('clear')
    .description('Remove everything under a cache path')
    .argument('[path]', 'Cache path', '/')
    .option('--images', 'Use the image cache')
}

function addConfigCommand(program: Command): void {
  const configKeys = getValidConfigKeys()
  const maxLen = Math.max(...configKeys.map((k) => `${k} (${getConfigType(k)})`.length))
  const settingsHelp = configKeys
    .map((key) => {
      const label = `${key} (${getConfigType(key)})`
      return `  ${label.padEnd(maxLen)}  ${getConfigDescription(key)}`
    })
    .join('\n')
  program
    .command('config')
    .description('Manage persistent settings')
    .argument('[action]', 'Action: list (default), set, unset')
    .argument('[key]', 'Config key to set/unset')
    .argument('[value]', 'Value to set')
    .addHelpText(
      'after',
      `
Available settings:
${settingsHelp}

Examples:
  card-binder config                          List current settings
  card-binder config set binderColumns 4      Four cards per row
  card-binder config set imageSize normal     Smaller binder images
  card-binder config unset homeDir            Back to ~/.card-binder`
    )
}

function createProgram(exitOnHelp: boolean): Command {
  const program = new Command()
    .name('card-binder')
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Show version number')
    // Global options inherited by all subcommands
    .option('-q, --quiet', 'Minimal output')
    .option('-v, --verbose', 'Verbose output')
    .option('-m, --home <dir>', 'Data directory (or set CARD_BINDER_HOME)')
    .option('--config-file <path>', 'Config file path (or set CARD_BINDER_CONFIG)')

  // Subcommands copy this setting when they are created
  if (!exitOnHelp) {
    program.exitOverride()
  }

  addInventoryCommands(program)
  addBinderCommands(program)
  addCardCommands(program)
  addCacheCommands(program)
  addConfigCommand(program)
  return program
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'string' ? Number(value) : undefined
}

function buildCLIArgs(
  command: CommandGroup,
  action: string,
  operands: string[],
  opts: Record<string, unknown>
): CLIArgs {
  return {
    command,
    action,
    operands,
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
    homeDir: optionalString(opts.home),
    configFile: optionalString(opts.configFile),
    name: optionalString(opts.name),
    id: optionalString(opts.id),
    path: optionalString(opts.path),
    cards: opts.cards === true,
    board: opts.board === true,
    noMeta: opts.meta === false,
    deleteDirectory: opts.deleteDirectory === true,
    inventory: optionalString(opts.inventory),
    listFile: optionalString(opts.list),
    rows: optionalNumber(opts.rows),
    columns: optionalNumber(opts.columns),
    imageSize: optionalString(opts.imageSize ?? opts.size),
    fuzzy: opts.fuzzy === true,
    set: optionalString(opts.set),
    lang: optionalString(opts.lang),
    back: opts.back === true,
    output: optionalString(opts.output),
    images: opts.images === true
  }
}

function helpArgs(): CLIArgs {
  return buildCLIArgs('help', '', [], {})
}

/**
 * Attach action handlers to every leaf command. Returns a getter for the
 * args captured by whichever handler commander ran.
 */
function captureArgs(program: Command): () => CLIArgs | null {
  let result: CLIArgs | null = null

  for (const cmd of program.commands) {
    const group = cmd.name()
    if (!isCommandGroup(group)) continue

    // config has no subcommands; its arguments are the action, key and value
    if (cmd.commands.length === 0) {
      cmd.action(() => {
        const [action = 'list', ...rest] = cmd.args
        result = buildCLIArgs(group, action, rest, cmd.optsWithGlobals())
      })
      continue
    }

    for (const leaf of cmd.commands) {
      // Use optsWithGlobals() to include global options from parent program
      leaf.action(() => {
        result = buildCLIArgs(group, leaf.name(), [...leaf.args], leaf.optsWithGlobals())
      })
    }
  }

  return () => result
}

/**
 * Parse CLI arguments and return structured args.
 * Exits on --help or --version.
 */
export function parseCliArgs(): CLIArgs {
  const program = createProgram(true)
  const captured = captureArgs(program)

  program.parse()

  return captured() ?? program.help()
}

/**
 * Parse CLI arguments from an argv array (for testing).
 */
export function parseArgs(argv: string[], exitOnHelp = true): CLIArgs {
  const program = createProgram(exitOnHelp)
  const captured = captureArgs(program)

  try {
    program.parse(argv, { from: 'user' })
  } catch {
    // exitOverride throws on help, version and usage errors
    return captured() ?? helpArgs()
  }

  return captured() ?? helpArgs()
}

/**
 * Positional argument of the parsed action. Commander has already checked
 * required arguments, so a miss means the command was dispatched wrongly.
 */
export function operand(args: CLIArgs, index: number, label: string): string {
  const value = args.operands[index]
  if (value === undefined) {
    throw new Error(`Missing ${label}. Run 'card-binder ${args.command} ${args.action} --help' for usage.`)
  }
  return value
}
