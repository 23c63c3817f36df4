/**
 * @fileoverview CLI Entry Point for lfs-cas
 *
 * Argument parsing, command routing and help for the `lfs-cas` binary.
 * Commands receive a {@link CommandContext} with captured output streams so
 * they can run embedded or under test.
 *
 * @module cli/index
 *
 * @example
 * // Run programmatically
 * import { runCLI } from './cli'
 *
 * const output: string[] = []
 * const result = await runCLI(['hash', 'model.bin'], { stdout: (msg) => output.push(msg) })
 *
 * @example
 * // Parse arguments without running
 * const parsed = parseArgs(['serve', '--port', '9000', '--readonly-storage'])
 * parsed.command // 'serve'
 * parsed.options // { port: 9000, readonlyStorage: true }
 */

import cac from 'cac'
import { resolve } from 'path'
import type { FetchFn } from '../client/lfs-client'
import type { Env } from '../config'
import { fetchCommand } from './commands/fetch'
import { hashCommand } from './commands/hash'
import { pointerCommand } from './commands/pointer'
import { pushCommand } from './commands/push'
import { serveCommand } from './commands/serve'

// ============================================================================
// Types
// ============================================================================

/**
 * Options for configuring CLI behavior.
 *
 * @example
 * const options: CLIOptions = {
 *   stdout: (msg) => output.push(msg),
 *   stderr: (msg) => errors.push(msg),
 *   env: { LFS_CAS_STORAGE: 'memory' },
 * }
 */
export interface CLIOptions {
  /** Working directory that relative paths resolve against */
  cwd?: string
  /** Custom function for standard output. Defaults to console.log */
  stdout?: (msg: string) => void
  /** Custom function for error output. Defaults to console.error */
  stderr?: (msg: string) => void
  /** Environment read by `serve`. Defaults to process.env */
  env?: Env
  /** HTTP implementation used by `push` and `fetch` */
  fetch?: FetchFn
}

/**
 * Result returned from CLI command execution.
 */
export interface CLIResult {
  /** Exit code (0 for success, non-zero for failure) */
  exitCode: number
  /** The command that was executed, if any */
  command?: string
  /** Error object if command failed */
  error?: Error
}

/**
 * Parsed command-line arguments.
 */
export interface ParsedArgs {
  /** The subcommand to execute (e.g., 'serve', 'push') */
  command?: string
  /** Positional arguments after the command */
  args: string[]
  /** Parsed options, camel-cased (`--storage-path` becomes `storagePath`) */
  options: Record<string, unknown>
  /** Arguments after '--' separator */
  rawArgs: string[]
  cwd: string
}

/**
 * Context object passed to command handlers.
 */
export interface CommandContext {
  cwd: string
  args: string[]
  options: Record<string, unknown>
  rawArgs: string[]
  stdout: (msg: string) => void
  stderr: (msg: string) => void
  env: Env
  fetch?: FetchFn
}

/**
 * Function type for command handlers. Throw to fail the command.
 */
export type CommandHandler = (ctx: CommandContext) => void | Promise<void>

// ============================================================================
// Constants
// ============================================================================

/** Available subcommands with their one-line descriptions */
const SUBCOMMANDS = {
  serve: 'Run the LFS server',
  hash: 'Print the oid and size of a file',
  pointer: 'Print the LFS pointer file for a file',
  push: 'Upload a file to an LFS server',
  fetch: 'Download an object from an LFS server',
} as const

type Subcommand = keyof typeof SUBCOMMANDS

const USAGE: Record<Subcommand, string> = {
  serve:
    'serve [--host <host>] [--port <port>] [--self-url <url>] [--repositories <a,b>] [--storage memory|file] ' +
    '[--storage-path <dir>] [--compress] [--readonly-storage] [--cache-max-bytes <n>] [--max-upload-size <n>] ' +
    '[--request-log <file>] [--log-level <level>]',
  hash: 'hash <file>',
  pointer: 'pointer <file>',
  push: 'push <file> --server <url> --repo <name> [--timeout <ms>] [--retries <n>]',
  fetch: 'fetch <oid> <size> <out> --server <url> --repo <name> [--timeout <ms>] [--retries <n>]',
}

/** Current CLI version */
const VERSION = '0.1.0'

/** CLI name */
const NAME = 'lfs-cas'

function isSubcommand(name: string): name is Subcommand {
  return Object.prototype.hasOwnProperty.call(SUBCOMMANDS, name)
}

// ============================================================================
// CLI Class
// ============================================================================

/**
 * Main CLI class for the lfs-cas command-line interface.
 *
 * @example
 * const cli = new CLI({ stdout: (msg) => output.push(msg) })
 * cli.registerCommand('hash', hashCommand)
 * const result = await cli.run(['hash', 'file.bin'])
 */
export class CLI {
  public name: string
  public version: string

  private handlers: Map<string, CommandHandler> = new Map()
  private stdout: (msg: string) => void
  private stderr: (msg: string) => void
  private env: Env
  private fetchFn?: FetchFn
  private cwd?: string

  constructor(options: CLIOptions & { name?: string; version?: string } = {}) {
    this.name = options.name ?? NAME
    this.version = options.version ?? VERSION
    this.stdout = options.stdout ?? console.log
    this.stderr = options.stderr ?? console.error
    this.env = options.env ?? process.env
    this.fetchFn = options.fetch
    this.cwd = options.cwd
  }

  registerCommand(name: string, handler: CommandHandler): void {
    this.handlers.set(name, handler)
  }

  /**
   * Runs the CLI with the provided arguments.
   *
   * Never throws; failures are reported on stderr and in the result.
   */
  async run(args: string[]): Promise<CLIResult> {
    let parsed: ParsedArgs
    try {
      parsed = parseArgs(args, this.cwd)
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err))
      this.stderr(`Error: ${error.message}`)
      return { exitCode: 1, error }
    }

    if (parsed.options.help === true || parsed.options.h === true) {
      this.stdout(parsed.command && isSubcommand(parsed.command) ? this.getSubcommandHelp(parsed.command) : this.getHelp())
      return { exitCode: 0, command: parsed.command }
    }

    if (!parsed.command && (parsed.options.version === true || parsed.options.v === true)) {
      this.stdout(`${this.name} ${this.version}`)
      return { exitCode: 0 }
    }

    if (!parsed.command) {
      this.stdout(this.getHelp())
      return { exitCode: 0 }
    }

    const handler = this.handlers.get(parsed.command)
    if (!handler) {
      const suggestion = this.suggestCommand(parsed.command)
      let errorMsg = `Unknown command: ${parsed.command}`
      if (suggestion) {
        errorMsg += `\nDid you mean '${suggestion}'?`
      }
      errorMsg += `\nRun '${this.name} --help' for available commands.`
      this.stderr(errorMsg)
      return { exitCode: 1, command: parsed.command, error: new Error(`Unknown command: ${parsed.command}`) }
    }

    try {
      await handler({
        cwd: parsed.cwd,
        args: parsed.args,
        options: parsed.options,
        rawArgs: parsed.rawArgs,
        stdout: this.stdout,
        stderr: this.stderr,
        env: this.env,
        fetch: this.fetchFn,
      })
      return { exitCode: 0, command: parsed.command }
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err))
      this.stderr(`Error: ${error.message}`)
      return { exitCode: 1, command: parsed.command, error }
    }
  }

  private getHelp(): string {
    const commands = Object.entries(SUBCOMMANDS)
      .map(([name, description]) => `  ${name.padEnd(9)} ${description}`)
      .join('\n')
    return `${this.name} v${this.version}

Usage: ${this.name} <command> [options] [args...]

Commands:
${commands}

Options:
  -h, --help     Show help
  -v, --version  Show version
  -C, --cwd      Set the working directory`
  }

  private getSubcommandHelp(command: Subcommand): string {
    return `${this.name} ${command}

${SUBCOMMANDS[command]}

Usage: ${this.name} ${USAGE[command]}`
  }

  /**
   * Closest known command within three edits, if any.
   */
  private suggestCommand(input: string): string | null {
    let minDistance = Infinity
    let suggestion: string | null = null

    for (const cmd of Object.keys(SUBCOMMANDS)) {
      const distance = levenshteinDistance(input, cmd)
      if (distance < minDistance && distance <= 3) {
        minDistance = distance
        suggestion = cmd
      }
    }

    return suggestion
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Minimum number of single-character edits turning `a` into `b`.
 *
 * @example
 * levenshteinDistance('serve', 'serv') // 1
 */
export function levenshteinDistance(a: string, b: string): number {
  let previous = Array.from({ length: a.length + 1 }, (_, j) => j)

  for (let i = 1; i <= b.length; i++) {
    const current = [i]
    for (let j = 1; j <= a.length; j++) {
      const substitution = previous[j - 1] + (b.charAt(i - 1) === a.charAt(j - 1) ? 0 : 1)
      current[j] = Math.min(substitution, current[j - 1] + 1, previous[j] + 1)
    }
    previous = current
  }

  return previous[a.length]
}

// ============================================================================
// Exported Functions
// ============================================================================

/**
 * Parses command-line arguments with cac.
 *
 * @example
 * parseArgs(['push', 'model.bin', '--server', 'http://127.0.0.1:8080', '--repo', 'repo'])
 * // { command: 'push', args: ['model.bin'], options: { server: '...', repo: 'repo' }, ... }
 */
export function parseArgs(args: string[], baseCwd: string = process.cwd()): ParsedArgs {
  const cli = cac(NAME)

  cli.option('-C, --cwd <path>', 'Set the working directory')
  cli.option('-h, --help', 'Show help')
  cli.option('-v, --version', 'Show version')

  // serve
  cli.option('--host <host>', 'Interface to listen on')
  cli.option('--port <port>', 'Port to listen on')
  cli.option('--self-url <url>', 'Base URL written into batch actions')
  cli.option('--repositories <names>', 'Comma-separated repository names')
  cli.option('--storage <kind>', "Blobstore backend: 'memory' or 'file'")
  cli.option('--storage-path <dir>', 'Directory for the file backend')
  cli.option('--compress', 'Deflate values in the file backend')
  cli.option('--readonly-storage', 'Refuse all writes')
  cli.option('--cache-max-bytes <n>', 'Read cache budget in bytes')
  cli.option('--max-upload-size <n>', 'Largest accepted upload in bytes')
  cli.option('--request-log <file>', 'Append request log entries to a JSON-lines file')
  cli.option('--log-level <level>', 'debug, info, warn or error')

  // push / fetch
  cli.option('--server <url>', 'LFS server base URL')
  cli.option('--repo <name>', 'Repository name')
  cli.option('--timeout <ms>', 'Per-request timeout')
  cli.option('--retries <n>', 'Retries after a transient failure')

  const parsed = cli.parse(['node', NAME, ...args], { run: false })

  const positional: string[] = parsed.args.map((arg) => String(arg))
  const command = positional.shift()

  const options: Record<string, unknown> = { ...parsed.options }
  const separated: unknown = options['--']
  const rawArgs: unknown[] = Array.isArray(separated) ? separated : []
  delete options['--']

  const cwdOption: unknown = options.cwd ?? options.C
  const cwd = typeof cwdOption === 'string' ? resolve(baseCwd, cwdOption) : baseCwd

  return {
    command,
    args: positional,
    options,
    rawArgs: rawArgs.map((arg) => String(arg)),
    cwd,
  }
}

/**
 * Create a CLI with every built-in command and run it.
 *
 * @example
 * const result = await runCLI(['pointer', 'model.bin'])
 * process.exitCode = result.exitCode
 */
export async function runCLI(args: string[], options: CLIOptions = {}): Promise<CLIResult> {
  const cli = new CLI(options)

  cli.registerCommand('serve', serveCommand)
  cli.registerCommand('hash', hashCommand)
  cli.registerCommand('pointer', pointerCommand)
  cli.registerCommand('push', pushCommand)
  cli.registerCommand('fetch', fetchCommand)

  return cli.run(args)
}
