/**
 * @fileoverview Typed accessors for parsed CLI options.
 *
 * cac turns numeric-looking values into numbers, so numeric options may
 * arrive as either type.
 *
 * @module cli/options
 */

import type { CommandContext } from './index'

export function stringOption(options: Record<string, unknown>, name: string): string | undefined {
  const value = options[name]
  if (value === undefined) return undefined
  if (typeof value === 'string') return value
  if (typeof value === 'number') return String(value)
  throw new Error(`--${name} expects a value`)
}

export function requireStringOption(options: Record<string, unknown>, name: string): string {
  const value = stringOption(options, name)
  if (value === undefined || value === '') {
    throw new Error(`Missing required option --${name}`)
  }
  return value
}

export function integerOption(options: Record<string, unknown>, name: string): number | undefined {
  const value = options[name]
  if (value === undefined) return undefined
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN
  if (!Number.isSafeInteger(parsed) || parsed < 0) {
    throw new Error(`--${name} expects a non-negative integer, got ${String(value)}`)
  }
  return parsed
}

export function booleanOption(options: Record<string, unknown>, name: string): boolean | undefined {
  const value = options[name]
  return value === undefined ? undefined : value === true
}

/**
 * Positional argument `index`, or an error naming it.
 */
export function requireArg(ctx: CommandContext, index: number, name: string): string {
  const value = ctx.args[index]
  if (value === undefined || value === '') {
    throw new Error(`Missing required argument <${name}>`)
  }
  return value
}
