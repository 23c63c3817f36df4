/**
 * @fileoverview `lfs-cas hash <file>`: print a file's oid and size.
 *
 * @module cli/commands/hash
 */

import * as fs from 'fs/promises'
import * as path from 'path'
import { sha256Hex } from '../../utils/hash'
import type { CommandContext } from '../index'
import { requireArg } from '../options'

export async function hashCommand(ctx: CommandContext): Promise<void> {
  const file = path.resolve(ctx.cwd, requireArg(ctx, 0, 'file'))
  const bytes = new Uint8Array(await fs.readFile(file))
  ctx.stdout(`${sha256Hex(bytes)} ${bytes.byteLength}`)
}
