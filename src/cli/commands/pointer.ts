/**
 * @fileoverview `lfs-cas pointer <file>`: print the pointer file that
 * stands in for a file in a git tree.
 *
 * @module cli/commands/pointer
 */

import * as fs from 'fs/promises'
import * as path from 'path'
import { pointerFor } from '../../filestore/pointer'
import type { CommandContext } from '../index'
import { requireArg } from '../options'

export async function pointerCommand(ctx: CommandContext): Promise<void> {
  const file = path.resolve(ctx.cwd, requireArg(ctx, 0, 'file'))
  const { file: pointer } = pointerFor(new Uint8Array(await fs.readFile(file)))
  ctx.stdout(new TextDecoder().decode(pointer).trimEnd())
}
