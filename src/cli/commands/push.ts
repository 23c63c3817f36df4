/**
 * @fileoverview `lfs-cas push <file>`: upload a file unless the server has it.
 *
 * @module cli/commands/push
 */

import * as fs from 'fs/promises'
import * as path from 'path'
import type { CommandContext } from '../index'
import { requireArg } from '../options'
import { clientFromOptions } from './client'

export async function pushCommand(ctx: CommandContext): Promise<void> {
  const file = path.resolve(ctx.cwd, requireArg(ctx, 0, 'file'))
  const client = clientFromOptions(ctx)
  const bytes = new Uint8Array(await fs.readFile(file))

  const { oid, size, transferred } = await client.upload(bytes)
  ctx.stdout(`${transferred ? 'Uploaded' : 'Already stored'} ${oid} (${size} bytes)`)
}
