/**
 * @fileoverview `lfs-cas fetch <oid> <size> <out>`: download an object,
 * verify it and write it to a file.
 *
 * @module cli/commands/fetch
 */

import * as fs from 'fs/promises'
import * as path from 'path'
import { assertValidOid, parseSize } from '../../utils/oid'
import type { CommandContext } from '../index'
import { requireArg } from '../options'
import { clientFromOptions } from './client'

export async function fetchCommand(ctx: CommandContext): Promise<void> {
  const oid = requireArg(ctx, 0, 'oid')
  assertValidOid(oid)
  const sizeArg = requireArg(ctx, 1, 'size')
  const size = parseSize(sizeArg)
  if (size === undefined) {
    throw new Error(`Invalid size: ${sizeArg}`)
  }
  const out = path.resolve(ctx.cwd, requireArg(ctx, 2, 'out'))
  const client = clientFromOptions(ctx)

  const bytes = await client.download(oid, size)
  await fs.mkdir(path.dirname(out), { recursive: true })
  await fs.writeFile(out, bytes)
  ctx.stdout(`Wrote ${bytes.byteLength} bytes to ${out}`)
}
