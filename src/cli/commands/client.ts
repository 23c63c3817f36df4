/**
 * @fileoverview Shared option handling for the commands that talk to a server.
 *
 * @module cli/commands/client
 */

import { LfsClient } from '../../client/lfs-client'
import type { CommandContext } from '../index'
import { integerOption, requireStringOption } from '../options'

export function clientFromOptions(ctx: CommandContext): LfsClient {
  return new LfsClient({
    baseUrl: requireStringOption(ctx.options, 'server'),
    repository: requireStringOption(ctx.options, 'repo'),
    timeoutMs: integerOption(ctx.options, 'timeout'),
    retries: integerOption(ctx.options, 'retries'),
    fetch: ctx.fetch,
  })
}
