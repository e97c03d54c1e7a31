import type { CapabilityDescriptor, CapabilityInfo } from '../types'
import { toParameterSpecs } from './parameter-spec'
import { qualifyName } from './qualified-name'

/** Tools already named `{prefix}_{server}_...` keep their name as the qualified name. */
export function describeCapability(prefix: string, server: string, info: CapabilityInfo): CapabilityDescriptor {
  const origin = `[from MCP server: ${server}]`
  const ownPrefix = qualifyName(prefix, server, '')
  const alreadyQualified = info.name.startsWith(ownPrefix) && info.name.length > ownPrefix.length
  return {
    qualifiedName: alreadyQualified ? info.name : qualifyName(prefix, server, info.name),
    server,
    name: info.name,
    description: info.description ? `${info.description} ${origin}` : origin,
    inputSchema: info.inputSchema,
    parameters: toParameterSpecs(info.inputSchema),
  }
}
