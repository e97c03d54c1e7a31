/**
 * Flattens tool result content into the single text payload callers see.
 */

export type ContentItem = { type: string; [key: string]: unknown }

export const EMPTY_RESULT_TEXT = '(no content)'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function binaryPlaceholder(base64: string): string {
  return `[binary data: ${Buffer.byteLength(base64, 'base64')} bytes]`
}

function flattenItem(item: ContentItem): string {
  switch (item.type) {
    case 'text':
      return typeof item.text === 'string' ? item.text : ''
    case 'image':
    case 'audio':
      return typeof item.data === 'string' ? binaryPlaceholder(item.data) : '[binary data: 0 bytes]'
    case 'resource': {
      const resource = item.resource
      if (!isRecord(resource)) return ''
      if (typeof resource.text === 'string') return resource.text
      if (typeof resource.blob === 'string') return binaryPlaceholder(resource.blob)
      return typeof resource.uri === 'string' ? `[resource: ${resource.uri}]` : ''
    }
    case 'resource_link':
      return typeof item.uri === 'string' ? `[resource: ${item.uri}]` : ''
    default:
      return JSON.stringify(item)
  }
}

export function flattenContent(items: readonly ContentItem[]): string {
  const parts = items.map(flattenItem).filter((part) => part.length > 0)
  return parts.length > 0 ? parts.join('\n') : EMPTY_RESULT_TEXT
}
