import { describe, it, expect } from 'vitest'

import { describeCapability } from '../capabilities/describe'
import { coerceArguments, toParameterSpecs } from '../capabilities/parameter-spec'
import { parseQualifiedName, qualifyName } from '../capabilities/qualified-name'

const schema = {
  type: 'object',
  properties: {
    path: { type: 'string', description: 'File path' },
    limit: { type: 'integer' },
    ratio: { type: 'number', description: 'Scale' },
    recursive: { type: 'boolean' },
    tags: { type: 'array', items: { type: 'string' }, description: 'Labels' },
    options: { type: 'object' },
    mode: { type: 'string', enum: ['fast', 'slow'] },
    nullable: { type: ['null', 'integer'] },
    anything: {},
  },
  required: ['path'],
}

describe('toParameterSpecs', () => {
  it('maps JSON schema types to parameter specs', () => {
    expect(toParameterSpecs(schema)).toEqual([
      { name: 'path', type: 'string', description: 'File path', required: true },
      { name: 'limit', type: 'integer', description: '', required: false },
      { name: 'ratio', type: 'float', description: 'Scale', required: false },
      { name: 'recursive', type: 'boolean', description: '', required: false },
      { name: 'tags', type: 'string', description: 'Labels (JSON array)', required: false },
      { name: 'options', type: 'string', description: '(JSON object)', required: false },
      { name: 'mode', type: 'string', description: '', required: false, enumValues: ['fast', 'slow'] },
      { name: 'nullable', type: 'integer', description: '', required: false },
      { name: 'anything', type: 'string', description: '', required: false },
    ])
  })

  it('returns nothing for a schema without properties', () => {
    expect(toParameterSpecs({ type: 'object' })).toEqual([])
  })
})

describe('coerceArguments', () => {
  it('parses JSON text given for array and object parameters', () => {
    expect(coerceArguments({ tags: '["a","b"]', options: ' {"deep":true}', path: '[not json' }, schema)).toEqual({
      tags: ['a', 'b'],
      options: { deep: true },
      path: '[not json',
    })
  })

  it('leaves unparseable text and other parameters alone', () => {
    expect(coerceArguments({ tags: '[oops', limit: 3, extra: '{"x":1}' }, schema)).toEqual({
      tags: '[oops',
      limit: 3,
      extra: '{"x":1}',
    })
  })
})

describe('qualified names', () => {
  it('splits on the first two underscores only', () => {
    expect(qualifyName('mcp', 'fs', 'read_file')).toBe('mcp_fs_read_file')
    expect(parseQualifiedName('mcp_fs_read_file')).toEqual({ prefix: 'mcp', server: 'fs', capability: 'read_file' })
  })

  it('rejects names missing a segment', () => {
    expect(parseQualifiedName('mcp_fs')).toBeNull()
    expect(parseQualifiedName('mcp__echo')).toBeNull()
    expect(parseQualifiedName('_fs_echo')).toBeNull()
    expect(parseQualifiedName('mcp_fs_')).toBeNull()
  })

  it('keeps a tool name that already carries the server prefix', () => {
    const info = { name: 'mcp_s1_x', description: '', inputSchema: {} }
    expect(describeCapability('mcp', 's1', info)).toMatchObject({ qualifiedName: 'mcp_s1_x', name: 'mcp_s1_x' })
    expect(describeCapability('mcp', 's1', { ...info, name: 'x' }).qualifiedName).toBe('mcp_s1_x')
    expect(describeCapability('mcp', 's2', info).qualifiedName).toBe('mcp_s2_mcp_s1_x')
  })
})
