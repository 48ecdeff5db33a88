import { describe, it, expect, beforeEach } from 'vitest'
import { decodeYaml, encodeYaml } from '../../src/io/yaml-codec'
import { decodeDocument } from '../../src/io/codecs'
import type { Registry } from '../../src/namespace/registry'
import { Setting } from '../../src/setting/setting'
import { frozenMapping, tuple } from '../../src/setting/value-kinds'
import { FormatError } from '../../src/errors'
import { quietRegistry } from '../helpers/registry'

describe('YAML codec', () => {
  let registry: Registry

  beforeEach(() => {
    registry = quietRegistry()
  })

  describe('encode', () => {
    it('should write settings with descriptions as trailing comments', () => {
      registry.register('debug', new Setting(false))
      registry.register('server.port', new Setting(8080, { description: 'Listening port' }))
      registry.register('server.host', new Setting('localhost'))

      expect(registry.encode('yaml')).toBe(
        ['debug: false', 'server:', '  port: 8080 # Listening port', '  host: localhost', ''].join('\n'),
      )
    })

    it('should honour the indent option', () => {
      registry.register('server.port', new Setting(8080))
      expect(encodeYaml(registry, { indent: 4 })).toBe('server:\n    port: 8080\n')
    })

    it('should use the registry yamlIndent option', () => {
      const wide = quietRegistry({ yamlIndent: 3 })
      wide.register('server.port', new Setting(8080))
      expect(wide.encode('yaml')).toBe('server:\n   port: 8080\n')
    })

    it('should round trip the tree values', () => {
      registry.register('name', new Setting('demo', { description: 'Application name' }))
      registry.register('ratio', new Setting(0.75))
      registry.register('empty', new Setting(null))
      registry.register('server.tags', new Setting(tuple('api', 'web'), { description: 'Route tags' }))
      registry.register(
        'server.limits',
        new Setting(frozenMapping({ rps: 10, burst: tuple(1, 2) }), { description: 'Rate limits' }),
      )
      registry.register('server.tls.enabled', new Setting(true))

      expect(decodeDocument(registry.encode('yaml'), 'yaml')).toEqual(registry.toValues())
    })
  })

  describe('bigint round trip', () => {
    it('should restore a bigint above the safe integer range exactly', () => {
      const big = 2n ** 64n + 1n
      registry.register('big', new Setting(big))
      const target = quietRegistry()
      target.register('big', new Setting(0n))

      target.load(registry.encode('yaml'), 'yaml')

      expect(target.getSetting('big').value).toBe(big)
    })
  })

  describe('decode', () => {
    it('should parse mappings into plain objects', () => {
      expect(decodeYaml('a: 1\nb:\n  c: [x, y]\n')).toEqual({ a: 1, b: { c: ['x', 'y'] } })
    })

    it('should keep integers beyond the safe range as bigints', () => {
      expect(decodeYaml('a: 9007199254740993\nb: 7\nc: 1.5\n')).toEqual({ a: 9007199254740993n, b: 7, c: 1.5 })
    })

    it('should wrap syntax errors', () => {
      expect(() => decodeYaml('a: [1')).toThrow(FormatError)
    })

    it('should freeze decoded documents', () => {
      const document = decodeDocument('a:\n  b: [1, 2]\n', 'yaml')
      expect(Object.isFrozen(document)).toBe(true)
      expect(document).toEqual({ a: { b: [1, 2] } })
    })
  })
})
