/**
 * TOML Codec
 *
 * Encoding writes root settings first, then one [table] per namespace that
 * holds settings, with descriptions as trailing comments. Mapping-valued
 * settings get a table of their own. TOML has no null, so settings whose
 * value contains one are left out. Bigints beyond the 64-bit integer range
 * are written as strings.
 */

import { parse } from 'smol-toml'
import { FormatError } from '../errors'
import type { Logger } from '../logging/logger'
import { NamespaceNode } from '../namespace/namespace-node'
import type { Setting } from '../setting/setting'
import { isPlainObject } from '../setting/value-kinds'

export interface TomlEncodeOptions {
  /** Receives a debug line for every setting left out */
  logger?: Logger
}

const BARE_KEY = /^[A-Za-z0-9_-]+$/

const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n

export function encodeToml(root: NamespaceNode, options: TomlEncodeOptions = {}): string {
  const sections: string[][] = []
  emitNamespace(root, [], sections, options)
  return sections
    .filter((lines) => lines.length > 0)
    .map((lines) => lines.join('\n'))
    .join('\n\n')
    .concat('\n')
}

function emitNamespace(
  node: NamespaceNode,
  segments: string[],
  sections: string[][],
  options: TomlEncodeOptions,
): void {
  const lines: string[] = []
  const tables: Array<[string[], Setting]> = []
  const children: Array<[string, NamespaceNode]> = []

  for (const [name, entry] of node.entries()) {
    if (entry instanceof NamespaceNode) {
      children.push([name, entry])
      continue
    }
    if (containsNull(entry.value)) {
      options.logger?.debug(`Skipped ${node.qualify(name)}: TOML has no null`)
      continue
    }
    if (isPlainObject(entry.value)) {
      tables.push([[...segments, name], entry])
      continue
    }
    lines.push(withComment(`${formatKey(name)} = ${formatInline(entry.value)}`, entry.description))
  }

  if (lines.length > 0) {
    // Root settings need no header
    sections.push(segments.length === 0 ? lines : [tableHeader(segments), ...lines])
  } else if (segments.length > 0 && tables.length === 0 && children.length === 0) {
    // Keep empty namespaces in the document
    sections.push([tableHeader(segments)])
  }

  for (const [tableSegments, setting] of tables) {
    const table: string[] = [withComment(tableHeader(tableSegments), setting.description)]
    if (isPlainObject(setting.value)) {
      for (const [key, value] of Object.entries(setting.value)) {
        table.push(`${formatKey(key)} = ${formatInline(value)}`)
      }
    }
    sections.push(table)
  }

  for (const [name, child] of children) {
    emitNamespace(child, [...segments, name], sections, options)
  }
}

function tableHeader(segments: string[]): string {
  return `[${segments.map(formatKey).join('.')}]`
}

function withComment(line: string, description: string): string {
  const comment = description.replace(/\s*\n\s*/g, ' ').trim()
  return comment ? `${line} # ${comment}` : line
}

function formatKey(key: string): string {
  return BARE_KEY.test(key) ? key : formatString(key)
}

function formatString(value: string): string {
  // JSON escapes are valid TOML basic-string escapes, except DEL must be escaped too
  return JSON.stringify(value).replace(/\x7f/g, '\\u007f')
}

function formatInline(value: unknown): string {
  if (typeof value === 'string') return formatString(value)
  if (typeof value === 'boolean') return String(value)
  if (typeof value === 'bigint') {
    return value < INT64_MIN || value > INT64_MAX ? formatString(String(value)) : String(value)
  }
  if (typeof value === 'number') return String(value)
  if (Array.isArray(value)) {
    return `[${value.map((item: unknown) => formatInline(item)).join(', ')}]`
  }
  if (isPlainObject(value)) {
    const pairs = Object.entries(value).map(([k, v]) => `${formatKey(k)} = ${formatInline(v)}`)
    return pairs.length === 0 ? '{}' : `{ ${pairs.join(', ')} }`
  }
  throw new FormatError('TOML', `cannot encode ${String(value)}`)
}

function containsNull(value: unknown): boolean {
  if (value === null) return true
  if (Array.isArray(value)) return value.some((item: unknown) => containsNull(item))
  if (isPlainObject(value)) return Object.values(value).some((item) => containsNull(item))
  return false
}

/**
 * Parse a TOML document into plain objects. Integers outside the safe
 * number range come back as bigints.
 * @throws {FormatError} on syntax errors
 */
export function decodeToml(source: string): unknown {
  try {
    return parse(source, { integersAsBigInt: 'asNeeded' })
  } catch (e) {
    throw new FormatError('TOML', e instanceof Error ? e.message : String(e), { cause: e })
  }
}
