import { Document, Pair, Scalar, YAMLMap, parseDocument, type Node } from 'yaml'
import { FormatError } from '../errors'
import { NamespaceNode } from '../namespace/namespace-node'
import type { Setting } from '../setting/setting'

export interface YamlEncodeOptions {
  indent?: number
}

/**
 * Render a tree as YAML: namespaces as nested block mappings, settings as
 * `name: value # description`, tuples in flow style.
 */
export function encodeYaml(root: NamespaceNode, options: YamlEncodeOptions = {}): string {
  const doc = new Document()
  doc.contents = buildMap(doc, root)
  return doc.toString({ indent: options.indent ?? 2 })
}

function buildMap(doc: Document, node: NamespaceNode): YAMLMap {
  const map = new YAMLMap()
  for (const [name, entry] of node.entries()) {
    const key = new Scalar(name)
    if (entry instanceof NamespaceNode) {
      map.items.push(new Pair(key, buildMap(doc, entry)))
    } else {
      map.items.push(settingPair(doc, key, entry))
    }
  }
  return map
}

function settingPair(doc: Document, key: Scalar<string>, setting: Setting): Pair {
  const value = setting.value
  const valueNode: Node = doc.createNode(value, { flow: Array.isArray(value) })
  const description = oneLine(setting.description)

  if (description) {
    // A trailing comment after a block mapping would land below it
    if (valueNode instanceof YAMLMap && !valueNode.flow) {
      key.commentBefore = ` ${description}`
    } else {
      valueNode.comment = ` ${description}`
    }
  }
  return new Pair(key, valueNode)
}

function oneLine(text: string): string {
  return text.replace(/\s*\n\s*/g, ' ').trim()
}

/**
 * Parse a single YAML document.
 *
 * Integers are read as bigints and only those within the safe range come
 * back as numbers, so larger ones keep every digit.
 * @throws {FormatError} on syntax errors
 */
export function decodeYaml(source: string): unknown {
  const doc = parseDocument(source, { intAsBigInt: true })
  const [first] = doc.errors
  if (first) {
    throw new FormatError('YAML', first.message, { cause: first })
  }
  return doc.toJS({ reviver: (_key: unknown, value: unknown) => narrowInteger(value) })
}

function narrowInteger(value: unknown): unknown {
  if (typeof value !== 'bigint') return value
  const n = Number(value)
  return Number.isSafeInteger(n) ? n : value
}
