/**
 * Label -> value resolution.
 *
 * Label/value pairs are laid out as adjacent cells, adjacent blocks, or a
 * number inline with the label. Structural neighbours are tried before
 * scraping a number out of the label text.
 */

import type { DocumentTree } from '../types.js'

export type ResolutionStrategy = 'sibling' | 'parent-sibling' | 'numeric-token'

export interface ResolvedValue {
  text: string
  strategy: ResolutionStrategy
}

/** First digit run, optional decimal part, optional percent sign */
const NUMERIC_TOKEN = /\d+(?:\.\d+)?%?/

/**
 * Resolve the value text for a label node. Stops at the first non-empty result:
 * 1. next sibling of the label
 * 2. next sibling of the label's parent
 * 3. first numeric token in the label text followed by the parent text
 *
 * Returns null when nothing resolves.
 */
export function resolveValue<TNode>(tree: DocumentTree<TNode>, labelNode: TNode): ResolvedValue | null {
  const sibling = tree.nextSibling(labelNode)
  if (sibling !== null) {
    const text = tree.valueText(sibling)
    if (text) return { text, strategy: 'sibling' }
  }

  const parent = tree.parent(labelNode)
  if (parent !== null) {
    const parentSibling = tree.nextSibling(parent)
    if (parentSibling !== null) {
      const text = tree.valueText(parentSibling)
      if (text) return { text, strategy: 'parent-sibling' }
    }
  }

  const haystack = parent !== null ? `${tree.text(labelNode)} ${tree.text(parent)}` : tree.text(labelNode)
  const token = NUMERIC_TOKEN.exec(haystack)
  if (token) {
    return { text: token[0], strategy: 'numeric-token' }
  }

  return null
}
