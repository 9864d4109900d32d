/**
 * Extractor Factory
 *
 * An extractor turns a document tree into the raw text of one metric, or null
 * when the metric has no value on that page. Extractors are plain tagged
 * values; runExtractor dispatches on the tag.
 *
 * - bound:    value captured at discovery time, replayed for any tree
 * - rule:     label recognition + value resolution re-run on every tree
 * - selector: first node matching a CSS selector, re-run on every tree
 */

import { findLabelNode, type RecognitionRule } from './matching/label-matcher.js'
import { resolveValue, type ResolutionStrategy } from './matching/value-resolver.js'
import type { DocumentTree } from './types.js'

export interface BoundExtractor {
  readonly kind: 'bound'
  readonly value: string
}

export interface RuleExtractor {
  readonly kind: 'rule'
  readonly rule: RecognitionRule
}

export interface SelectorExtractor {
  readonly kind: 'selector'
  readonly selector: string
}

export type Extractor = BoundExtractor | RuleExtractor | SelectorExtractor

/**
 * Outcome of evaluating one rule against the discovery page.
 * A missing label means the metric is not on the page and gets no accessor.
 */
export type DiscoveryResult =
  | { found: false }
  | { found: true; extractor: BoundExtractor; strategy: ResolutionStrategy }
  | { found: true; extractor: RuleExtractor; strategy: null }

export function fromSelector(selector: string): SelectorExtractor {
  return { kind: 'selector', selector }
}

export function fromValue(value: string): BoundExtractor {
  return { kind: 'bound', value }
}

export function fromRule(rule: RecognitionRule): RuleExtractor {
  return { kind: 'rule', rule }
}

/**
 * Run a rule once against the discovery page.
 *
 * A resolved value is treated as the metric's reading and bound for good.
 * A label without a value yields a rule extractor so a later page can still
 * produce one.
 */
export function fromDiscovery<TNode>(rule: RecognitionRule, tree: DocumentTree<TNode>): DiscoveryResult {
  const labelNode = findLabelNode(tree, rule)
  if (labelNode === null) {
    return { found: false }
  }

  const resolved = resolveValue(tree, labelNode)
  if (resolved !== null) {
    return { found: true, extractor: fromValue(resolved.text), strategy: resolved.strategy }
  }

  return { found: true, extractor: fromRule(rule), strategy: null }
}

export function runExtractor<TNode>(extractor: Extractor, tree: DocumentTree<TNode>): string | null {
  switch (extractor.kind) {
    case 'bound':
      return extractor.value
    case 'rule': {
      const labelNode = findLabelNode(tree, extractor.rule)
      if (labelNode === null) return null
      return resolveValue(tree, labelNode)?.text ?? null
    }
    case 'selector': {
      const node = tree.selectFirst(extractor.selector)
      if (node === null) return null
      return tree.valueText(node)
    }
  }
}

/**
 * Whether repeated runs can observe a different page.
 */
export function isLazy(extractor: Extractor): boolean {
  return extractor.kind !== 'bound'
}
