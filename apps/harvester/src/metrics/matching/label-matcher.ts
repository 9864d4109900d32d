/**
 * Label recognition.
 *
 * A recognition rule decides whether a node's flattened text names a metric.
 * The label node of a metric is the first candidate element, in document
 * order, whose text satisfies the rule. Outer elements come before the
 * elements they contain.
 */

import { KNOWN_METRICS, type MetricCategory } from '@statline/metric-catalog'
import type { DocumentTree } from '../types.js'

/** Elements that may carry a metric label */
export const LABEL_TAGS: ReadonlySet<string> = new Set(['div', 'span', 'p', 'td', 'th'])

export interface RecognitionRule {
  readonly metricName: string
  matches(text: string): boolean
}

/**
 * Build a rule from a pattern. The pattern is copied case-insensitive and
 * without global/sticky flags so that matching keeps no state between calls.
 */
export function createRecognitionRule(metricName: string, pattern: RegExp): RecognitionRule {
  const flags = pattern.flags.replace(/[gy]/g, '')
  const regex = new RegExp(pattern.source, flags.includes('i') ? flags : `${flags}i`)

  return {
    metricName,
    matches: (text: string) => regex.test(text),
  }
}

export function findLabelNode<TNode>(tree: DocumentTree<TNode>, rule: RecognitionRule): TNode | null {
  return tree.findFirst(node => {
    if (!LABEL_TAGS.has(tree.tagName(node))) return false
    const text = tree.text(node)
    return text.length > 0 && rule.matches(text)
  })
}

/**
 * The fixed set of metric categories evaluated during auto discovery.
 */
export class LabelMatcher {
  private readonly rulesByName: Map<string, RecognitionRule>

  constructor(rules: Iterable<RecognitionRule>) {
    this.rulesByName = new Map()
    for (const rule of rules) {
      this.rulesByName.set(rule.metricName, rule)
    }
  }

  static fromCatalog(catalog: readonly MetricCategory[] = KNOWN_METRICS): LabelMatcher {
    return new LabelMatcher(catalog.map(category => createRecognitionRule(category.name, category.pattern)))
  }

  rules(): RecognitionRule[] {
    return Array.from(this.rulesByName.values())
  }

  rule(metricName: string): RecognitionRule | undefined {
    return this.rulesByName.get(metricName)
  }

  /**
   * Metric names whose rule accepts the text, in catalog order.
   */
  classify(text: string): string[] {
    return this.rules()
      .filter(rule => rule.matches(text))
      .map(rule => rule.metricName)
  }

  /**
   * Label node of every category present on the page.
   * Categories without a label node are left out.
   */
  findLabels<TNode>(tree: DocumentTree<TNode>): Map<string, TNode> {
    const labels = new Map<string, TNode>()
    for (const rule of this.rules()) {
      const node = findLabelNode(tree, rule)
      if (node !== null) {
        labels.set(rule.metricName, node)
      }
    }
    return labels
  }
}
