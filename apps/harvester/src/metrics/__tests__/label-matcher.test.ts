import { describe, it, expect } from 'vitest'
import { KNOWN_METRICS } from '@statline/metric-catalog'
import { createRecognitionRule, findLabelNode, LabelMatcher } from '../matching/label-matcher.js'
import { tree } from './helpers.js'

describe('createRecognitionRule', () => {
  it('matches case-insensitively', () => {
    const rule = createRecognitionRule('Ball possession', /Ball Possession/)
    expect(rule.matches('BALL POSSESSION')).toBe(true)
  })

  it('keeps no state between calls for global patterns', () => {
    const rule = createRecognitionRule('Goals', /^goals$/g)
    expect(rule.matches('Goals')).toBe(true)
    expect(rule.matches('Goals')).toBe(true)
  })
})

describe('findLabelNode', () => {
  const rule = createRecognitionRule('Ball possession', /ball possession/i)

  it('only considers div, span, p, td and th elements', () => {
    const doc = tree('<ul><li>Ball possession</li></ul><p id="label">Ball possession</p>')
    expect(findLabelNode(doc, rule)?.attribs.id).toBe('label')
  })

  it('returns null when no candidate matches', () => {
    expect(findLabelNode(tree('<p>Corners</p>'), rule)).toBeNull()
  })
})

describe('LabelMatcher', () => {
  const matcher = LabelMatcher.fromCatalog()

  it('holds one rule per catalog category, in catalog order', () => {
    expect(matcher.rules().map(rule => rule.metricName)).toEqual(KNOWN_METRICS.map(metric => metric.name))
    expect(matcher.rule('Clean sheets')?.matches('Clean sheet')).toBe(true)
    expect(matcher.rule('Corners')).toBeUndefined()
  })

  it('classifies label text', () => {
    expect(matcher.classify('Avg. goals')).toEqual(['Average goals'])
    expect(matcher.classify('Goals per match')).toEqual(['Average goals'])
    expect(matcher.classify('goals')).toEqual(['Goals'])
    expect(matcher.classify('Shots on target')).toEqual(['Shots on target'])
    expect(matcher.classify('Corners')).toEqual([])
  })

  it('finds the label node of every category present', () => {
    const doc = tree('<table><tr><td>Ball possession</td><td>52%</td></tr><tr><td>Goals</td><td>40</td></tr></table>')
    const labels = matcher.findLabels(doc)

    expect(Array.from(labels.keys())).toEqual(['Ball possession', 'Goals'])
    const goals = labels.get('Goals')
    expect(goals && doc.text(goals)).toBe('Goals')
  })
})
