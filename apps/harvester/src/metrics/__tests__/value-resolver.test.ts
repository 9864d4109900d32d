import { describe, it, expect } from 'vitest'
import { resolveValue } from '../matching/value-resolver.js'
import { tree } from './helpers.js'

function resolveAt(html: string) {
  const doc = tree(html)
  const label = doc.selectFirst('.label')
  if (!label) throw new Error('fixture has no .label')
  return resolveValue(doc, label)
}

describe('resolveValue', () => {
  it('prefers the next sibling over the parent sibling', () => {
    const resolved = resolveAt(
      '<div><div><span class="label">Ball possession</span><span>61%</span></div><div>55%</div></div>'
    )
    expect(resolved).toEqual({ text: '61%', strategy: 'sibling' })
  })

  it('joins a value split over inline elements without spaces', () => {
    const cell = resolveAt(
      '<table><tr><th class="label">Avg. goals</th><td><b>1</b><b>.85</b></td></tr></table>'
    )
    expect(cell).toEqual({ text: '1.85', strategy: 'sibling' })

    const block = resolveAt(
      '<div><div><span class="label">Ball possession</span></div><div>57<small>%</small></div></div>'
    )
    expect(block).toEqual({ text: '57%', strategy: 'parent-sibling' })
  })

  it('falls back to the next sibling of the parent', () => {
    const resolved = resolveAt('<div><div><span class="label">Ball possession</span></div><div>55%</div></div>')
    expect(resolved).toEqual({ text: '55%', strategy: 'parent-sibling' })
  })

  it('skips a sibling without text', () => {
    const resolved = resolveAt('<div><span class="label">Goals</span><span></span></div><div>12</div>')
    expect(resolved).toEqual({ text: '12', strategy: 'parent-sibling' })
  })

  it('scrapes a number out of the label text', () => {
    expect(resolveAt('<div><p class="label">Clean sheets 9</p></div>')).toEqual({
      text: '9',
      strategy: 'numeric-token',
    })
    expect(resolveAt('<div><span class="label">Possession 48.5% overall</span></div>')).toEqual({
      text: '48.5%',
      strategy: 'numeric-token',
    })
  })

  it('returns null when nothing resolves', () => {
    expect(resolveAt('<div><span class="label">Ball possession</span></div>')).toBeNull()
  })
})
