import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import { textScrambleEffectLines } from '../src/effects.ts'

describe('textScrambleEffectLines', () => {
  it('produces multiplier lines per character plus the final text', () => {
    const lines = textScrambleEffectLines('RETRO', 3)
    assert.equal(lines.length, 16)
    assert.equal(lines.at(-1), 'RETRO')
  })

  it('settles characters left to right', () => {
    const lines = textScrambleEffectLines('AB', 2, { includeSpecial: false, random: () => 0 })
    // random() === 0 always picks the first letter of the alphabet
    assert.deepEqual(lines, ['AA', 'AA', 'AA', 'AA', 'AB'])
  })

  it('settles one more character every multiplier lines', () => {
    // 0.99 picks '9', the last letter-or-digit
    const lines = textScrambleEffectLines('RETRO', 2, { includeSpecial: false, random: () => 0.99 })

    assert.equal(lines.length, 11)
    assert.deepEqual(lines.slice(0, 4), ['99999', '99999', 'R9999', 'R9999'])
    lines.forEach((line, k) => {
      const settled = Math.floor(k / 2)
      assert.equal(line, 'RETRO'.slice(0, settled) + '9'.repeat(5 - settled))
    })
  })

  it('never scrambles spaces', () => {
    const lines = textScrambleEffectLines('A B', 1, { random: () => 0.5 })
    for (const line of lines) assert.equal(line[1], ' ')
    assert.equal(lines.length, 4)
  })

  it('keeps every line as long as the text', () => {
    for (const line of textScrambleEffectLines('RETRO OS', 3)) assert.equal(line.length, 8)
  })

  it('uses only letters and digits without special characters', () => {
    const lines = textScrambleEffectLines('LOGO', 5, { includeSpecial: false })
    for (const line of lines) assert.match(line, /^[A-Za-z0-9]{4}$/)
  })

  it('returns only the text for a multiplier of zero', () => {
    assert.deepEqual(textScrambleEffectLines('OS', 0), ['OS'])
  })
})
