import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import type { Palette, Rgb } from '../src/types.ts'
import {
  builtinSchemes,
  colorToRgb,
  hexToRgb,
  resolveBackground,
  resolveScheme,
  rgbToHex,
} from '../src/colors.ts'

describe('hex colors', () => {
  it('parses #RRGGBB into channels', () => {
    assert.deepEqual(hexToRgb('#0C0E0F'), [12, 14, 15])
    assert.deepEqual(hexToRgb('ff8000'), [255, 128, 0])
  })

  it('rejects anything but six hex digits', () => {
    assert.throws(() => hexToRgb('#fff'), /Invalid hex color: #fff/)
    assert.throws(() => hexToRgb('#gg0000'), /Invalid hex color/)
  })

  it('formats lowercase hex', () => {
    assert.equal(rgbToHex([12, 14, 15]), '#0c0e0f')
  })

  it('round-trips case-insensitively', () => {
    for (const hex of ['#DF5B61', '#edeff0', '#000000', '#FFFFFF']) {
      assert.equal(rgbToHex(hexToRgb(hex)), hex.toLowerCase())
    }
  })
})

describe('resolveBackground', () => {
  it('uses the built-in scheme when the local table does not name it', () => {
    assert.deepEqual(resolveBackground('dracula', {}), [40, 42, 54])
  })

  it('prefers the local scheme over the built-in one', () => {
    const local = { dracula: { default_colors: { bg: '#000001' } } }
    assert.deepEqual(resolveBackground('dracula', local), [0, 0, 1])
  })

  it('falls back to the default when the local scheme has no background', () => {
    const local = { dracula: { default_colors: { fg: '#ffffff' } } }
    assert.deepEqual(resolveBackground('dracula', local), [12, 14, 15])
  })

  it('resolves an unknown scheme to the default background', () => {
    assert.deepEqual(resolveBackground('no-such-scheme', {}), [12, 14, 15])
    assert.deepEqual(resolveBackground('no-such-scheme', {}, {}), [12, 14, 15])
  })
})

describe('resolveScheme', () => {
  it('fills colors missing from a scheme with the built-in default scheme', () => {
    const palette = resolveScheme('custom', { custom: { normal_colors: { red: '#ff0000' } } })

    assert.deepEqual(palette.fg, [237, 239, 240])
    assert.deepEqual(palette.bg, [12, 14, 15])
    assert.deepEqual(palette.normal[1], [255, 0, 0])
    assert.deepEqual(palette.normal[2], [120, 184, 146])
    assert.equal(palette.normal.length, 8)
    assert.equal(palette.bright.length, 8)
  })

  it('ships the default scheme', () => {
    assert.ok(Object.hasOwn(builtinSchemes(), 'yoru'))
  })
})

describe('colorToRgb', () => {
  const palette: Palette = {
    fg: [1, 1, 1],
    bg: [2, 2, 2],
    normal: Array.from({ length: 8 }, (_, i): Rgb => [10 + i, 0, 0]),
    bright: Array.from({ length: 8 }, (_, i): Rgb => [20 + i, 0, 0]),
  }

  it('maps the default color by role', () => {
    assert.deepEqual(colorToRgb('default', palette, 'fg'), [1, 1, 1])
    assert.deepEqual(colorToRgb('default', palette, 'bg'), [2, 2, 2])
  })

  it('maps indexes 0..7 to normal and 8..15 to bright colors', () => {
    assert.deepEqual(colorToRgb(3, palette, 'fg'), [13, 0, 0])
    assert.deepEqual(colorToRgb(9, palette, 'fg'), [21, 0, 0])
  })

  it('passes true colors through', () => {
    assert.deepEqual(colorToRgb([7, 8, 9], palette, 'bg'), [7, 8, 9])
  })
})
