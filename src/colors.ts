import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import type { AnsiColorName, Color, ColorScheme, ColorSchemes, Palette, Rgb } from './types.ts'
import { parseColorSchemes } from './config.ts'

const DEFAULT_BG_HEX = '#0c0e0f'
const DEFAULT_FG_HEX = '#edeff0'
const DEFAULT_SCHEME = 'yoru'

const ANSI_COLOR_NAMES: AnsiColorName[] = [
  'black',
  'red',
  'green',
  'yellow',
  'blue',
  'magenta',
  'cyan',
  'white',
]

const builtinSchemesPath = fileURLToPath(new URL('./schemes.json', import.meta.url))
let builtinSchemesCache: ColorSchemes | null = null

/** Color schemes that ship with the terminal canvas */
function builtinSchemes(): ColorSchemes {
  if (!builtinSchemesCache) {
    const raw: unknown = JSON.parse(readFileSync(builtinSchemesPath, 'utf8'))
    builtinSchemesCache = parseColorSchemes(raw, builtinSchemesPath)
  }
  return builtinSchemesCache
}

function hexToRgb(hex: string): Rgb {
  const match = /^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(hex.trim())
  if (!match) throw new Error(`Invalid hex color: ${hex}`)
  return [
    Number.parseInt(match[1], 16),
    Number.parseInt(match[2], 16),
    Number.parseInt(match[3], 16),
  ]
}

function rgbToHex([r, g, b]: Rgb): string {
  return `#${[r, g, b].map((channel) => channel.toString(16).padStart(2, '0')).join('')}`
}

// A scheme named in the local table wins outright, even when that entry is incomplete
function lookupScheme(
  schemeName: string,
  localSchemes: ColorSchemes,
  builtin: ColorSchemes,
): ColorScheme | undefined {
  return Object.hasOwn(localSchemes, schemeName)
    ? localSchemes[schemeName]
    : Object.hasOwn(builtin, schemeName)
    ? builtin[schemeName]
    : undefined
}

/**
 * Background color of a scheme: the local table first, then the built-in
 * schemes, then #0c0e0f. Never throws for validated tables.
 */
function resolveBackground(
  schemeName: string,
  localSchemes: ColorSchemes,
  builtin: ColorSchemes = builtinSchemes(),
): Rgb {
  const scheme = lookupScheme(schemeName, localSchemes, builtin)
  return hexToRgb(scheme?.default_colors?.bg ?? DEFAULT_BG_HEX)
}

/**
 * Resolves every color of a scheme with the same precedence as the background.
 * Colors the scheme leaves out come from the built-in default scheme.
 */
function resolveScheme(
  schemeName: string,
  localSchemes: ColorSchemes,
  builtin: ColorSchemes = builtinSchemes(),
): Palette {
  const scheme = lookupScheme(schemeName, localSchemes, builtin) ?? {}
  const base: ColorScheme = builtin[DEFAULT_SCHEME] ?? {}
  const fgHex = scheme.default_colors?.fg ?? base.default_colors?.fg ?? DEFAULT_FG_HEX

  const pick = (group: 'normal_colors' | 'bright_colors', name: AnsiColorName): Rgb =>
    hexToRgb(scheme[group]?.[name] ?? base[group]?.[name] ?? fgHex)

  return {
    fg: hexToRgb(fgHex),
    bg: resolveBackground(schemeName, localSchemes, builtin),
    normal: ANSI_COLOR_NAMES.map((name) => pick('normal_colors', name)),
    bright: ANSI_COLOR_NAMES.map((name) => pick('bright_colors', name)),
  }
}

function colorToRgb(color: Color, palette: Palette, role: 'fg' | 'bg'): Rgb {
  if (color === 'default') return palette[role]
  if (typeof color === 'number') {
    return color < 8 ? palette.normal[color] : palette.bright[color - 8]
  }
  return color
}

export {
  builtinSchemes,
  colorToRgb,
  hexToRgb,
  resolveBackground,
  resolveScheme,
  rgbToHex,
}
