import type { Color, Rgb, TextStyle } from './types.ts'

type StyledRun = { text: string; style: TextStyle }

const DEFAULT_STYLE: TextStyle = { fg: 'default', bg: 'default', bold: false }

const ESCAPE_PATTERN = /\x1b\[([0-9;]*)([A-Za-z])/g

const CUBE_LEVELS = [0, 95, 135, 175, 215, 255]

// Maps an xterm 256-color index; indexes below 16 stay palette colors
function xterm256(index: number): Color {
  if (index < 16) return index
  if (index < 232) {
    const offset = index - 16
    const rgb: Rgb = [
      CUBE_LEVELS[Math.floor(offset / 36)],
      CUBE_LEVELS[Math.floor(offset / 6) % 6],
      CUBE_LEVELS[offset % 6],
    ]
    return rgb
  }
  const level = 8 + (index - 232) * 10
  return [level, level, level]
}

const isByte = (value: number | undefined): value is number =>
  value !== undefined && Number.isInteger(value) && value >= 0 && value <= 255

/**
 * Applies one SGR parameter list to a style.
 * Unknown parameters are ignored.
 */
function applySgr(style: TextStyle, params: number[]): TextStyle {
  let next = { ...style }
  const codes = params.length ? params : [0]

  for (let i = 0; i < codes.length; i++) {
    const code = codes[i]

    if (code === 0) next = { ...DEFAULT_STYLE }
    else if (code === 1) next.bold = true
    else if (code === 22) next.bold = false
    else if (code >= 30 && code <= 37) next.fg = code - 30
    else if (code === 39) next.fg = 'default'
    else if (code >= 40 && code <= 47) next.bg = code - 40
    else if (code === 49) next.bg = 'default'
    else if (code >= 90 && code <= 97) next.fg = code - 90 + 8
    else if (code >= 100 && code <= 107) next.bg = code - 100 + 8
    else if (code === 38 || code === 48) {
      const target = code === 38 ? 'fg' : 'bg'
      const mode = codes[i + 1]

      if (mode === 5 && isByte(codes[i + 2])) {
        next[target] = xterm256(codes[i + 2])
        i += 2
      } else if (mode === 2 && isByte(codes[i + 2]) && isByte(codes[i + 3]) && isByte(codes[i + 4])) {
        next[target] = [codes[i + 2], codes[i + 3], codes[i + 4]]
        i += 4
      }
    }
  }

  return next
}

/**
 * Splits text on ANSI escape sequences into runs of equally styled text.
 * Only SGR sequences (ending in `m`) change the style; other sequences are
 * dropped. The returned style is the one in effect after the text, so it can
 * be fed into the next call.
 */
function parseAnsi(text: string, style: TextStyle = DEFAULT_STYLE): { runs: StyledRun[]; style: TextStyle } {
  const runs: StyledRun[] = []
  let current = style
  let lastIndex = 0

  for (const match of text.matchAll(ESCAPE_PATTERN)) {
    const index = match.index ?? 0
    if (index > lastIndex) runs.push({ text: text.slice(lastIndex, index), style: current })

    if (match[2] === 'm') {
      const params = match[1] === '' ? [] : match[1].split(';').map((part) => Number.parseInt(part || '0', 10))
      current = applySgr(current, params)
    }

    lastIndex = index + match[0].length
  }

  if (lastIndex < text.length) runs.push({ text: text.slice(lastIndex), style: current })

  return { runs, style: current }
}

/**
 * Splits text into typing units: each visible character together with the
 * escape sequences right before it. Trailing escape sequences form a last unit
 * with no visible character.
 */
function splitTypingUnits(text: string): string[] {
  const units: string[] = []
  let pending = ''
  let lastIndex = 0

  const pushCharacters = (chunk: string) => {
    for (const char of chunk) {
      units.push(pending + char)
      pending = ''
    }
  }

  for (const match of text.matchAll(ESCAPE_PATTERN)) {
    const index = match.index ?? 0
    pushCharacters(text.slice(lastIndex, index))
    pending += match[0]
    lastIndex = index + match[0].length
  }

  pushCharacters(text.slice(lastIndex))
  if (pending) units.push(pending)

  return units
}

/** Text with every escape sequence removed */
function stripAnsi(text: string): string {
  return text.replace(ESCAPE_PATTERN, '')
}

export { applySgr, DEFAULT_STYLE, parseAnsi, splitTypingUnits, stripAnsi, xterm256 }
export type { StyledRun }
