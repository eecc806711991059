const LETTERS_AND_DIGITS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789'
const SPECIAL_CHARACTERS = '!@#$%^&*()-_=+[]{};:,.<>/?|~'

type ScrambleOptions = {
  /** Also scramble with punctuation (default: true) */
  includeSpecial?: boolean
  /** Source of randomness in [0, 1) (default: Math.random) */
  random?: () => number
}

/**
 * Lines that reveal `text` left to right: every character is shown scrambled
 * for `multiplier` lines before it settles. The last line is `text` itself;
 * spaces are never scrambled.
 */
function textScrambleEffectLines(
  text: string,
  multiplier: number,
  { includeSpecial = true, random = Math.random }: ScrambleOptions = {},
): string[] {
  const alphabet = includeSpecial ? LETTERS_AND_DIGITS + SPECIAL_CHARACTERS : LETTERS_AND_DIGITS
  const scramble = (chunk: string) =>
    Array.from(chunk, (char) => char === ' ' ? ' ' : alphabet[Math.floor(random() * alphabet.length)])
      .join('')

  const lines: string[] = []
  for (let settled = 0; settled < text.length; settled++) {
    for (let i = 0; i < multiplier; i++) {
      lines.push(text.slice(0, settled) + scramble(text.slice(settled)))
    }
  }
  lines.push(text)

  return lines
}

export { textScrambleEffectLines }
export type { ScrambleOptions }
