/**
 * @module terminal
 *
 * A stateful terminal canvas for scripting boot-sequence style animations.
 * Text is written at 1-based row and column positions on a character grid
 * whose size follows the current font, ANSI SGR sequences style it, and every
 * call records zero or more frames. Recorded frames are rendered to numbered
 * PNG files for a GIF encoder.
 *
 * @example
 * ```ts
 * const terminal = new Terminal({ width: 750, height: 500, xPad: 15, yPad: 15, font, palette })
 * terminal.genText('Memory Test: 131072K OK', 7, 1, { count: 10 })
 * terminal.genTypingText('\x1b[92mclear', 8)
 * await terminal.writeFrames('./frames')
 * ```
 */
import { writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { emptyDir } from 'fs-extra/esm'
import sharp from 'sharp'
import type { CursorMark, Font, Frame, PaintOp, Palette, TextStyle } from './types.ts'
import { DEFAULT_STYLE, parseAnsi, splitTypingUnits, stripAnsi } from './ansi.ts'
import { cellWidth, frameToSvg, lineHeight, renderFramePng } from './render.ts'
import TIMINGS from './timings.ts'

type TerminalOptions = {
  /** Canvas width in pixels */
  width: number
  /** Canvas height in pixels */
  height: number
  /** Horizontal padding in pixels on each side */
  xPad: number
  /** Vertical padding in pixels on each side */
  yPad: number
  font: Font
  palette: Palette
  /** Cursor glyph (default: _) */
  cursor?: string
  showCursor?: boolean
  blinkCursor?: boolean
  prompt?: string
  /** Frame files are named <frameBaseName><index>.png (default: frame_) */
  frameBaseName?: string
  /** Font files handed to the rasterizer */
  fontFiles?: string[]
}

type TextOptions = {
  /** Frames to record after writing (default: 1) */
  count?: number
  /** Continue at the current column instead of the given one */
  contin?: boolean
}

class Terminal {
  private ops: PaintOp[] = []
  private recorded: Frame[] = []
  private font: Font
  private style: TextStyle = DEFAULT_STYLE
  private prompt: string
  private cursorGlyph: string
  private showCursor: boolean
  private blinkCursor: boolean
  private row = 1
  private col = 1

  constructor(private readonly options: TerminalOptions) {
    this.font = options.font
    this.prompt = options.prompt ?? '> '
    this.cursorGlyph = options.cursor ?? '_'
    this.showCursor = options.showCursor ?? true
    this.blinkCursor = options.blinkCursor ?? true
  }

  get numRows(): number {
    return Math.max(1, Math.floor((this.options.height - 2 * this.options.yPad) / lineHeight(this.font)))
  }

  get numCols(): number {
    return Math.max(1, Math.floor((this.options.width - 2 * this.options.xPad) / cellWidth(this.font)))
  }

  /** Row of the cursor, 1-based */
  get currRow(): number {
    return this.row
  }

  /** Column the next character goes to, 1-based */
  get currCol(): number {
    return this.col
  }

  get frames(): readonly Frame[] {
    return this.recorded
  }

  setFont(font: Font): void {
    this.font = font
  }

  setPrompt(prompt: string): void {
    this.prompt = prompt
  }

  toggleShowCursor(show: boolean): void {
    this.showCursor = show
  }

  toggleBlinkCursor(blink: boolean): void {
    this.blinkCursor = blink
  }

  /**
   * Writes text starting at a cell, then records `count` frames.
   * A newline continues on the next row at `col`; rows past the bottom scroll
   * the canvas up.
   */
  genText(text: string, row: number, col = 1, { count = 1, contin = false }: TextOptions = {}): void {
    if (!contin) this.col = Math.max(1, col)
    this.row = this.fitRow(row)

    text.split('\n').forEach((line, index) => {
      if (index > 0) {
        this.row = this.fitRow(this.row + 1)
        this.col = Math.max(1, col)
      }
      this.writeLine(line)
    })

    this.record(count)
  }

  /** Writes text one character per frame */
  genTypingText(text: string, row: number, col = 1, { contin = false }: Pick<TextOptions, 'contin'> = {}): void {
    if (!contin) this.col = Math.max(1, col)
    this.row = this.fitRow(row)

    for (const unit of splitTypingUnits(text)) {
      this.genText(unit, this.row, col, { contin: true, count: stripAnsi(unit) ? 1 : 0 })
    }
  }

  genPrompt(row: number, col = 1, { count = 1 }: Pick<TextOptions, 'count'> = {}): void {
    this.genText(this.prompt, row, col, { count })
  }

  /** Erases a row from `col` to the right edge and moves the cursor there */
  deleteRow(row: number, col = 1): void {
    this.row = this.fitRow(row)
    this.col = Math.max(1, col)

    const { x, y } = this.cellOrigin(this.row, this.col)
    const width = Math.max(0, this.options.width - this.options.xPad - x)
    const height = lineHeight(this.font)

    // Ops entirely under the erased area can never show again
    this.ops = this.ops.filter((op) => !(op.x >= x && op.y >= y && op.y + op.height <= y + height))
    this.ops.push({ kind: 'rect', x, y, width, height, fill: 'default' })
  }

  /** Erases the canvas and homes the cursor without recording a frame */
  clearFrame(): void {
    this.ops = []
    this.row = 1
    this.col = 1
  }

  /** Records the current canvas `count` more times */
  cloneFrame(count = 1): void {
    this.record(count)
  }

  /**
   * Places an image with its top-left corner at a cell, scaled by
   * `sizeMultiplier`, and records one frame. The image bytes are embedded, so
   * the file can be removed right after.
   */
  async pasteImage(imagePath: string, row: number, col: number, sizeMultiplier = 1): Promise<void> {
    const { width, height } = await sharp(imagePath).metadata()
    if (!width || !height) throw new Error(`Cannot read the size of ${imagePath}`)

    const scaledWidth = Math.max(1, Math.round(width * sizeMultiplier))
    const scaledHeight = Math.max(1, Math.round(height * sizeMultiplier))
    const png = await sharp(imagePath).resize(scaledWidth, scaledHeight).png().toBuffer()

    const { x, y } = this.cellOrigin(this.fitRow(row), Math.max(1, col))
    this.ops.push({
      kind: 'image',
      x,
      y,
      width: scaledWidth,
      height: scaledHeight,
      href: `data:image/png;base64,${png.toString('base64')}`,
    })
    this.record(1)
  }

  /**
   * Renders every recorded frame to `<dir>/<frameBaseName><index>.png`,
   * removing whatever the directory held before.
   *
   * @returns the number of frames written
   */
  async writeFrames(dir: string): Promise<number> {
    await emptyDir(dir)

    const baseName = this.options.frameBaseName ?? 'frame_'
    const geometry = {
      width: this.options.width,
      height: this.options.height,
      xPad: this.options.xPad,
      yPad: this.options.yPad,
      palette: this.options.palette,
    }
    const fonts = {
      fontFiles: this.options.fontFiles ?? [],
      defaultFontFamily: this.options.font.family,
    }

    let previousSvg = ''
    let previousPng: Buffer = Buffer.alloc(0)

    for (const [index, frame] of this.recorded.entries()) {
      const svg = frameToSvg(frame, geometry)
      // Held and cloned frames repeat the same document
      if (svg !== previousSvg) {
        previousPng = renderFramePng(svg, fonts)
        previousSvg = svg
      }
      await writeFile(join(dir, `${baseName}${index}.png`), previousPng)

      if ((index + 1) % TIMINGS.FRAME_PROGRESS_INTERVAL === 0) {
        console.log(`  Rendered ${index + 1}/${this.recorded.length} frames...`)
      }
    }

    return this.recorded.length
  }

  private cellOrigin(row: number, col: number): { x: number; y: number } {
    return {
      x: this.options.xPad + (col - 1) * cellWidth(this.font),
      y: this.options.yPad + (row - 1) * lineHeight(this.font),
    }
  }

  // Clamps a row into the grid, scrolling when it lies below the last row
  private fitRow(row: number): number {
    const target = Math.max(1, row)
    if (target <= this.numRows) return target

    this.scroll(target - this.numRows)
    return this.numRows
  }

  private scroll(lines: number): void {
    const offset = lines * lineHeight(this.font)
    this.ops = this.ops
      .map((op) => ({ ...op, y: op.y - offset }))
      .filter((op) => op.y + op.height > this.options.yPad)
  }

  private writeLine(line: string): void {
    const { runs, style } = parseAnsi(line, this.style)
    this.style = style

    for (const run of runs) {
      let remaining = run.text
      while (remaining.length > 0) {
        if (this.col > this.numCols) {
          this.row = this.fitRow(this.row + 1)
          this.col = 1
        }
        const chunk = remaining.slice(0, this.numCols - this.col + 1)
        this.paint(chunk, run.style)
        this.col += chunk.length
        remaining = remaining.slice(chunk.length)
      }
    }
  }

  private paint(text: string, style: TextStyle): void {
    const { x, y } = this.cellOrigin(this.row, this.col)
    const height = lineHeight(this.font)

    this.ops.push({ kind: 'rect', x, y, width: text.length * cellWidth(this.font), height, fill: style.bg })
    if (text.trim()) this.ops.push({ kind: 'text', x, y, height, text, style, font: this.font })
  }

  private cursorMark(): CursorMark | null {
    if (!this.showCursor) return null
    if (this.blinkCursor && Math.floor(this.recorded.length / TIMINGS.CURSOR_BLINK_FRAMES) % 2 === 1) {
      return null
    }

    const { x, y } = this.cellOrigin(this.row, Math.min(this.col, this.numCols))
    return { x, y, glyph: this.cursorGlyph, style: this.style, font: this.font }
  }

  private record(count: number): void {
    const ops = this.ops.slice()
    for (let i = 0; i < count; i++) {
      this.recorded.push({ ops, cursor: this.cursorMark() })
    }
  }
}

export { Terminal }
export type { TerminalOptions, TextOptions }
