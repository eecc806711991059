import { Resvg } from '@resvg/resvg-js'
import type { Color, Font, Frame, PaintOp, Palette } from './types.ts'
import { colorToRgb, rgbToHex } from './colors.ts'

// Advance of one monospace cell relative to the font size
const CELL_WIDTH_RATIO = 0.6
// Distance from the top of a row to the text baseline relative to the font size
const BASELINE_RATIO = 0.8

type CanvasGeometry = {
  width: number
  height: number
  xPad: number
  yPad: number
  palette: Palette
}

type RasterFonts = {
  /** Font files to load; system fonts are used when empty */
  fontFiles: string[]
  defaultFontFamily: string
}

const cellWidth = (font: Font): number => Math.max(1, Math.round(font.size * CELL_WIDTH_RATIO))
const lineHeight = (font: Font): number => font.size + font.lineSpacing

const XML_ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
}

function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => XML_ENTITIES[char] ?? char)
}

function renderText(
  x: number,
  y: number,
  text: string,
  font: Font,
  fill: string,
  bold: boolean,
): string {
  const weight = bold ? ' font-weight="bold"' : ''
  return `<text x="${x}" y="${y + Math.round(font.size * BASELINE_RATIO)}" font-family="${
    escapeXml(font.family)
  }" font-size="${font.size}" fill="${fill}"${weight} xml:space="preserve">${escapeXml(text)}</text>`
}

function renderOp(op: PaintOp, palette: Palette): string {
  const hex = (color: Color, role: 'fg' | 'bg') => rgbToHex(colorToRgb(color, palette, role))

  switch (op.kind) {
    case 'rect':
      return `<rect x="${op.x}" y="${op.y}" width="${op.width}" height="${op.height}" fill="${
        hex(op.fill, 'bg')
      }"/>`
    case 'text':
      return renderText(op.x, op.y, op.text, op.font, hex(op.style.fg, 'fg'), op.style.bold)
    case 'image':
      return `<image x="${op.x}" y="${op.y}" width="${op.width}" height="${op.height}" href="${op.href}"/>`
  }
}

/** Builds a standalone SVG document for one frame */
function frameToSvg(frame: Frame, geometry: CanvasGeometry): string {
  const { width, height, xPad, yPad, palette } = geometry
  const cursor = frame.cursor
    ? renderText(
      frame.cursor.x,
      frame.cursor.y,
      frame.cursor.glyph,
      frame.cursor.font,
      rgbToHex(colorToRgb(frame.cursor.style.fg, palette, 'fg')),
      frame.cursor.style.bold,
    )
    : ''

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `<defs><clipPath id="screen"><rect x="${xPad}" y="${yPad}" width="${width - 2 * xPad}" height="${
      height - 2 * yPad
    }"/></clipPath></defs>`,
    `<rect width="${width}" height="${height}" fill="${rgbToHex(palette.bg)}"/>`,
    '<g clip-path="url(#screen)">',
    ...frame.ops.map((op) => renderOp(op, palette)),
    cursor,
    '</g>',
    '</svg>',
  ].join('\n')
}

/** Rasterizes an SVG document to PNG bytes */
function renderFramePng(svg: string, fonts: RasterFonts): Buffer {
  const resvg = new Resvg(svg, {
    font: {
      fontFiles: fonts.fontFiles,
      loadSystemFonts: fonts.fontFiles.length === 0,
      defaultFontFamily: fonts.defaultFontFamily,
    },
  })
  return resvg.render().asPng()
}

export { cellWidth, escapeXml, frameToSvg, lineHeight, renderFramePng }
export type { CanvasGeometry, RasterFonts }
