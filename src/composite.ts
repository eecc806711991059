import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, join } from 'node:path'
import sharp from 'sharp'
import type { Rgb } from './types.ts'

const TEMP_PREFIX = 'termboot-'

/**
 * Flattens an image with transparency onto an opaque background, since the
 * frame rasterizer does not keep alpha in pasted images.
 *
 * The result is written to a new temporary directory. Callers own it and must
 * hand it to {@link releaseCompositedImage}; prefer {@link withCompositedImage}.
 *
 * @returns path of the opaque PNG
 */
async function compositeOnBackground(imagePath: string, [r, g, b]: Rgb): Promise<string> {
  const tempDir = await mkdtemp(join(tmpdir(), TEMP_PREFIX))
  const outputPath = join(tempDir, 'composited.png')

  try {
    await sharp(imagePath)
      .ensureAlpha()
      .flatten({ background: { r, g, b } })
      .png()
      .toFile(outputPath)
  } catch (error) {
    await rm(tempDir, { recursive: true, force: true })
    throw error
  }

  return outputPath
}

async function releaseCompositedImage(compositedPath: string): Promise<void> {
  await rm(dirname(compositedPath), { recursive: true, force: true })
}

/**
 * Runs `use` with a composited copy of the image and removes the copy
 * afterwards, whether `use` returns or throws.
 */
async function withCompositedImage<T>(
  imagePath: string,
  rgb: Rgb,
  use: (compositedPath: string) => Promise<T>,
): Promise<T> {
  const compositedPath = await compositeOnBackground(imagePath, rgb)
  try {
    return await use(compositedPath)
  } finally {
    await releaseCompositedImage(compositedPath)
  }
}

export { compositeOnBackground, releaseCompositedImage, withCompositedImage }
