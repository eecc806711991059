import { afterEach, beforeEach, describe, it } from 'node:test'
import assert from 'node:assert/strict'
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { basename, dirname, join } from 'node:path'
import { pathExists } from 'fs-extra/esm'
import { GifReader } from 'omggif'
import sharp from 'sharp'
import { FfmpegError } from '../src/errors.ts'
import { encodeGifFromFrames, exportGif, frameDurationMs, type GifJob, renderGifWithFfmpeg } from '../src/gif.ts'

const SIZE = 8

// Frame k is a solid color with a red channel of k * 20
async function writeFrames(dir: string, count: number, baseName = 'frame_'): Promise<void> {
  await mkdir(dir, { recursive: true })
  for (let k = 0; k < count; k++) {
    await sharp({ create: { width: SIZE, height: SIZE, channels: 4, background: { r: k * 20, g: 40, b: 80, alpha: 1 } } })
      .png()
      .toFile(join(dir, `${baseName}${k}.png`))
  }
}

// Stand-in for ffmpeg: logs its arguments one pass per line, writes the file named
// last, and fails the paletteuse pass when asked to
function fakeFfmpeg(logPath: string, failPaletteuse: boolean): string {
  return [
    '#!/bin/sh',
    `printf '%s\\t' "$@" >> '${logPath}'`,
    `printf '\\n' >> '${logPath}'`,
    'for last in "$@"; do :; done',
    'case "$*" in',
    '  *palettegen*) : > "$last"; exit 0 ;;',
    'esac',
    ...(failPaletteuse ? ['echo "invalid palette" >&2', 'exit 1'] : ['printf GIF89a > "$last"']),
    '',
  ].join('\n')
}

function redOfFrame(reader: GifReader, index: number): number {
  const pixels = new Uint8Array(SIZE * SIZE * 4)
  reader.decodeAndBlitFrameRGBA(index, pixels)
  return pixels[0]
}

describe('GIF encoding', () => {
  let dir: string
  let framesDir: string
  let outputPath: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'termboot-gif-'))
    framesDir = join(dir, 'frames')
    outputPath = join(dir, 'output.gif')
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  describe('frameDurationMs', () => {
    it('rounds the frame duration to whole milliseconds', () => {
      assert.equal(frameDurationMs(15), 67)
      assert.equal(frameDurationMs(10), 100)
    })
  })

  describe('encodeGifFromFrames', () => {
    it('encodes every frame in natural order with a fixed delay and an infinite loop', async () => {
      await writeFrames(framesDir, 11)

      const result = await encodeGifFromFrames(framesDir, outputPath, 15)

      assert.deepEqual(result, {
        status: 'encoded',
        outputPath,
        frameCount: 11,
        frameDurationMs: 67,
        bytes: (await readFile(outputPath)).length,
      })

      const reader = new GifReader(await readFile(outputPath))
      assert.equal(reader.numFrames(), 11)
      assert.equal(reader.width, SIZE)
      assert.equal(reader.height, SIZE)
      assert.equal(reader.loopCount(), 0)

      for (let k = 0; k < 11; k++) {
        // GIF delays are stored in centiseconds
        assert.equal(reader.frameInfo(k).delay, 7)
        assert.ok(Math.abs(redOfFrame(reader, k) - k * 20) <= 8, `frame ${k} out of order`)
      }
    })

    it('reports no-frames for an empty directory and writes nothing', async () => {
      await mkdir(framesDir)

      assert.deepEqual(await encodeGifFromFrames(framesDir, outputPath, 15), { status: 'no-frames' })
      assert.equal(await pathExists(outputPath), false)
    })

    it('treats a missing directory as empty', async () => {
      assert.deepEqual(await encodeGifFromFrames(join(dir, 'missing'), outputPath, 15), { status: 'no-frames' })
    })

    it('ignores files that are not PNG', async () => {
      await writeFrames(framesDir, 2)
      await writeFile(join(framesDir, 'notes.txt'), 'not a frame')

      const result = await encodeGifFromFrames(framesDir, outputPath, 15)
      assert.equal(result.status === 'encoded' ? result.frameCount : 0, 2)
    })

    it('writes nothing when a frame cannot be decoded', async () => {
      await writeFrames(framesDir, 2)
      await writeFile(join(framesDir, 'frame_2.png'), 'corrupt')

      await assert.rejects(encodeGifFromFrames(framesDir, outputPath, 15))
      assert.equal(await pathExists(outputPath), false)
    })
  })

  describe('exportGif', () => {
    const job = (): GifJob => ({ framesDir, frameBaseName: 'frame_', outputPath, fps: 15 })

    it('keeps the primary output when it is large enough', async () => {
      await writeFrames(framesDir, 2)

      const outcome = await exportGif(job(), async ({ outputPath }) => {
        await writeFile(outputPath, Buffer.alloc(10_001))
      })

      assert.deepEqual(outcome, { encoder: 'primary', outputPath, bytes: 10_001 })
    })

    it('falls back when the primary output is too small', async () => {
      await writeFrames(framesDir, 3)

      const outcome = await exportGif(job(), async ({ outputPath }) => {
        await writeFile(outputPath, Buffer.alloc(10_000))
      })

      assert.equal(outcome.encoder, 'fallback')
      assert.equal(outcome.encoder === 'fallback' ? outcome.frameCount : 0, 3)
      assert.equal((await readFile(outputPath)).subarray(0, 6).toString('ascii'), 'GIF89a')
    })

    it('falls back when the primary encoder fails', async () => {
      await writeFrames(framesDir, 3)

      const outcome = await exportGif(job(), async () => {
        throw new Error('ffmpeg: not found')
      })

      assert.equal(outcome.encoder, 'fallback')
      assert.equal(new GifReader(await readFile(outputPath)).numFrames(), 3)
    })

    it('falls back when the primary encoder writes nothing', async () => {
      await writeFrames(framesDir, 1)

      const outcome = await exportGif(job(), async () => {})

      assert.equal(outcome.encoder, 'fallback')
    })

    it('reports no-frames and removes partial primary output', async () => {
      await mkdir(framesDir)

      const outcome = await exportGif(job(), async ({ outputPath }) => {
        await writeFile(outputPath, 'partial')
        throw new Error('ffmpeg: no input')
      })

      assert.deepEqual(outcome, { encoder: 'none', reason: 'no-frames', outputPath })
      assert.equal(await pathExists(outputPath), false)
    })
  })

  describe('renderGifWithFfmpeg', () => {
    let binDir: string
    let logPath: string
    let originalPath: string | undefined

    const job = (): GifJob => ({ framesDir, frameBaseName: 'frame_', outputPath, fps: 15 })

    async function installFfmpeg(failPaletteuse: boolean): Promise<void> {
      await writeFile(join(binDir, 'ffmpeg'), fakeFfmpeg(logPath, failPaletteuse), { mode: 0o755 })
    }

    async function loggedPasses(): Promise<string[][]> {
      const log = await readFile(logPath, 'utf8')
      return log.trimEnd().split('\n').map((line) => line.split('\t').slice(0, -1))
    }

    beforeEach(async () => {
      binDir = join(dir, 'bin')
      logPath = join(dir, 'ffmpeg.log')
      await mkdir(binDir)
      originalPath = process.env.PATH
      process.env.PATH = `${binDir}:${originalPath ?? ''}`
    })

    afterEach(() => {
      if (originalPath === undefined) delete process.env.PATH
      else process.env.PATH = originalPath
    })

    it('runs palettegen then paletteuse over the numbered frames from index 0', async () => {
      await installFfmpeg(false)

      await renderGifWithFfmpeg(job())

      const [palettegen, paletteuse] = await loggedPasses()
      const palettePath = palettegen.at(-1) ?? ''
      const input = join(framesDir, 'frame_%d.png')

      assert.equal(basename(palettePath), 'palette.png')
      assert.ok(basename(dirname(palettePath)).startsWith('termboot-ffmpeg-'))
      assert.deepEqual(palettegen, [
        '-y',
        '-framerate',
        '15',
        '-start_number',
        '0',
        '-i',
        input,
        '-vf',
        'palettegen',
        palettePath,
      ])
      assert.deepEqual(paletteuse, [
        '-y',
        '-framerate',
        '15',
        '-start_number',
        '0',
        '-i',
        input,
        '-i',
        palettePath,
        '-loop',
        '0',
        '-lavfi',
        'paletteuse',
        outputPath,
      ])
      assert.equal(await readFile(outputPath, 'utf8'), 'GIF89a')
      assert.equal(await pathExists(dirname(palettePath)), false)
    })

    it('rejects with the failing pass and removes the palette', async () => {
      await installFfmpeg(true)

      await assert.rejects(renderGifWithFfmpeg(job()), (error) => {
        assert.ok(error instanceof FfmpegError)
        assert.equal(error.pass, 'paletteuse')
        assert.equal(error.code, 1)
        assert.equal(error.stderr, 'invalid palette\n')
        return true
      })

      const passes = await loggedPasses()
      assert.equal(passes.length, 2)
      const palettePath = passes[0].at(-1) ?? ''
      assert.ok(basename(dirname(palettePath)).startsWith('termboot-ffmpeg-'))
      assert.equal(await pathExists(dirname(palettePath)), false)
    })
  })
})
