/**
 * @module gif
 *
 * Turns a directory of numbered PNG frames into a looping GIF.
 *
 * The primary encoder shells out to ffmpeg (two passes: palettegen, then
 * paletteuse). ffmpeg can exit cleanly and still leave a truncated file, so
 * its output is only trusted above {@link TIMINGS.MIN_PRIMARY_GIF_BYTES};
 * anything else falls back to an in-process encoder built on gifenc.
 */
import { execFile } from 'node:child_process'
import { mkdtemp, readdir, rm, stat, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import gifenc from 'gifenc'
import sharp from 'sharp'
import { compareNatural } from './natural-sort.ts'
import { FfmpegError, formatError } from './errors.ts'
import TIMINGS from './timings.ts'

// gifenc is CommonJS with getter exports, so only its default export is visible to ESM
const { applyPalette, GIFEncoder, quantize } = gifenc

type GifJob = {
  /** Directory holding <frameBaseName><index>.png files */
  framesDir: string
  frameBaseName: string
  outputPath: string
  fps: number
}

type EncodeResult =
  | { status: 'no-frames' }
  | { status: 'encoded'; outputPath: string; frameCount: number; frameDurationMs: number; bytes: number }

/**
 * How the GIF was produced. `none` is the state where no frames existed: no
 * GIF is written, yet the README still references it.
 */
type ExportOutcome =
  | { encoder: 'primary'; outputPath: string; bytes: number }
  | { encoder: 'fallback'; outputPath: string; bytes: number; frameCount: number }
  | { encoder: 'none'; reason: 'no-frames'; outputPath: string }

type PrimaryEncoder = (job: GifJob) => Promise<void>

const frameDurationMs = (fps: number): number => Math.round(1000 / fps)

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT'

async function fileSize(path: string): Promise<number | null> {
  try {
    return (await stat(path)).size
  } catch (error) {
    if (isMissingFile(error)) return null
    throw error
  }
}

function runFfmpeg(pass: string, args: string[]): Promise<void> {
  return new Promise((resolve, reject) => {
    execFile('ffmpeg', args, { encoding: 'utf8', maxBuffer: 64 * 1024 * 1024 }, (error, _stdout, stderr) => {
      if (error) reject(new FfmpegError(pass, error.code ?? null, stderr))
      else resolve()
    })
  })
}

/** Encodes the frames with ffmpeg, generating an optimized palette first */
async function renderGifWithFfmpeg({ framesDir, frameBaseName, outputPath, fps }: GifJob): Promise<void> {
  const workDir = await mkdtemp(join(tmpdir(), 'termboot-ffmpeg-'))
  const palettePath = join(workDir, 'palette.png')
  const input = join(framesDir, `${frameBaseName}%d.png`)

  try {
    await runFfmpeg('palettegen', [
      '-y',
      '-framerate',
      `${fps}`,
      '-start_number',
      '0',
      '-i',
      input,
      '-vf',
      'palettegen',
      palettePath,
    ])

    await runFfmpeg('paletteuse', [
      '-y',
      '-framerate',
      `${fps}`,
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
  } finally {
    await rm(workDir, { recursive: true, force: true })
  }
}

async function listFrameFiles(framesDir: string): Promise<string[]> {
  try {
    return (await readdir(framesDir)).filter((name) => name.endsWith('.png'))
  } catch (error) {
    if (isMissingFile(error)) return []
    throw error
  }
}

/**
 * In-process encoder: loads every PNG in `framesDir` in natural order,
 * quantizes each to at most 256 colors and writes a GIF that loops forever
 * with a fixed frame duration. Nothing is written when a frame fails to load.
 */
async function encodeGifFromFrames(framesDir: string, outputPath: string, fps: number): Promise<EncodeResult> {
  const frameFiles = (await listFrameFiles(framesDir)).sort(compareNatural)

  if (!frameFiles.length) {
    console.log('No frames found!')
    return { status: 'no-frames' }
  }

  console.log(`Found ${frameFiles.length} frames, creating GIF at ${fps} FPS...`)

  const delay = frameDurationMs(fps)
  const encoder = GIFEncoder()

  for (const [index, filename] of frameFiles.entries()) {
    const { data, info } = await sharp(join(framesDir, filename))
      .ensureAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true })

    const palette = quantize(data, 256)
    encoder.writeFrame(applyPalette(data, palette), info.width, info.height, { palette, delay, repeat: 0 })

    if ((index + 1) % TIMINGS.FRAME_PROGRESS_INTERVAL === 0) {
      console.log(`  Loaded ${index + 1}/${frameFiles.length} frames...`)
    }
  }

  console.log('Saving GIF...')
  encoder.finish()
  const bytes = encoder.bytes()
  await writeFile(outputPath, bytes)

  console.log(`  Size: ${(bytes.length / (1024 * 1024)).toFixed(1)} MB`)

  return {
    status: 'encoded',
    outputPath,
    frameCount: frameFiles.length,
    frameDurationMs: delay,
    bytes: bytes.length,
  }
}

/**
 * Tries the primary encoder, validates what it wrote and falls back to
 * {@link encodeGifFromFrames} on any failure.
 */
async function exportGif(job: GifJob, primary: PrimaryEncoder = renderGifWithFfmpeg): Promise<ExportOutcome> {
  console.log('Generating GIF...')

  try {
    await primary(job)
    const bytes = await fileSize(job.outputPath)

    if (bytes !== null && bytes > TIMINGS.MIN_PRIMARY_GIF_BYTES) {
      console.log(`GIF generated by the primary encoder (${bytes} bytes)`)
      return { encoder: 'primary', outputPath: job.outputPath, bytes }
    }

    throw new Error(bytes === null ? 'output missing' : `output too small (${bytes} bytes)`)
  } catch (error) {
    console.warn(`Primary encoder failed (${formatError(error)}), falling back to the in-process encoder...`)
  }

  // Whatever the primary encoder left behind is not a usable GIF
  await rm(job.outputPath, { force: true })

  const result = await encodeGifFromFrames(job.framesDir, job.outputPath, job.fps)
  if (result.status === 'no-frames') {
    return { encoder: 'none', reason: 'no-frames', outputPath: job.outputPath }
  }

  return {
    encoder: 'fallback',
    outputPath: result.outputPath,
    bytes: result.bytes,
    frameCount: result.frameCount,
  }
}

export { encodeGifFromFrames, exportGif, frameDurationMs, renderGifWithFfmpeg }
export type { EncodeResult, ExportOutcome, GifJob, PrimaryEncoder }
