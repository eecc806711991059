import 'dotenv/config'
import { join, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { ensureDir, pathExists, remove } from 'fs-extra/esm'
import minimist from 'minimist'
import type { ColorSchemes, GitHubUserStats, Profile, Settings } from './types.ts'
import type { BootContext } from './boot-script.ts'
import type { ExportOutcome, PrimaryEncoder } from './gif.ts'
import { runBootSequence } from './boot-script.ts'
import { resolveScheme } from './colors.ts'
import { loadColorSchemes, loadSettings } from './config.ts'
import { formatError } from './errors.ts'
import { exportGif, renderGifWithFfmpeg } from './gif.ts'
import { fetchGithubStats } from './github-stats.ts'
import { setDebug } from './log.ts'
import { writeReadme } from './readme.ts'
import { Terminal } from './terminal.ts'
import profile from '../profile.ts'

const CANVAS = { width: 750, height: 500, xPad: 15, yPad: 15 }

type PipelineOptions = {
  settings: Settings
  schemes: ColorSchemes
  profile: Profile
  outputDirectory: string
  script?: (terminal: Terminal, ctx: BootContext) => Promise<void>
  primary?: PrimaryEncoder
  fetchStats?: (login: string, ignoreRepos: string[]) => Promise<GitHubUserStats>
  now?: Date
}

type PipelineResult = {
  outcome: ExportOutcome
  frameCount: number
  readmePath: string
}

async function existingFontFiles(files: string[]): Promise<string[]> {
  const found: string[] = []
  for (const file of files) {
    if (await pathExists(file)) found.push(file)
    else console.warn(`Font file not found: ${file}, using system fonts`)
  }
  return found
}

/**
 * Renders the boot sequence, encodes it and writes the README. Frames are
 * written to `<outputDirectory>/<frameFolderName>` and removed afterwards
 * unless debug is set.
 */
async function runPipeline({
  settings,
  schemes,
  profile,
  outputDirectory,
  script = runBootSequence,
  primary = renderGifWithFfmpeg,
  fetchStats = fetchGithubStats,
  now,
}: PipelineOptions): Promise<PipelineResult> {
  const { general, files } = settings
  setDebug(general.debug)
  await ensureDir(outputDirectory)

  const palette = resolveScheme(general.colorScheme, schemes)
  console.log(`Using color scheme ${general.colorScheme}`)

  console.log(`Fetching GitHub stats for ${general.userName}...`)
  const stats = await fetchStats(general.userName, profile.ignoreRepos)

  const terminal = new Terminal({
    ...CANVAS,
    font: profile.fonts.text,
    palette,
    cursor: general.cursor,
    showCursor: general.showCursor,
    blinkCursor: general.blinkCursor,
    frameBaseName: files.frameBaseName,
    fontFiles: await existingFontFiles(profile.fonts.files),
  })

  await script(terminal, { profile, stats, userName: general.userName, background: palette.bg, now })

  const framesDir = join(outputDirectory, files.frameFolderName)
  const gifName = `${files.outputGifName}.gif`
  let outcome: ExportOutcome
  let frameCount: number

  try {
    console.log(`Rendering ${terminal.frames.length} frames...`)
    frameCount = await terminal.writeFrames(framesDir)

    outcome = await exportGif(
      { framesDir, frameBaseName: files.frameBaseName, outputPath: join(outputDirectory, gifName), fps: general.fps },
      primary,
    )
  } finally {
    if (!general.debug) await remove(framesDir)
  }

  // Written even without a GIF so the page layout stays the same
  const readmePath = join(outputDirectory, 'README.md')
  await writeReadme(readmePath, gifName, profile.hostName)

  if (outcome.encoder === 'none') {
    console.warn(`No frames were rendered, ${outcome.outputPath} was not written`)
  } else {
    console.log(`\nDone! Generated: ${outcome.outputPath}`)
  }

  return { outcome, frameCount, readmePath }
}

// 0: GIF written, 2: nothing to encode
const exitCodeFor = (outcome: ExportOutcome): number => outcome.encoder === 'none' ? 2 : 0

type CliFlags = {
  settings: string
  colors: string
  'output-directory'?: string
}

/** @returns the process exit code */
async function main(args: string[] = process.argv.slice(2)): Promise<number> {
  try {
    const flags = minimist<CliFlags>(args, {
      string: ['settings', 'colors', 'output-directory'],
      alias: { s: 'settings', c: 'colors', o: 'output-directory' },
      default: { settings: 'settings.jsonc', colors: 'colors.jsonc' },
    })

    const settings = await loadSettings(flags.settings)
    const schemes = await loadColorSchemes(flags.colors)

    console.log('Settings loaded:', {
      userName: settings.general.userName,
      colorScheme: settings.general.colorScheme,
      fps: settings.general.fps,
    })

    const { outcome } = await runPipeline({
      settings,
      schemes,
      profile,
      outputDirectory: flags['output-directory'] || process.cwd(),
    })
    return exitCodeFor(outcome)
  } catch (error) {
    console.error('Error:', formatError(error))
    return 1
  }
}

// Only runs when executed directly, not when imported by tests
if (process.argv[1] && resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  process.exitCode = await main()
}

export { exitCodeFor, main, runPipeline }
export type { PipelineOptions, PipelineResult }
