/**
 * @module boot-script
 *
 * The boot sequence itself: BIOS banner and memory test, the scrambled logo,
 * a login, `clear`, and a `fetch.sh` summary of the profile and its GitHub
 * stats, ending on a typed comment that is held for a few seconds.
 */
import { pathExists } from 'fs-extra/esm'
import type { GitHubUserStats, Profile, Rgb } from './types.ts'
import type { Terminal } from './terminal.ts'
import { withCompositedImage } from './composite.ts'
import { calcAge, formatInTimeZone, yearInTimeZone } from './dates.ts'
import { textScrambleEffectLines } from './effects.ts'
import TIMINGS from './timings.ts'

const RESET = '\x1b[0m'
const RED = '\x1b[31m'
const BRIGHT_RED = '\x1b[91m'
const BRIGHT_GREEN = '\x1b[92m'
const BRIGHT_YELLOW = '\x1b[93m'
const BRIGHT_BLUE = '\x1b[94m'
const BRIGHT_CYAN = '\x1b[96m'
const BLACK_ON_BRIGHT_RED = '\x1b[30;101m'

const MEMORY_TOTAL_KB = 131072
const MEMORY_STEP_KB = 14336
const TOP_LANGUAGE_COUNT = 5

type BootContext = {
  profile: Profile
  stats: GitHubUserStats
  /** GitHub login typed at the login prompt and after `fetch.sh -u` */
  userName: string
  /** Terminal background the avatar is flattened onto */
  background: Rgb
  now?: Date
  /** Randomness for the logo scramble */
  random?: () => number
}

const promptFor = ({ displayName, hostName }: Profile): string =>
  `${BRIGHT_GREEN}${displayName}@${hostName}${RESET} ${BRIGHT_BLUE}~>${RESET} `

/** Lines of the fetch summary, styled with SGR sequences */
function buildFetchLines(profile: Profile, stats: GitHubUserStats, now: Date = new Date()): string[] {
  const { day, month, year } = profile.birthday
  const age = calcAge(day, month, year, now, profile.timeZone)
  const field = (label: string, value: string | number) => `${BRIGHT_CYAN}${label}${BRIGHT_YELLOW}${value}${RESET}`
  const topLanguages = Array.from(
    { length: TOP_LANGUAGE_COUNT },
    (_, index) => `${BRIGHT_YELLOW}  ${stats.languagesSorted[index]?.[0] ?? ''}${RESET}`,
  )

  return [
    `${BLACK_ON_BRIGHT_RED}${profile.displayName}@GitHub${RESET}`,
    '--------------',
    field('OS:       ', profile.os),
    field('Role:     ', profile.role),
    field('Location: ', profile.location),
    field('Uptime:   ', `${age.years} years, ${age.months} months, ${age.days} days`),
    field('IDE:      ', profile.ide),
    '',
    `${BLACK_ON_BRIGHT_RED}GitHub Stats:${RESET}`,
    '--------------',
    field('User Rating:  ', stats.userRank.level),
    field('Total Stars:  ', stats.totalStargazers),
    field(`Total Commits (${stats.commitsYear}): `, stats.totalCommitsLastYear),
    field('Total PRs:    ', stats.totalPullRequestsMade),
    field('Merged PR %:  ', stats.pullRequestsMergePercentage),
    field('Contributions:', stats.totalRepoContributions),
    `${BRIGHT_CYAN}Top Languages:${RESET}`,
    ...topLanguages,
  ]
}

function biosScreen(t: Terminal, profile: Profile, year: number): void {
  t.genText('', 1, 1, { count: 20 })
  t.toggleShowCursor(false)
  t.genText(`${profile.osName} Modular BIOS v${profile.osVersion}`, 1)
  t.genText(`Copyright (C) ${year}, ${RED}${profile.company}${RESET}`, 2)
  t.genText(`${BRIGHT_BLUE}GitHub Profile ReadMe Terminal, Rev 1024${RESET}`, 4)
  t.genText('Quantum(tm) GIFCPU - 420Hz', 6)
  t.genText(`Press ${BRIGHT_BLUE}DEL${RESET} to enter SETUP, ${BRIGHT_BLUE}ESC${RESET} to cancel Memory Test`, t.numRows)

  for (let kb = 0; kb < MEMORY_TOTAL_KB; kb += MEMORY_STEP_KB) {
    t.deleteRow(7)
    // The count slows down for the first half
    t.genText(`Memory Test: ${kb}`, 7, 1, { count: kb < 60000 ? 2 : 1, contin: true })
  }
  t.deleteRow(7)
  t.genText(`Memory Test: ${MEMORY_TOTAL_KB}K OK`, 7, 1, { count: 10, contin: true })
  t.genText('', 11, 1, { count: 10, contin: true })
}

function bootLogo(t: Terminal, profile: Profile, random?: () => number): void {
  t.clearFrame()
  t.genText('Initiating Boot Sequence ', 1, 1, { contin: true })
  t.genTypingText('.....', 1, 1, { contin: true })
  t.genText(BRIGHT_CYAN, 1, 1, { count: 0, contin: true })

  t.setFont(profile.fonts.logo)
  const midRow = Math.floor((t.numRows + 1) / 2)
  const midCol = Math.floor((t.numCols - profile.logoText.length + 1) / 2)

  for (const line of textScrambleEffectLines(profile.logoText, 3, { includeSpecial: false, random })) {
    t.deleteRow(midRow + 1)
    t.genText(line, midRow + 1, midCol + 1)
  }

  t.setFont(profile.fonts.text)
}

function login(t: Terminal, profile: Profile, userName: string, now: Date): void {
  t.clearFrame()
  t.cloneFrame(5)
  t.toggleShowCursor(false)
  t.genText(`${BRIGHT_YELLOW}${profile.osName} v${profile.osVersion} (tty1)${RESET}`, 1, 1, { count: 5 })
  t.genText('login: ', 3, 1, { count: 5 })
  t.toggleShowCursor(true)
  t.genTypingText(userName, 3, 1, { contin: true })
  t.genText('', 4, 1, { count: 5 })
  t.toggleShowCursor(false)
  t.genText('password: ', 4, 1, { count: 5 })
  t.toggleShowCursor(true)
  t.genTypingText('*********', 4, 1, { contin: true })
  t.toggleShowCursor(false)
  t.genText(`Last login: ${formatInTimeZone(now, profile.timeZone)} on tty1`, 6)
}

// Types the start of a command in red, then rewrites it in green as if tab-completed
function typeCommand(t: Terminal, row: number, partial: string, command: string, count = 1): void {
  const promptCol = t.currCol
  t.toggleShowCursor(true)
  t.genTypingText(`${BRIGHT_RED}${partial}`, row, 1, { contin: true })
  t.deleteRow(row, promptCol)
  t.genText(`${BRIGHT_GREEN}${command}${RESET}`, row, 1, { count, contin: true })
}

async function pasteAvatar(t: Terminal, profile: Profile, background: Rgb): Promise<void> {
  if (!await pathExists(profile.avatar)) {
    console.warn(`Avatar not found at ${profile.avatar}, skipping`)
    return
  }

  console.log(`Avatar background color: RGB(${background.join(', ')})`)
  await withCompositedImage(
    profile.avatar,
    background,
    (compositedPath) => t.pasteImage(compositedPath, 10, 2, profile.avatarScale),
  )
}

/** Drives the terminal through the whole boot sequence */
async function runBootSequence(t: Terminal, ctx: BootContext): Promise<void> {
  const { profile, stats, userName, background } = ctx
  const now = ctx.now ?? new Date()

  t.setPrompt(promptFor(profile))

  biosScreen(t, profile, yearInTimeZone(now, profile.timeZone))
  bootLogo(t, profile, ctx.random)
  login(t, profile, userName, now)

  t.genPrompt(7, 1, { count: 5 })
  typeCommand(t, 7, 'clea', 'clear', 3)

  t.clearFrame()
  t.genPrompt(1)
  t.cloneFrame(10)
  typeCommand(t, 1, 'fetch.s', 'fetch.sh')
  t.genTypingText(` -u ${userName}`, 1, 1, { contin: true })
  t.toggleShowCursor(false)

  await pasteAvatar(t, profile, background)
  // The empty last line leaves the cursor on the row below the summary
  t.genText([...buildFetchLines(profile, stats, now), ''].join('\n'), 3, 39, { count: 5 })

  t.genPrompt(t.currRow)
  t.toggleShowCursor(true)
  t.genTypingText(`${BRIGHT_GREEN}# ${profile.closingMessage}`, t.currRow, 1, { contin: true })
  t.genText('', t.currRow, 1, { count: TIMINGS.FINAL_HOLD_FRAMES, contin: true })
}

export { buildFetchLines, promptFor, runBootSequence }
export type { BootContext }
