/**
 * Types for rendering a retro terminal boot sequence.
 * A terminal canvas is painted with styled text runs, erasures and images,
 * snapshotted into frames, and the frames are encoded into a looping GIF.
 */

/** Red, green and blue channels, each 0..255 */
type Rgb = [number, number, number]

type AnsiColorName = 'black' | 'red' | 'green' | 'yellow' | 'blue' | 'magenta' | 'cyan' | 'white'

/**
 * A named color scheme as written in a colors file.
 * Every entry is optional; missing colors fall back to the built-in scheme.
 */
type ColorScheme = {
  default_colors?: { fg?: string; bg?: string }
  normal_colors?: Partial<Record<AnsiColorName, string>>
  bright_colors?: Partial<Record<AnsiColorName, string>>
}

type ColorSchemes = Record<string, ColorScheme>

/** A fully resolved color scheme */
type Palette = {
  fg: Rgb
  bg: Rgb
  /** Normal colors in ANSI order, black to white */
  normal: Rgb[]
  /** Bright colors in ANSI order, black to white */
  bright: Rgb[]
}

/**
 * A color as carried by a text style.
 * - 'default': the scheme's default foreground (or no background)
 * - number: an index into the 16 ANSI colors (8..15 are the bright ones)
 * - Rgb: a true color
 */
type Color = 'default' | number | Rgb

type TextStyle = {
  fg: Color
  bg: Color
  bold: boolean
}

type Font = {
  /** Font family name as known to the rasterizer */
  family: string
  /** Font size in pixels */
  size: number
  /** Extra pixels between rows */
  lineSpacing: number
}

/** Something painted onto the canvas, positioned in pixels */
type PaintOp =
  | { kind: 'rect'; x: number; y: number; width: number; height: number; fill: Color }
  | {
    kind: 'text'
    x: number
    y: number
    height: number
    text: string
    style: TextStyle
    font: Font
  }
  | { kind: 'image'; x: number; y: number; width: number; height: number; href: string }

type CursorMark = {
  x: number
  y: number
  glyph: string
  style: TextStyle
  font: Font
}

/** One recorded snapshot of the canvas */
type Frame = {
  readonly ops: readonly PaintOp[]
  readonly cursor: CursorMark | null
}

/** Settings after defaults and environment overrides */
type Settings = {
  general: {
    /** Keeps the frame folder and enables debug logging */
    debug: boolean
    /** Cursor glyph */
    cursor: string
    showCursor: boolean
    blinkCursor: boolean
    /** GitHub login the stats are fetched for */
    userName: string
    /** Color scheme name, looked up in the local colors file first */
    colorScheme: string
    /** Frames per second of the output GIF */
    fps: number
  }
  files: {
    /** Frame files are written as <frameBaseName><index>.png */
    frameBaseName: string
    frameFolderName: string
    /** Output GIF base name, without extension */
    outputGifName: string
  }
}

/** Aggregate statistics shown by the fetch summary */
type GitHubUserStats = {
  login: string
  userRank: { level: string; percentile: number }
  totalStargazers: number
  /** Commit contributions in `commitsYear` */
  totalCommitsLastYear: number
  commitsYear: number
  totalPullRequestsMade: number
  /** Merged pull requests as a percentage of all pull requests, two decimals */
  pullRequestsMergePercentage: number
  totalRepoContributions: number
  /** Language names with their byte size, largest first */
  languagesSorted: Array<[string, number]>
}

/** Who the boot sequence is about */
type Profile = {
  /** Short name shown in the prompt and fetch header */
  displayName: string
  /** Host name shown in the prompt */
  hostName: string
  /** Name of the pretend operating system, as in the BIOS banner */
  osName: string
  osVersion: string
  /** Text scrambled into place as the boot logo */
  logoText: string
  company: string
  role: string
  location: string
  /** IANA time zone for the login and copyright dates */
  timeZone: string
  birthday: { day: number; month: number; year: number }
  os: string
  ide: string
  /** Avatar image pasted next to the fetch summary */
  avatar: string
  /** Scale applied to the avatar image */
  avatarScale: number
  /** Repositories left out of the star and language totals */
  ignoreRepos: string[]
  fonts: {
    text: Font
    logo: Font
    /** Font files handed to the rasterizer; missing files are skipped */
    files: string[]
  }
  closingMessage: string
}

export type {
  AnsiColorName,
  Color,
  ColorScheme,
  ColorSchemes,
  CursorMark,
  Font,
  Frame,
  GitHubUserStats,
  PaintOp,
  Palette,
  Profile,
  Rgb,
  Settings,
  TextStyle,
}
