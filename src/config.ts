import { readFile } from 'node:fs/promises'
import { pathExists } from 'fs-extra/esm'
import stripJsonComments from 'strip-json-comments'
import { z } from 'zod'
import type { ColorSchemes, Settings } from './types.ts'
import { applyDefaults } from './defaults.ts'
import { ConfigError } from './errors.ts'

const ENV_PREFIX = 'TERMBOOT'

const hexColor = z.string().regex(/^#?[0-9a-fA-F]{6}$/, 'expected a #RRGGBB color')

const ColorSetSchema = z.object({
  black: hexColor,
  red: hexColor,
  green: hexColor,
  yellow: hexColor,
  blue: hexColor,
  magenta: hexColor,
  cyan: hexColor,
  white: hexColor,
}).partial()

const ColorSchemeSchema = z.object({
  default_colors: z.object({ fg: hexColor, bg: hexColor }).partial().optional(),
  normal_colors: ColorSetSchema.optional(),
  bright_colors: ColorSetSchema.optional(),
})

const ColorSchemesSchema = z.record(z.string(), ColorSchemeSchema)

const SettingsFileSchema = z.object({
  general: z.object({
    debug: z.boolean(),
    cursor: z.string().min(1),
    show_cursor: z.boolean(),
    blink_cursor: z.boolean(),
    user_name: z.string().min(1),
    color_scheme: z.string().min(1),
    fps: z.number().int().positive(),
  }).partial().optional(),
  files: z.object({
    frame_base_name: z.string().min(1),
    frame_folder_name: z.string().min(1),
    output_gif_name: z.string().min(1),
  }).partial().optional(),
})

type RawSettings = z.infer<typeof SettingsFileSchema>

const GENERAL_KEYS = [
  'debug',
  'cursor',
  'show_cursor',
  'blink_cursor',
  'user_name',
  'color_scheme',
  'fps',
] as const
const FILES_KEYS = ['frame_base_name', 'frame_folder_name', 'output_gif_name'] as const
const BOOLEAN_KEYS = new Set<string>(['debug', 'show_cursor', 'blink_cursor'])
const NUMBER_KEYS = new Set<string>(['fps'])

function parseWithSchema<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, source: string): T {
  const result = schema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(issues, source)
  }
  return result.data
}

function parseColorSchemes(raw: unknown, source: string): ColorSchemes {
  return parseWithSchema(ColorSchemesSchema, raw, source)
}

// Reads a JSONC file; undefined when the file does not exist
async function readJsonc(path: string): Promise<unknown> {
  if (!await pathExists(path)) return undefined

  const content = await readFile(path, 'utf8')
  try {
    return JSON.parse(stripJsonComments(content, { trailingCommas: true }))
  } catch (error) {
    throw new ConfigError(`invalid JSONC (${error instanceof Error ? error.message : String(error)})`, path, {
      cause: error,
    })
  }
}

// Values that do not parse are passed through so validation reports them
function coerceEnvValue(key: string, value: string): unknown {
  if (BOOLEAN_KEYS.has(key)) {
    const normalized = value.trim().toLowerCase()
    if (normalized === 'true' || normalized === '1') return true
    if (normalized === 'false' || normalized === '0') return false
    return value
  }
  if (NUMBER_KEYS.has(key)) return /^\s*\d+\s*$/.test(value) ? Number(value) : value
  return value
}

function readEnvSection(
  env: NodeJS.ProcessEnv,
  section: 'GENERAL' | 'FILES',
  keys: readonly string[],
): Record<string, unknown> {
  const values: Record<string, unknown> = {}
  for (const key of keys) {
    const value = env[`${ENV_PREFIX}_${section}_${key.toUpperCase()}`]
    if (value !== undefined) values[key] = coerceEnvValue(key, value)
  }
  return values
}

/** Settings given as TERMBOOT_GENERAL_<KEY> and TERMBOOT_FILES_<KEY> variables */
function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): RawSettings {
  return parseWithSchema(
    SettingsFileSchema,
    {
      general: readEnvSection(env, 'GENERAL', GENERAL_KEYS),
      files: readEnvSection(env, 'FILES', FILES_KEYS),
    },
    'environment',
  )
}

/**
 * Loads the settings file, applies defaults for anything it leaves out and
 * lets environment variables override both. A missing file is not an error.
 */
async function loadSettings(path: string, env: NodeJS.ProcessEnv = process.env): Promise<Settings> {
  const raw = await readJsonc(path)
  if (raw === undefined) console.log(`No settings file at ${path}, using defaults`)

  const fileSettings = raw === undefined ? {} : parseWithSchema(SettingsFileSchema, raw, path)
  return applyDefaults(fileSettings, readEnvOverrides(env))
}

/** Loads the local color scheme table; a missing file yields an empty table */
async function loadColorSchemes(path: string): Promise<ColorSchemes> {
  const raw = await readJsonc(path)
  if (raw === undefined) {
    console.log(`No colors file at ${path}, using built-in color schemes`)
    return {}
  }
  return parseColorSchemes(raw, path)
}

export { loadColorSchemes, loadSettings, parseColorSchemes, readEnvOverrides }
export type { RawSettings }
