import type { Settings } from './types.ts'
import type { RawSettings } from './config.ts'
import TIMINGS from './timings.ts'

// Default settings to be used across the application
export const defaultSettings: Settings = {
  general: {
    debug: false,
    cursor: '_',
    showCursor: true,
    blinkCursor: true,
    userName: 'octocat',
    colorScheme: 'yoru',
    fps: TIMINGS.GIF_FPS,
  },
  files: {
    frameBaseName: 'frame_',
    frameFolderName: 'frames',
    outputGifName: 'output',
  },
}

// Overrides win over the file, the file wins over the defaults
function applyDefaults(fileSettings: RawSettings, overrides: RawSettings = {}): Settings {
  const general = { ...fileSettings.general, ...overrides.general }
  const files = { ...fileSettings.files, ...overrides.files }

  return {
    general: {
      debug: general.debug ?? defaultSettings.general.debug,
      cursor: general.cursor ?? defaultSettings.general.cursor,
      showCursor: general.show_cursor ?? defaultSettings.general.showCursor,
      blinkCursor: general.blink_cursor ?? defaultSettings.general.blinkCursor,
      userName: general.user_name ?? defaultSettings.general.userName,
      colorScheme: general.color_scheme ?? defaultSettings.general.colorScheme,
      fps: general.fps ?? defaultSettings.general.fps,
    },
    files: {
      frameBaseName: files.frame_base_name ?? defaultSettings.files.frameBaseName,
      frameFolderName: files.frame_folder_name ?? defaultSettings.files.frameFolderName,
      outputGifName: files.output_gif_name ?? defaultSettings.files.outputGifName,
    },
  }
}

export { applyDefaults }
