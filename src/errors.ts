/** A settings or colors file that cannot be parsed or fails validation */
class ConfigError extends Error {
  constructor(message: string, readonly path?: string, options?: ErrorOptions) {
    super(path ? `${path}: ${message}` : message, options)
    this.name = 'ConfigError'
  }
}

/** An ffmpeg pass that exited with a non-zero code */
class FfmpegError extends Error {
  constructor(readonly pass: string, readonly code: number | string | null, readonly stderr: string) {
    super(`ffmpeg ${pass} pass failed (exit ${code ?? 'unknown'})`)
    this.name = 'FfmpegError'
  }
}

const formatError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)

export { ConfigError, FfmpegError, formatError }
