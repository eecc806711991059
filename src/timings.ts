// Engine constants - not user-configurable
export default {
  // Frames per second of the output GIF when the settings file does not say otherwise.
  // Each frame is shown for Math.round(1000 / GIF_FPS) ms.
  GIF_FPS: 15,

  // ffmpeg can exit cleanly while leaving a truncated or empty GIF behind.
  // Output at or below this size counts as a failed primary encode and triggers the fallback encoder.
  MIN_PRIMARY_GIF_BYTES: 10_000,

  // Progress is logged every this many frames while writing or loading frames
  FRAME_PROGRESS_INTERVAL: 100,

  // A blinking cursor is shown for this many frames, then hidden for as many
  CURSOR_BLINK_FRAMES: 8,

  // Frames held at the very end of the sequence before the GIF loops
  FINAL_HOLD_FRAMES: 120,
}
