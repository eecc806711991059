// gifenc ships no type declarations
declare module 'gifenc' {
  type Palette = number[][]
  type PixelFormat = 'rgb565' | 'rgb444' | 'rgba4444'

  type WriteFrameOptions = {
    palette?: Palette
    /** Frame delay in milliseconds */
    delay?: number
    /** -1 plays once, 0 loops forever, n loops n times */
    repeat?: number
    transparent?: boolean
    transparentIndex?: number
    dispose?: number
  }

  type GIFEncoderInstance = {
    writeFrame: (index: Uint8Array, width: number, height: number, options?: WriteFrameOptions) => void
    finish: () => void
    bytes: () => Uint8Array
    bytesView: () => Uint8Array
    reset: () => void
  }

  const gifenc: {
    GIFEncoder: (options?: { auto?: boolean; initialCapacity?: number }) => GIFEncoderInstance
    quantize: (
      rgba: Uint8Array | Uint8ClampedArray,
      maxColors: number,
      options?: { format?: PixelFormat; oneBitAlpha?: boolean | number },
    ) => Palette
    applyPalette: (rgba: Uint8Array | Uint8ClampedArray, palette: Palette, format?: PixelFormat) => Uint8Array
  }

  export default gifenc
  export type { GIFEncoderInstance, Palette, WriteFrameOptions }
}
