let debugEnabled = false

function setDebug(enabled: boolean): void {
  debugEnabled = enabled
}

// console.debug that stays quiet unless general.debug is set
function debug(...args: unknown[]): void {
  if (debugEnabled) console.debug(...args)
}

export { debug, setDebug }
