const PREFIX = '[secure-edge]'

export const logger = {
  debug(message: string, ...args: unknown[]): void {
    if (!process.env.SECURE_EDGE_DEBUG) return
    console.debug(PREFIX, message, ...args)
  },

  warn(message: string, ...args: unknown[]): void {
    console.warn(PREFIX, message, ...args)
  },
}
