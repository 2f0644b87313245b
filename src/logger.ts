export const DEV_LOG =
  process.env.NODE_ENV === 'development' ||
  process.env.DEV_LOG === '1' ||
  process.env.DEV_LOG === 'true' ||
  !!process.env.TEST

export function debug(...args: unknown[]) {
  if (DEV_LOG) console.debug('[debug]', ...args)
}

export function info(...args: unknown[]) {
  console.info('[info]', ...args)
}

export function warn(...args: unknown[]) {
  console.warn('[warn]', ...args)
}

export function error(...args: unknown[]) {
  console.error('[error]', ...args)
}

export type Logger = {
  debug: (...args: unknown[]) => void
  info: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
  error: (...args: unknown[]) => void
}

/** Logger whose lines carry a `[scope]` tag after the level. */
export function scoped(scope: string): Logger {
  const tag = `[${scope}]`
  return {
    debug: (...args) => debug(tag, ...args),
    info: (...args) => info(tag, ...args),
    warn: (...args) => warn(tag, ...args),
    error: (...args) => error(tag, ...args)
  }
}
