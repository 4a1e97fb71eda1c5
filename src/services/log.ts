const LEVELS = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
} as const

export type LogLevel = keyof typeof LEVELS

const isLogLevel = (value: string): value is LogLevel => value in LEVELS

export const parseLogLevel = (raw: string | undefined): LogLevel => {
  const normalized = String(raw ?? '').trim().toLowerCase()
  if (normalized === 'warning') {
    return 'warn'
  }
  return isLogLevel(normalized) ? normalized : 'info'
}

let threshold: number = LEVELS[parseLogLevel(process.env.LOG_LEVEL)]

export const setLogLevel = (level: LogLevel) => {
  threshold = LEVELS[level]
}

const enabled = (level: LogLevel) => LEVELS[level] >= threshold

export const log = {
  debug: (...args: unknown[]) => {
    if (enabled('debug')) {
      // eslint-disable-next-line no-console
      console.debug(...args)
    }
  },
  info: (...args: unknown[]) => {
    if (enabled('info')) {
      // eslint-disable-next-line no-console
      console.log(...args)
    }
  },
  warn: (...args: unknown[]) => {
    if (enabled('warn')) {
      // eslint-disable-next-line no-console
      console.warn(...args)
    }
  },
  error: (...args: unknown[]) => {
    if (enabled('error')) {
      // eslint-disable-next-line no-console
      console.error(...args)
    }
  },
}
