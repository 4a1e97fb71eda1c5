const SURROUNDING_PUNCTUATION = /^[¿?¡!\s]+|[¿?¡!\s]+$/g

export const stripDiacritics = (value: string) =>
  value.normalize('NFD').replace(/[\u0300-\u036f]/g, '')

/** Lower-case, accent-free, trimmed, without surrounding `¿?¡!`. */
export const normalizeText = (value: string) =>
  stripDiacritics(value.toLowerCase()).replace(SURROUNDING_PUNCTUATION, '').trim()

export const words = (normalized: string) => normalized.split(/[^a-z0-9.]+/).filter(Boolean)

export const containsAny = (normalized: string, needles: readonly string[]) =>
  needles.some((needle) => normalized.includes(needle))

/** Like `containsAny`, but each phrase must start and end on a word boundary. */
export const containsPhrase = (normalized: string, phrases: readonly string[]) => {
  const padded = ` ${normalized.split(/[^a-z0-9]+/).filter(Boolean).join(' ')} `
  return phrases.some((phrase) => padded.includes(` ${phrase} `))
}

export const formatDecimal = (value: number, digits: number) => value.toFixed(digits)

export const formatCount = (value: number) => value.toLocaleString('en-US')

export const displayValue = (value: number | null | undefined) =>
  value === null || value === undefined ? '—' : String(value)

const pad = (value: number) => String(value).padStart(2, '0')

/** `dd/mm/yyyy` in UTC. */
export const formatDate = (value: Date | string) => {
  const date = typeof value === 'string' ? new Date(value) : value
  return `${pad(date.getUTCDate())}/${pad(date.getUTCMonth() + 1)}/${date.getUTCFullYear()}`
}

/** `dd/mm/yyyy HH:MM` in UTC. */
export const formatDateTime = (value: Date | string) => {
  const date = typeof value === 'string' ? new Date(value) : value
  return `${formatDate(date)} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`
}
