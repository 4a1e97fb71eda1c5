export type Distribution = {
  count: number
  mean: number
  median: number
  std: number | null
  min: number
  max: number
  p25: number
  p75: number
}

export const round2 = (value: number) => Math.round((value + Number.EPSILON) * 100) / 100

export const roundOrNull = (value: number | null | undefined) =>
  value === null || value === undefined ? null : round2(value)

export const mean = (values: readonly number[]): number | null => {
  if (!values.length) {
    return null
  }
  let total = 0
  for (const value of values) {
    total += value
  }
  return total / values.length
}

export const minMax = (values: readonly number[]) => {
  if (!values.length) {
    return null
  }
  let min = values[0]
  let max = values[0]
  for (const value of values) {
    if (value < min) {
      min = value
    }
    if (value > max) {
      max = value
    }
  }
  return { min, max }
}

/** Linear interpolation between closest ranks, `q` in [0, 1]. */
export const quantile = (sorted: readonly number[], q: number) => {
  if (!sorted.length) {
    return null
  }
  const position = (sorted.length - 1) * q
  const lower = Math.floor(position)
  const upper = Math.ceil(position)
  if (lower === upper) {
    return sorted[lower]
  }
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower)
}

/** Sample standard deviation; `null` below two observations. */
export const sampleStd = (values: readonly number[]) => {
  const average = mean(values)
  if (average === null || values.length < 2) {
    return null
  }
  let squares = 0
  for (const value of values) {
    squares += (value - average) ** 2
  }
  return Math.sqrt(squares / (values.length - 1))
}

export const describe = (values: readonly number[]): Distribution | null => {
  const average = mean(values)
  const bounds = minMax(values)
  if (average === null || bounds === null) {
    return null
  }

  const sorted = [...values].sort((left, right) => left - right)
  return {
    count: values.length,
    mean: average,
    median: quantile(sorted, 0.5) ?? average,
    std: sampleStd(values),
    min: bounds.min,
    max: bounds.max,
    p25: quantile(sorted, 0.25) ?? bounds.min,
    p75: quantile(sorted, 0.75) ?? bounds.max,
  }
}
