import type { PriorityLabel } from '@root/types/download.types.js'
import { PriorityValidationError } from '@root/types/errors.js'

/**
 * Canonical SABnzbd priority table. Force is 2; older tooling that sends
 * 3 for Force is rejected rather than mapped.
 */
export const PRIORITY_CODES: Readonly<Record<PriorityLabel, number>> = {
  Force: 2,
  High: 1,
  Normal: 0,
  Low: -1,
}

export const PRIORITY_LABELS: readonly PriorityLabel[] = [
  'Force',
  'High',
  'Normal',
  'Low',
] as const

const LABELS_BY_CODE = new Map<number, PriorityLabel>(
  PRIORITY_LABELS.map((label) => [PRIORITY_CODES[label], label]),
)

const LABELS_BY_NAME = new Map<string, PriorityLabel>(
  PRIORITY_LABELS.map((label) => [label.toLowerCase(), label]),
)

/**
 * Resolves a case-insensitive label (`force`, `High`) to its canonical form.
 *
 * @throws PriorityValidationError for anything outside the four labels
 */
export function normalizePriorityLabel(value: string): PriorityLabel {
  const label = LABELS_BY_NAME.get(value.trim().toLowerCase())
  if (!label) {
    throw new PriorityValidationError(value)
  }
  return label
}

export function isPriorityLabel(value: string): boolean {
  return LABELS_BY_NAME.has(value.trim().toLowerCase())
}

export function priorityLabelToCode(label: PriorityLabel): number {
  return PRIORITY_CODES[label]
}

/**
 * @throws PriorityValidationError for codes outside the canonical table
 */
export function priorityCodeToLabel(code: number): PriorityLabel {
  const label = LABELS_BY_CODE.get(code)
  if (!label) {
    throw new PriorityValidationError(code)
  }
  return label
}

/**
 * Parses a priority as the controller reports it: a label (`"Normal"`),
 * a numeric code (`1`) or a numeric string (`"-1"`).
 *
 * @throws PriorityValidationError when the value matches neither form
 */
export function parsePriority(value: string | number): PriorityLabel {
  if (typeof value === 'number') {
    return priorityCodeToLabel(value)
  }

  const trimmed = value.trim()
  if (/^-?\d+$/.test(trimmed)) {
    return priorityCodeToLabel(Number.parseInt(trimmed, 10))
  }

  return normalizePriorityLabel(trimmed)
}
