/**
 * Rule signals.
 *
 * A signal is true, false, or absent for lack of data. Absent is never
 * read as false: the scorer drops absent signals from the weighting and the
 * rule trace serializes them as null.
 */

export type Signal =
  | { state: 'absent'; reason: string }
  | { state: 'false'; value?: number }
  | { state: 'true'; value?: number }

export const RULE_IDS = ['R1', 'R2', 'R3', 'R4', 'R5', 'R6'] as const
export type RuleId = (typeof RULE_IDS)[number]

export type RuleSignals = Record<RuleId, Signal>

export function absent(reason: string): Signal {
  return { state: 'absent', reason }
}

export function fromCondition(condition: boolean, value?: number): Signal {
  const state = condition ? 'true' : 'false'
  return value === undefined ? { state } : { state, value }
}

export function isTrue(signal: Signal): boolean {
  return signal.state === 'true'
}

export function isFalse(signal: Signal): boolean {
  return signal.state === 'false'
}

export function isAbsent(signal: Signal): signal is Extract<Signal, { state: 'absent' }> {
  return signal.state === 'absent'
}

export function signalToJson(signal: Signal): boolean | null {
  switch (signal.state) {
    case 'true':
      return true
    case 'false':
      return false
    case 'absent':
      return null
  }
}
