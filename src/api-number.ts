/**
 * API Numbers
 *
 * Wells are identified by API numbers such as `05-123-45678` or
 * `05-123-45678-00-01`: a 2-digit state code, a 3-digit county code, a 5-digit
 * well identifier, and optionally two 2-digit suffixes. Only the state code is
 * checked against a known table; county and well identifiers are checked for
 * shape alone.
 */

import stateCodes from './data/state-codes.json'

/** State code → state or offshore region name. */
export const STATE_CODES: Readonly<Record<string, string>> = stateCodes

const DIGITS = /^\d+$/

function isDigits(component: string | undefined, length: number): boolean {
  return component !== undefined && component.length === length && DIGITS.test(component)
}

export function validateApiNumber(apiNum: unknown): boolean {
  if (typeof apiNum !== 'string') return false
  const components = apiNum.split('-')
  if (components.length !== 3 && components.length !== 5) return false

  const [state, county, well, first, second] = components
  if (state === undefined || !Object.hasOwn(STATE_CODES, state)) return false
  if (!isDigits(county, 3) || !isDigits(well, 5)) return false
  if (components.length === 5 && (!isDigits(first, 2) || !isDigits(second, 2))) return false
  return true
}

/** The 2-digit state code an API number starts with. */
export function stateCodeOf(apiNum: string): string {
  return apiNum.substring(0, 2)
}

export function stateNameOf(stateCode: string): string | undefined {
  return Object.hasOwn(STATE_CODES, stateCode) ? STATE_CODES[stateCode] : undefined
}
