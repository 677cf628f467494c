/**
 * Standard gap categories, each naming a rule for what counts as production.
 */

/** Months without production, ignoring shut-in status codes. */
export const NO_PROD_IGNORE_SHUTIN = 'NO_PROD_IGNORE_SHUTIN'

/** Months without production, where a shut-in well counts as producing. */
export const NO_PROD_BUT_SHUTIN_COUNTS = 'NO_PROD_BUT_SHUTIN_COUNTS'

export type StandardCategory = typeof NO_PROD_IGNORE_SHUTIN | typeof NO_PROD_BUT_SHUTIN_COUNTS

export const CATEGORY_DESCRIPTIONS: Readonly<Record<StandardCategory, string>> = {
  [NO_PROD_IGNORE_SHUTIN]: 'No production (ignore shut-in)',
  [NO_PROD_BUT_SHUTIN_COUNTS]: 'No production (shut-in counts as production)',
}
