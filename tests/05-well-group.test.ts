/**
 * Segment 05: Well Group Tests
 *
 * Multi-well gap intersection: padding each well's gaps to the group span,
 * intersecting across wells, validation before any work, and the
 * per-category result cache.
 */

import { describe, it, expect } from 'vitest'
import { createWellGroup, normalizeGaps } from '../src/well-group'
import { createWellRecord } from '../src/well-record'
import { MissingCategoryError, InconsistentRecordError } from '../src/errors'
import { NO_PROD_IGNORE_SHUTIN, NO_PROD_BUT_SHUTIN_COUNTS } from '../src/standard-categories'
import { d, r, pairs, well } from './helpers/fixtures'

const CAT = NO_PROD_IGNORE_SHUTIN

// ============================================================================
// 1. SPAN
// ============================================================================

describe('findFirstDate / findLastDate', () => {
  it('spans every record that has dates', () => {
    const group = createWellGroup([
      well({ apiNum: '05-001-00001', span: ['2001-01-01', '2020-05-31'] }),
      well({ apiNum: '05-001-00002', span: ['2002-01-01', '2023-05-01'] }),
      well({ apiNum: '05-001-00003' }),
    ])
    expect(group.findFirstDate()).toBe('2001-01-01')
    expect(group.findLastDate()).toBe('2023-05-01')
  })

  it('is null when no record has dates', () => {
    const group = createWellGroup([well({ apiNum: '05-001-00001' })])
    expect(group.findFirstDate()).toBeNull()
    expect(group.findLastDate()).toBeNull()
  })
})

// ============================================================================
// 2. NORMALIZATION
// ============================================================================

describe('normalizeGaps', () => {
  it('adds the parts of the overall span outside the well', () => {
    const padded = normalizeGaps(
      [],
      { first: d('2012-01-01'), last: d('2013-12-31') },
      { first: d('2010-01-01'), last: d('2015-12-31') },
    )
    expect(pairs(padded)).toEqual([
      ['2010-01-01', '2011-12-31'],
      ['2014-01-01', '2015-12-31'],
    ])
  })

  it('adds nothing when the well covers the overall span', () => {
    const gaps = [r('2011-01-01', '2011-06-30')]
    const span = { first: d('2010-01-01'), last: d('2015-12-31') }
    expect(normalizeGaps(gaps, span, span)).toEqual(gaps)
  })
})

// ============================================================================
// 3. GAP INTERSECTION
// ============================================================================

describe('findGaps', () => {
  const wellA = () => well({
    apiNum: '05-001-00001',
    span: ['2001-01-01', '2020-05-31'],
    gaps: { [CAT]: [['2002-01-01', '2003-12-31']] },
  })
  const wellB = () => well({
    apiNum: '05-001-00002',
    span: ['2002-01-01', '2023-05-01'],
    gaps: { [CAT]: [['2002-05-01', '2004-11-30']] },
  })

  it('finds the period both wells were idle', () => {
    const group = createWellGroup([wellA(), wellB()])
    expect(pairs(group.findGaps(CAT))).toEqual([['2002-05-01', '2003-12-31']])
  })

  it('does not depend on record order', () => {
    const group = createWellGroup([wellB(), wellA()])
    expect(pairs(group.findGaps(CAT))).toEqual([['2002-05-01', '2003-12-31']])
  })

  it("returns a single well's own gaps", () => {
    const group = createWellGroup([wellA()])
    expect(pairs(group.findGaps(CAT))).toEqual([['2002-01-01', '2003-12-31']])
  })

  it('intersects three wells', () => {
    const span: [string, string] = ['2000-01-01', '2009-12-31']
    const group = createWellGroup([
      well({ apiNum: '05-001-00001', span, gaps: { [CAT]: [['2001-01-01', '2004-12-31'], ['2006-01-01', '2008-12-31']] } }),
      well({ apiNum: '05-001-00002', span, gaps: { [CAT]: [['2002-01-01', '2007-06-30']] } }),
      well({ apiNum: '05-001-00003', span, gaps: { [CAT]: [['2003-01-01', '2003-12-31'], ['2006-06-01', '2006-12-31']] } }),
    ])
    expect(pairs(group.findGaps(CAT))).toEqual([
      ['2003-01-01', '2003-12-31'],
      ['2006-06-01', '2006-12-31'],
    ])
  })

  it('treats the time before a well existed as a gap for that well', () => {
    const group = createWellGroup([
      well({ apiNum: '05-001-00001', span: ['2010-01-01', '2019-12-31'], gaps: { [CAT]: [['2010-01-01', '2011-12-31']] } }),
      well({ apiNum: '05-001-00002', span: ['2012-01-01', '2019-12-31'], gaps: { [CAT]: [] } }),
    ])
    expect(pairs(group.findGaps(CAT))).toEqual([['2010-01-01', '2011-12-31']])
  })

  it('is empty when one well covering the group span never stopped', () => {
    const group = createWellGroup([
      well({ apiNum: '05-001-00001', span: ['2001-01-01', '2005-12-31'], gaps: { [CAT]: [['2002-01-01', '2002-06-30']] } }),
      well({ apiNum: '05-001-00002', span: ['2000-01-01', '2010-12-31'], gaps: { [CAT]: [] } }),
    ])
    expect(group.findGaps(CAT)).toEqual([])
  })

  it('is empty when the always-producing well comes first', () => {
    const group = createWellGroup([
      well({ apiNum: '05-001-00002', span: ['2000-01-01', '2010-12-31'], gaps: { [CAT]: [] } }),
      well({ apiNum: '05-001-00001', span: ['2001-01-01', '2005-12-31'], gaps: { [CAT]: [['2002-01-01', '2002-06-30']] } }),
    ])
    expect(group.findGaps(CAT)).toEqual([])
  })

  it('ignores a well without a production span', () => {
    const group = createWellGroup([
      wellA(),
      well({ apiNum: '05-001-00003', gaps: { [CAT]: [] } }),
    ])
    expect(pairs(group.findGaps(CAT))).toEqual([['2002-01-01', '2003-12-31']])
  })

  it('is empty when no well has a production span', () => {
    const group = createWellGroup([
      well({ apiNum: '05-001-00001', gaps: { [CAT]: [['2002-01-01', '2003-12-31']] } }),
    ])
    expect(group.findGaps(CAT)).toEqual([])
  })

  it('is empty for an empty group', () => {
    expect(createWellGroup().findGaps(CAT)).toEqual([])
  })

  it('merges overlapping gaps within one well', () => {
    const group = createWellGroup([
      well({
        apiNum: '05-001-00001',
        span: ['2000-01-01', '2009-12-31'],
        gaps: { [CAT]: [['2003-01-01', '2004-06-30'], ['2001-01-01', '2003-06-30']] },
      }),
    ])
    expect(pairs(group.findGaps(CAT))).toEqual([['2001-01-01', '2004-06-30']])
  })
})

// ============================================================================
// 4. VALIDATION
// ============================================================================

describe('findGaps validation', () => {
  it('names every well missing the category', () => {
    const group = createWellGroup([
      well({ apiNum: '05-001-00001', span: ['2001-01-01', '2002-12-31'], gaps: { [CAT]: [] } }),
      well({ apiNum: '05-001-00002', span: ['2001-01-01', '2002-12-31'] }),
      well({ apiNum: '05-001-00003', span: ['2001-01-01', '2002-12-31'], gaps: { [NO_PROD_BUT_SHUTIN_COUNTS]: [] } }),
    ])
    let caught: unknown
    try { group.findGaps(CAT) } catch (e) { caught = e }
    expect(caught).toBeInstanceOf(MissingCategoryError)
    if (caught instanceof MissingCategoryError) {
      expect(caught.category).toBe(CAT)
      expect(caught.apiNums).toEqual(['05-001-00002', '05-001-00003'])
      expect(caught.message).toBe(
        "Category 'NO_PROD_IGNORE_SHUTIN' is not registered for well(s): 05-001-00002, 05-001-00003",
      )
    }
  })

  it('rejects a record with only one span date', () => {
    const halfSpan = createWellRecord({ apiNum: '05-001-00002', firstDate: d('2001-01-01') })
    halfSpan.dateRanges.set(CAT, [])
    const group = createWellGroup([
      well({ apiNum: '05-001-00001', span: ['2001-01-01', '2002-12-31'], gaps: { [CAT]: [] } }),
      halfSpan,
    ])
    expect(() => group.findGaps(CAT)).toThrow(InconsistentRecordError)
    expect(() => group.findGaps(CAT)).toThrow('Well 05-001-00002 has only one of first date and last date set')
  })

  it('stops before a later inconsistent record once the result is empty', () => {
    const halfSpan = createWellRecord({ apiNum: '05-001-00003', firstDate: d('2001-01-01') })
    halfSpan.dateRanges.set(CAT, [])
    const group = createWellGroup([
      well({ apiNum: '05-001-00001', span: ['2001-01-01', '2002-12-31'], gaps: { [CAT]: [] } }),
      well({ apiNum: '05-001-00002', span: ['2001-01-01', '2002-12-31'], gaps: { [CAT]: [['2001-03-01', '2001-03-31']] } }),
      halfSpan,
    ])
    expect(group.findGaps(CAT)).toEqual([])
  })

  it('rejects an inconsistent record even when no record has a full span', () => {
    const halfSpan = createWellRecord({ apiNum: '05-001-00001', lastDate: d('2001-01-01') })
    halfSpan.dateRanges.set(CAT, [])
    expect(() => createWellGroup([halfSpan]).findGaps(CAT)).toThrow(InconsistentRecordError)
  })

  it('reports a missing category before an inconsistent record', () => {
    const halfSpan = createWellRecord({ apiNum: '05-001-00001', lastDate: d('2001-01-01') })
    halfSpan.dateRanges.set(CAT, [])
    const group = createWellGroup([halfSpan, well({ apiNum: '05-001-00002' })])
    expect(() => group.findGaps(CAT)).toThrow(MissingCategoryError)
  })
})

// ============================================================================
// 5. RESEARCHED GAPS
// ============================================================================

describe('researchedGaps', () => {
  const build = () => createWellGroup([
    well({
      apiNum: '05-001-00001',
      span: ['2001-01-01', '2005-12-31'],
      gaps: { [CAT]: [['2002-01-01', '2002-06-30']], [NO_PROD_BUT_SHUTIN_COUNTS]: [] },
    }),
  ])

  it('starts empty', () => {
    expect(build().researchedGaps.size).toBe(0)
  })

  it('keeps one entry per researched category', () => {
    const group = build()
    const gaps = group.findGaps(CAT)
    group.findGaps(NO_PROD_BUT_SHUTIN_COUNTS)
    expect(group.researchedGaps.get(CAT)).toEqual(gaps)
    expect(group.researchedGaps.get(NO_PROD_BUT_SHUTIN_COUNTS)).toEqual([])
    expect([...group.researchedGaps.keys()]).toEqual([CAT, NO_PROD_BUT_SHUTIN_COUNTS])
  })

  it('is not written when validation fails', () => {
    const group = build()
    expect(() => group.findGaps('UNKNOWN_CATEGORY')).toThrow(MissingCategoryError)
    expect(group.researchedGaps.has('UNKNOWN_CATEGORY')).toBe(false)
  })

  it('is cleared when a record is added', () => {
    const group = build()
    group.findGaps(CAT)
    group.addWellRecord(well({ apiNum: '05-001-00002', span: ['2001-01-01', '2005-12-31'], gaps: { [CAT]: [] } }))
    expect(group.researchedGaps.size).toBe(0)
    expect(group.wellRecords).toHaveLength(2)
    expect(group.findGaps(CAT)).toEqual([])
  })
})
