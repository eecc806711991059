import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import { calcAge, formatInTimeZone, yearInTimeZone } from '../src/dates.ts'

describe('calcAge', () => {
  it('borrows a year when the birthday month is still ahead', () => {
    assert.deepEqual(calcAge(10, 11, 1992, new Date(Date.UTC(2026, 9, 18))), { years: 33, months: 11, days: 8 })
  })

  it('borrows the length of the previous month for days', () => {
    assert.deepEqual(calcAge(20, 3, 2000, new Date(Date.UTC(2024, 4, 5))), { years: 24, months: 1, days: 15 })
  })

  it('is exact on the birthday', () => {
    assert.deepEqual(calcAge(18, 10, 2000, new Date(Date.UTC(2026, 9, 18))), { years: 26, months: 0, days: 0 })
  })

  it('counts days on the calendar of the time zone', () => {
    // 22:00 UTC on the 17th is already the 18th in Melbourne
    const now = new Date(Date.UTC(2026, 9, 17, 22, 0, 0))
    assert.deepEqual(calcAge(18, 10, 2000, now, 'UTC'), { years: 25, months: 11, days: 29 })
    assert.deepEqual(calcAge(18, 10, 2000, now, 'Australia/Melbourne'), { years: 26, months: 0, days: 0 })
  })
})

describe('formatInTimeZone', () => {
  it('formats like the date command', () => {
    const date = new Date(Date.UTC(2025, 9, 16, 21, 5, 3))
    assert.equal(formatInTimeZone(date, 'UTC'), 'Thu Oct 16 09:05:03 PM UTC 2025')
  })

  it('uses the abbreviation of zones outside the US', () => {
    assert.equal(
      formatInTimeZone(new Date(Date.UTC(2025, 9, 16, 10, 5, 3)), 'Australia/Melbourne'),
      'Thu Oct 16 09:05:03 PM AEDT 2025',
    )
    assert.equal(
      formatInTimeZone(new Date(Date.UTC(2025, 6, 1, 12, 0, 0)), 'Europe/London'),
      'Tue Jul 01 01:00:00 PM BST 2025',
    )
  })
})

describe('yearInTimeZone', () => {
  it('uses the calendar of the time zone', () => {
    const date = new Date(Date.UTC(2025, 11, 31, 23, 0, 0))
    assert.equal(yearInTimeZone(date, 'UTC'), 2025)
    assert.equal(yearInTimeZone(date, 'Asia/Tokyo'), 2026)
  })
})
