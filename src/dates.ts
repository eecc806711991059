import moment from 'moment-timezone'

type Age = { years: number; months: number; days: number }

/** Time elapsed since a birthday, in whole years, months and days, on the calendar of `timeZone` */
function calcAge(day: number, month: number, year: number, now: Date = new Date(), timeZone = 'UTC'): Age {
  const today = moment.tz(now, timeZone)
  let years = today.year() - year
  let months = today.month() + 1 - month
  let days = today.date() - day

  if (days < 0) {
    months--
    days += today.clone().subtract(1, 'month').daysInMonth()
  }
  if (months < 0) {
    years--
    months += 12
  }

  return { years, months, days }
}

/** Formats like `Thu Oct 16 09:05:03 PM AEDT 2025` */
const formatInTimeZone = (date: Date, timeZone: string): string =>
  moment.tz(date, timeZone).format('ddd MMM DD hh:mm:ss A z YYYY')

const yearInTimeZone = (date: Date, timeZone: string): number => moment.tz(date, timeZone).year()

export { calcAge, formatInTimeZone, yearInTimeZone }
export type { Age }
