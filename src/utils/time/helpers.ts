/**
 * Time helper functions
 */

import type { TimeZoneMode } from '../../types/common';

const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format a timestamp in ctime-style layout (`Www Mmm dd hh:mm:ss yyyy`)
 *
 * Example: "Mon Aug  3 11:00:00 2015" (day of month padded with a space)
 *
 * @param seconds - Seconds since epoch
 * @param zone - Render in the process time zone or in UTC
 * @returns Formatted date-time string
 */
export function formatCtime(seconds: number, zone: TimeZoneMode): string {
  const date = new Date(seconds * 1000);
  const utc = zone === 'utc';

  const weekday = WEEKDAYS[utc ? date.getUTCDay() : date.getDay()];
  const month = MONTHS[utc ? date.getUTCMonth() : date.getMonth()];
  const day = String(utc ? date.getUTCDate() : date.getDate()).padStart(2, ' ');
  const hours = pad2(utc ? date.getUTCHours() : date.getHours());
  const minutes = pad2(utc ? date.getUTCMinutes() : date.getMinutes());
  const secs = pad2(utc ? date.getUTCSeconds() : date.getSeconds());
  const year = utc ? date.getUTCFullYear() : date.getFullYear();

  return `${weekday} ${month} ${day} ${hours}:${minutes}:${secs} ${year}`;
}
