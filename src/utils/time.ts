import type { BrokerTime } from '../types/trading.js';

/**
 * Broker timestamp helpers.
 *
 * With `X-Accept-Datetime-Format: UNIX` the broker sends microseconds since
 * the epoch, usually as a string ("1476456244000000"). With RFC3339 it sends
 * ISO 8601 strings ("2016-10-14T14:44:04.000000Z").
 */
export const TimestampUtils = {
  /**
   * Convert a broker timestamp to a Date, or null when it cannot be read
   */
  parseBrokerTime(value: BrokerTime | null | undefined): Date | null {
    if (value === null || value === undefined) {
      return null;
    }

    if (typeof value === 'number') {
      return TimestampUtils.fromMicros(value);
    }

    const trimmed = value.trim();
    if (/^\d+$/.test(trimmed)) {
      return TimestampUtils.fromMicros(Number(trimmed));
    }

    const millis = Date.parse(trimmed);
    return Number.isNaN(millis) ? null : new Date(millis);
  },

  /**
   * Epoch microseconds to Date; sub-millisecond precision is dropped
   */
  fromMicros(micros: number): Date | null {
    if (!Number.isFinite(micros) || micros < 0) {
      return null;
    }
    return new Date(Math.floor(micros / 1000));
  },

  /**
   * Date to the microsecond string the broker accepts for `expiry` under UNIX format
   */
  toMicros(date: Date): string {
    return `${date.getTime()}000`;
  },
};

export const parseBrokerTime = TimestampUtils.parseBrokerTime;
