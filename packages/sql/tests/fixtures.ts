import { Decimal } from 'decimal.js';
import { DateTime } from 'luxon';
import { createMeterReading } from '@nem12sql/core';
import type { MeterReading } from '@nem12sql/core';

/** `count` half-hourly readings for one meter on 2005-03-01, consumption 1, 2, 3, ... */
export function halfHourlyReadings(count: number, nmi = 'NEM1201009'): MeterReading[] {
  const midnight = DateTime.utc(2005, 3, 1);
  return Array.from({ length: count }, (_, i) =>
    createMeterReading(nmi, midnight.plus({ minutes: (i + 1) * 30 }), new Decimal(i + 1)),
  );
}

export function reading(nmi: string, iso: string, consumption: string): MeterReading {
  return createMeterReading(nmi, DateTime.fromISO(iso, { zone: 'utc' }), new Decimal(consumption));
}
