/**
 * Supplier delivery estimates
 */

import { getConfiguration, type LeadTime } from '../config.js';
import { ErrorCollection, InvalidQuantityError, InvalidRequestError } from '../errors.js';
import { addDays, isIsoDate } from '../utils/dates.js';

export interface DeliveryEstimate {
  orderDate: string;
  deliveryDate: string;
  leadTimeDays: number;
}

/**
 * Lead time in days for an order size: 0–10 units ship the same day,
 * up to 100 the next day, up to 1000 in four days, larger orders in a week.
 */
export function leadTimeDays(
  units: number,
  leadTimes: readonly LeadTime[] = getConfiguration().leadTimes
): number {
  if (!Number.isInteger(units) || units < 0) {
    throw new InvalidQuantityError(units, 'units');
  }

  const sorted = [...leadTimes].sort((a, b) => a.maxUnits - b.maxUnits);
  const match = sorted.find((lead) => units <= lead.maxUnits);
  return match?.days ?? sorted[sorted.length - 1]?.days ?? 0;
}

export function estimateDelivery(
  orderDate: string,
  units: number,
  leadTimes?: readonly LeadTime[]
): DeliveryEstimate {
  if (!isIsoDate(orderDate)) {
    const errors = new ErrorCollection();
    errors.add('date', 'must be an ISO date (YYYY-MM-DD)');
    throw new InvalidRequestError(errors);
  }

  const days = leadTimeDays(units, leadTimes);
  return {
    orderDate,
    deliveryDate: addDays(orderDate, days),
    leadTimeDays: days,
  };
}
