import { createLogger } from '../utils/logger.js';
import type { ChangeEvent, ChangePolicy, PriceRange, PriceSample, TargetRangeHit, TrackedItem } from '../types.js';

const logger = createLogger('Detector');

export function resolvePolicy(defaults: ChangePolicy, item?: Pick<TrackedItem, 'policy'>): ChangePolicy {
  return {
    minAbsoluteDelta: item?.policy?.minAbsoluteDelta ?? defaults.minAbsoluteDelta,
    minPercentDelta: item?.policy?.minPercentDelta ?? defaults.minPercentDelta,
    direction: item?.policy?.direction ?? defaults.direction,
    targetRange: item?.policy?.targetRange ?? defaults.targetRange,
  };
}

/**
 * Compares a fresh sample against the last known one. A missing previous
 * sample is the item's baseline and never produces an event.
 */
export function evaluateChange(
  previous: PriceSample | null,
  current: PriceSample,
  policy: ChangePolicy
): ChangeEvent | null {
  if (!previous) {
    return null;
  }

  if (previous.itemId !== current.itemId) {
    throw new Error(`Cannot compare samples of different items: ${previous.itemId} vs ${current.itemId}`);
  }

  if (previous.price === 0) {
    logger.warn(`Previous price for ${current.itemId} is zero; percentage change is undefined, skipping`);
    return null;
  }

  const delta = current.price - previous.price;
  if (delta === 0) {
    return null;
  }

  const deltaPercent = (delta / previous.price) * 100;

  if (Math.abs(delta) < policy.minAbsoluteDelta) return null;
  if (Math.abs(deltaPercent) < policy.minPercentDelta) return null;
  if (policy.direction === 'decreaseOnly' && delta > 0) return null;
  if (policy.direction === 'increaseOnly' && delta < 0) return null;

  return {
    itemId: current.itemId,
    previous,
    current,
    delta,
    deltaPercent,
    direction: delta < 0 ? 'decrease' : 'increase',
  };
}

export function isInTargetRange(price: number, range: PriceRange | undefined): boolean {
  return range !== undefined && price >= range.min && price <= range.max;
}

/**
 * A hit is raised when the price enters the target range; staying inside it
 * across cycles does not raise another.
 */
export function evaluateTargetRange(
  wasInRange: boolean,
  current: PriceSample,
  range: PriceRange | undefined
): TargetRangeHit | null {
  if (!range || wasInRange || !isInTargetRange(current.price, range)) {
    return null;
  }
  return { itemId: current.itemId, sample: current, range };
}
