import { InvalidQuantityError } from '../utils/errors';
import { round2 } from '../utils/money';

export interface LandedCostInput {
     quantity: number;
     unitCost: number;
     freightCost?: number;
     customsDuty?: number;
     otherCosts?: number;
}

export interface LandedCost {
     lineTotal: number;
     additionalCosts: number;
     landedCostPerUnit: number;
     totalLandedCost: number;
}

/**
 * Landed cost of one purchase line.
 *
 * Freight, duty and other costs are the amounts attributed to this line only; nothing
 * is prorated from sibling lines of the same order.
 *
 *   landedCostPerUnit = unitCost + (freight + duty + other) / quantity
 *   totalLandedCost   = landedCostPerUnit * quantity
 */
export function computeLandedCost(input: LandedCostInput): LandedCost {
     const { quantity, unitCost } = input;
     const freightCost = input.freightCost ?? 0;
     const customsDuty = input.customsDuty ?? 0;
     const otherCosts = input.otherCosts ?? 0;

     if (!Number.isInteger(quantity) || quantity <= 0) {
          throw new InvalidQuantityError(`Quantity must be a positive integer, got ${quantity}`);
     }

     for (const [name, value] of Object.entries({ unitCost, freightCost, customsDuty, otherCosts })) {
          if (!Number.isFinite(value) || value < 0) {
               throw new InvalidQuantityError(`${name} must be a non-negative amount, got ${value}`);
          }
     }

     const additionalCosts = freightCost + customsDuty + otherCosts;

     return {
          lineTotal: round2(quantity * unitCost),
          additionalCosts: round2(additionalCosts),
          landedCostPerUnit: round2(unitCost + additionalCosts / quantity),
          // exact per-unit cost times quantity, so rounding the unit value never leaks into the total
          totalLandedCost: round2(unitCost * quantity + additionalCosts),
     };
}
