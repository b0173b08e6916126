/**
 * Rebalancing: how far each category sits from its target share, and the
 * amount to move in or out to close the gap without changing the total.
 */

import { Decimal } from '../decimal.js';
import { type CurrentAllocation, valueOf } from './allocation.js';
import {
  type EngineConfig,
  type RebalanceResult,
  type Recommendation,
  targetMap,
} from './models.js';

const HUNDRED = new Decimal(100);

function compareRecommendations(a: Recommendation, b: Recommendation): number {
  const byDelta = b.recommended_delta.abs().cmp(a.recommended_delta.abs());
  if (byDelta !== 0) return byDelta;
  return a.category < b.category ? -1 : a.category > b.category ? 1 : 0;
}

/**
 * Compare current values against target percentages.
 *
 * A category missing on either side counts as zero there. With a zero total
 * nothing is divided: the result is flagged `no_capital` and every
 * percentage and delta is zero.
 */
export function rebalance(allocation: CurrentAllocation, config: EngineConfig): RebalanceResult {
  const targets = targetMap(config);
  const total = allocation.total;
  const noCapital = total.isZero();

  const names = new Set<string>(allocation.categories.map((c) => c.category));
  for (const name of targets.keys()) names.add(name);

  const zero = new Decimal(0);
  const recommendations: Recommendation[] = [];

  for (const category of names) {
    const currentValue = valueOf(allocation, category);
    const targetPct = targets.get(category) ?? zero;

    if (noCapital) {
      recommendations.push({
        category,
        current_value: currentValue,
        current_pct: zero,
        target_pct: targetPct,
        deviation_pct: zero,
        recommended_delta: zero,
        target_value: zero,
      });
      continue;
    }

    const currentPct = currentValue.div(total).times(HUNDRED);
    const deviationPct = targetPct.minus(currentPct);
    recommendations.push({
      category,
      current_value: currentValue,
      current_pct: currentPct,
      target_pct: targetPct,
      deviation_pct: deviationPct,
      recommended_delta: deviationPct.div(HUNDRED).times(total),
      target_value: targetPct.div(HUNDRED).times(total),
    });
  }

  recommendations.sort(compareRecommendations);

  return { total_value: total, no_capital: noCapital, recommendations };
}
