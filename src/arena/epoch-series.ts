/**
 * Carried-forward per-epoch running totals.
 *
 * The value for an epoch starts as the previous epoch's value; catchUp copies
 * it forward epoch by epoch before the current epoch is read or changed.
 */

import { checkedSub } from "./math.js";

export interface EpochSeries {
  values: Map<number, bigint>;
  lastUpdateEpoch: number;
}

export function createEpochSeries(epoch: number): EpochSeries {
  return { values: new Map([[epoch, 0n]]), lastUpdateEpoch: epoch };
}

export function catchUp(series: EpochSeries, epoch: number): void {
  for (let e = series.lastUpdateEpoch + 1; e <= epoch; e++) {
    series.values.set(e, series.values.get(e - 1) ?? 0n);
  }
  if (epoch > series.lastUpdateEpoch) {
    series.lastUpdateEpoch = epoch;
  }
}

export function valueAt(series: EpochSeries, epoch: number): bigint {
  if (epoch > series.lastUpdateEpoch) {
    return series.values.get(series.lastUpdateEpoch) ?? 0n;
  }
  return series.values.get(epoch) ?? 0n;
}

export function increase(series: EpochSeries, epoch: number, amount: bigint): void {
  catchUp(series, epoch);
  series.values.set(epoch, (series.values.get(epoch) ?? 0n) + amount);
}

export function decrease(series: EpochSeries, epoch: number, amount: bigint, what: string): void {
  catchUp(series, epoch);
  series.values.set(epoch, checkedSub(series.values.get(epoch) ?? 0n, amount, what));
}

/**
 * Get-or-create a series in a keyed map
 */
export function seriesFor<K>(map: Map<K, EpochSeries>, key: K, epoch: number): EpochSeries {
  let series = map.get(key);
  if (!series) {
    series = createEpochSeries(epoch);
    map.set(key, series);
  }
  return series;
}
