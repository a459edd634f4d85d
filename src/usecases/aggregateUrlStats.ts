import type { LogRecord, UrlStat } from "../interfaces/index.js";

export class NoRecordsError extends Error {
  constructor(message = "No parsable log records to aggregate.") {
    super(message);
    this.name = "NoRecordsError";
  }
}

type UrlAccumulator = {
  url: string;
  count: number;
  requestTimes: number[];
};

export function median(values: readonly number[]): number {
  if (values.length === 0) {
    throw new RangeError("Cannot take the median of an empty list.");
  }

  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) return sorted[middle];
  return (sorted[middle - 1] + sorted[middle]) / 2;
}

function sum(values: readonly number[]): number {
  let total = 0;
  for (const value of values) total += value;
  return total;
}

// Spreading into Math.max overflows the stack on very popular URLs.
function max(values: readonly number[]): number {
  let highest = Number.NEGATIVE_INFINITY;
  for (const value of values) if (value > highest) highest = value;
  return highest;
}

function finalize(
  accumulator: UrlAccumulator,
  requestsCount: number,
  requestsTimeSum: number,
): UrlStat {
  const timeSum = sum(accumulator.requestTimes);

  return {
    url: accumulator.url,
    count: accumulator.count,
    count_perc: (accumulator.count * 100) / requestsCount,
    time_sum: timeSum,
    time_perc: requestsTimeSum > 0 ? (timeSum * 100) / requestsTimeSum : 0,
    time_avg: timeSum / accumulator.count,
    time_max: max(accumulator.requestTimes),
    time_med: median(accumulator.requestTimes),
  };
}

/**
 * Folds the record stream into per-URL statistics. This is the only point where the
 * whole input is held, as request times per URL, since medians need every value.
 * Results come out in first-seen URL order.
 */
export async function aggregateUrlStats(
  records: AsyncIterable<LogRecord> | Iterable<LogRecord>,
): Promise<UrlStat[]> {
  const urls = new Map<string, UrlAccumulator>();
  let requestsCount = 0;
  let requestsTimeSum = 0;

  for await (const record of records) {
    requestsCount++;
    requestsTimeSum += record.request_time;

    const accumulator = urls.get(record.url);
    if (!accumulator) {
      urls.set(record.url, { url: record.url, count: 1, requestTimes: [record.request_time] });
      continue;
    }
    accumulator.count++;
    accumulator.requestTimes.push(record.request_time);
  }

  if (requestsCount === 0) throw new NoRecordsError();

  return [...urls.values()].map((accumulator) =>
    finalize(accumulator, requestsCount, requestsTimeSum),
  );
}
