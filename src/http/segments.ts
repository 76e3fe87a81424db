import { DownloadApproach } from './types.js';

/** Inclusive byte range, as sent in `Range: bytes=start-end`. */
export interface Segment {
  index: number;
  start: number;
  end: number;
}

export interface AutoTuning {
  threadCount: number;
  minSegmentSize: number;
}

export const DEFAULT_AUTO_TUNING: AutoTuning = {
  threadCount: 4,
  minSegmentSize: 1024 * 1024,
};

export interface ResolvedPlan {
  approach: Exclude<DownloadApproach, 'auto'>;
  param: number;
}

export function segmentLength(segment: Segment): number {
  return segment.end - segment.start + 1;
}

export function formatRange(segment: Segment): string {
  return `bytes=${segment.start}-${segment.end}`;
}

function assertPositiveInteger(value: number, name: string): void {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Turn `auto` into a concrete approach. Below two minimum-size segments the
 * resource is fetched whole; above that, one thread per minimum-size segment
 * up to the thread count.
 */
export function resolveApproach(
  totalSize: number,
  approach: DownloadApproach,
  segmentParam: number,
  tuning: AutoTuning = DEFAULT_AUTO_TUNING
): ResolvedPlan {
  if (approach !== DownloadApproach.Auto) {
    return { approach, param: segmentParam };
  }
  assertPositiveInteger(tuning.threadCount, 'Auto thread count');
  assertPositiveInteger(tuning.minSegmentSize, 'Auto minimum segment size');

  if (totalSize < tuning.minSegmentSize * 2) {
    return { approach: DownloadApproach.Thread, param: 1 };
  }
  return {
    approach: DownloadApproach.Thread,
    param: Math.min(tuning.threadCount, Math.floor(totalSize / tuning.minSegmentSize)),
  };
}

/**
 * Partition `[0, totalSize)` into ascending, contiguous, non-overlapping
 * ranges.
 *
 * - `size`: `segmentParam` bytes each, the last one shorter
 * - `thread`: `segmentParam` segments of `floor(total / n)` bytes, the
 *   remainder going to the last; never more segments than bytes
 */
export function planSegments(
  totalSize: number,
  approach: DownloadApproach,
  segmentParam: number,
  tuning: AutoTuning = DEFAULT_AUTO_TUNING
): Segment[] {
  assertPositiveInteger(totalSize, 'Total size');
  const plan = resolveApproach(totalSize, approach, segmentParam, tuning);
  assertPositiveInteger(plan.param, plan.approach === DownloadApproach.Size ? 'Segment size' : 'Segment count');

  const segments: Segment[] = [];

  if (plan.approach === DownloadApproach.Size) {
    const count = Math.ceil(totalSize / plan.param);
    for (let index = 0; index < count; index++) {
      const start = index * plan.param;
      segments.push({ index, start, end: Math.min(start + plan.param, totalSize) - 1 });
    }
    return segments;
  }

  const count = Math.min(plan.param, totalSize);
  const length = Math.floor(totalSize / count);
  for (let index = 0; index < count; index++) {
    const start = index * length;
    const end = index === count - 1 ? totalSize - 1 : start + length - 1;
    segments.push({ index, start, end });
  }
  return segments;
}

/**
 * Throws unless the segments tile `[0, totalSize)` exactly. Concurrent
 * writers rely on this to share one sink without locking.
 */
export function assertPartition(segments: readonly Segment[], totalSize: number): void {
  let expectedStart = 0;
  for (const [position, segment] of segments.entries()) {
    if (segment.index !== position) {
      throw new Error(`Segment ${position} has index ${segment.index}`);
    }
    if (segment.start !== expectedStart) {
      throw new Error(`Segment ${position} starts at ${segment.start}, expected ${expectedStart}`);
    }
    if (segment.end < segment.start) {
      throw new Error(`Segment ${position} is empty: ${formatRange(segment)}`);
    }
    expectedStart = segment.end + 1;
  }
  if (expectedStart !== totalSize) {
    throw new Error(`Segments cover ${expectedStart} bytes, expected ${totalSize}`);
  }
}
