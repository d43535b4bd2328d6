/**
 * Trace compression for errors escaping an outermost call.
 *
 * A failing deep recursion leaves a trace in which the same few frames
 * repeat for every level. The first repeating region found in the middle
 * of the trace is cut out and summarised as a chain of TraceInfoErrors,
 * then whatever is still too long loses its middle.
 */

import { TraceInfoError } from './errors.js';
import { sameFrame } from './trace.js';
import type { TraceFrame } from './types.js';

export interface CompressedTrace {
  /** Remaining frames, outermost first */
  frames: TraceFrame[];
  /** Head of the summary chain, to be appended to the error's causes */
  summary?: TraceInfoError;
}

export const COMPRESSION_NOTICE =
  'Trace compressed by deepcall: engine frames were dropped, repeating recursion was summarised ' +
  'in the causes above, and the middle of an over-long trace was cut. Disable with ' +
  'setTraceCompression(false), the compressTraces option, or DEEPCALL_COMPRESS_TRACES=false.';

/**
 * Positions where `cycle` starts in `frames`; a match cut short by the
 * end of the trace still counts
 */
function cyclePositions(frames: readonly TraceFrame[], cycle: readonly TraceFrame[]): number[] {
  const positions: number[] = [];
  for (let i = 0; i < frames.length; i++) {
    const span = Math.min(cycle.length, frames.length - i);
    let matches = true;
    for (let j = 0; j < span; j++) {
      if (!sameFrame(frames[i + j], cycle[j])) {
        matches = false;
        break;
      }
    }
    if (matches) positions.push(i);
  }
  return positions;
}

/**
 * Split positions into runs where each start is one cycle after the previous
 */
function contiguousRuns(positions: readonly number[], cycleLength: number): number[][] {
  const runs: number[][] = [];
  let current: number[] = [];
  for (const position of positions) {
    if (current.length && position - current[current.length - 1] !== cycleLength) {
      runs.push(current);
      current = [];
    }
    current.push(position);
  }
  if (current.length) runs.push(current);
  return runs;
}

export function compressTrace(trace: readonly TraceFrame[], maxDepth: number): CompressedTrace {
  const frames = trace.filter((frame) => frame.kind === 'call');
  let summary: TraceInfoError | undefined;

  const total = frames.length;
  for (let index = Math.floor(total / 2); index < Math.floor((total * 3) / 4); index++) {
    const pointer = frames[index];
    let cycleStart = -1;
    for (let i = index - 1; i >= 0; i--) {
      if (sameFrame(frames[i], pointer)) {
        cycleStart = i;
        break;
      }
    }
    if (cycleStart < 0) continue;

    const cycle = frames.slice(cycleStart, index);
    const runs = contiguousRuns(cyclePositions(frames, cycle), cycle.length);
    for (const run of runs.reverse()) {
      if (cycle.length < 2 || run.length < 4) continue;
      const first = run[0];
      const end = run[run.length - 1] + cycle.length;
      if (end < frames.length) {
        summary = new TraceInfoError(
          '[Previous frames caused the following failure]',
          frames.slice(end),
          summary
        );
      }
      summary = new TraceInfoError(
        `[${cycle.length} frames repeated ${run.length - 1} more times and led to the failure below]`,
        frames.slice(first, first + cycle.length),
        summary
      );
      frames.splice(first);
    }
    if (summary) break;
  }

  const limit = Math.floor((maxDepth * 9) / 10);
  if (frames.length > limit) {
    const keep = Math.floor(limit / 2);
    frames.splice(keep, frames.length - 2 * keep);
  }

  return summary ? { frames, summary } : { frames };
}
