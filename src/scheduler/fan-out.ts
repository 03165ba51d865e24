import type { BranchState, FanOutState, HistoryEntry, Payload } from '../types/index.js';

export type FanInVerdict =
  | { kind: 'waiting' }
  | { kind: 'join'; succeeded: string[]; failed: string[] }
  | { kind: 'unreachable'; reason: string };

export function startFanOut(fromNode: string, branches: string[], joinNode: string, quorum: number): FanOutState {
  return {
    fromNode,
    joinNode,
    quorum,
    branches: branches.map(
      (start): BranchState => ({
        branchId: start,
        startNode: start,
        currentNode: start,
        status: 'running',
        history: [],
        retryCounts: {},
        output: {},
      }),
    ),
  };
}

/**
 * Decide whether a fan-out can join. It joins as soon as `quorum` branches
 * have succeeded and fails once too few branches remain to reach it.
 */
export function evaluateFanIn(fanOut: FanOutState): FanInVerdict {
  const succeeded = fanOut.branches.filter((b) => b.status === 'succeeded').map((b) => b.branchId);
  const running = fanOut.branches.filter((b) => b.status === 'running').length;

  if (succeeded.length >= fanOut.quorum) {
    const failed = fanOut.branches.filter((b) => b.status === 'failed').map((b) => b.branchId);
    return { kind: 'join', succeeded, failed };
  }
  if (succeeded.length + running < fanOut.quorum) {
    return {
      kind: 'unreachable',
      reason: `Fan-out from "${fanOut.fromNode}" needs ${fanOut.quorum} branches, only ${succeeded.length + running} can succeed`,
    };
  }
  return { kind: 'waiting' };
}

/** Branch outputs and histories merged in branch declaration order. */
export function mergeBranches(fanOut: FanOutState): { output: Payload; history: HistoryEntry[] } {
  const output: Payload = {};
  const history: HistoryEntry[] = [];
  for (const branch of fanOut.branches) {
    if (branch.status === 'succeeded') Object.assign(output, branch.output);
    history.push(...branch.history);
  }
  return { output, history };
}
