/** Outcome of one independent verification rule. */
export interface CheckResult {
  name: string;
  passed: boolean;
  /** Contribution to the aggregate, in [0, 1]. */
  score: number;
  flags: string[];
  /** Blocks approval regardless of the aggregate. */
  hardFail?: boolean;
}

export interface ScoredResult {
  passed: boolean;
  confidence: number;
  hardFail: boolean;
  reason: string;
  flags: string[];
  checks: CheckResult[];
}

const clamp01 = (value: number) => Math.min(1, Math.max(0, value));

export const check = (
  name: string,
  passed: boolean,
  score: number,
  flags: string[] = [],
  hardFail = false
): CheckResult => ({ name, passed, score: clamp01(score), flags, hardFail });

/** Binary rule: full score when it holds, otherwise zero and a flag. */
export const binaryCheck = (name: string, holds: boolean, flag: string, hardFail = false): CheckResult =>
  holds ? check(name, true, 1) : check(name, false, 0, [flag], hardFail);

/**
 * confidence = Σscore / count(checks); pass needs the threshold, no hard
 * fail, and every `required` check passing.
 */
export const aggregate = (
  checks: CheckResult[],
  threshold: number,
  required: readonly string[] = []
): ScoredResult => {
  const total = checks.reduce((sum, c) => sum + c.score, 0);
  const confidence = checks.length > 0 ? clamp01(total / checks.length) : 0;
  const hardFail = checks.some((c) => c.hardFail === true);
  const requiredPassed = required.every((name) => checks.some((c) => c.name === name && c.passed));
  const passed = !hardFail && requiredPassed && confidence >= threshold;
  const passedCount = checks.filter((c) => c.passed).length;

  return {
    passed,
    confidence,
    hardFail,
    reason: passed ? 'All checks passed' : `Passed ${passedCount}/${checks.length} checks`,
    flags: checks.flatMap((c) => c.flags),
    checks,
  };
};
